/* eslint-disable no-console */
/**
 * Chime Configuration Manager
 * Loads and validates environment configuration
 */

import { config as dotenvConfig } from 'dotenv';
import { isAbsolute, join, resolve } from 'path';
import { homedir } from 'os';
import { ChimeConfig, ConfigValidationResult, DEFAULT_CONFIG } from '../../shared/types/config';

// NOTE: We intentionally don't import logger here to avoid circular dependency.
// Logger imports config to get logDir/logLevel, so config logs warnings to console.

// Load .env file
dotenvConfig();

const NODE_ENVS: readonly ChimeConfig['nodeEnv'][] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly ChimeConfig['logLevel'][] = ['debug', 'info', 'warn', 'error'];

/**
 * Expand ~ to home directory
 */
function expandPath(path: string): string {
  if (path.startsWith('~')) {
    return path.replace('~', homedir());
  }
  return resolve(path);
}

/**
 * Parse boolean from environment variable
 */
function parseEnvBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse integer from environment variable, falling back on garbage
 */
function parseEnvInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse an interval or window that must be positive. Zero or negative values
 * fall back to the default and leave a warning.
 */
function parsePositiveEnvInt(name: string, defaultValue: number, warnings: string[]): number {
  const parsed = parseEnvInt(process.env[name], defaultValue);
  if (parsed > 0) return parsed;
  warnings.push(`${name} must be positive, using ${defaultValue}`);
  return defaultValue;
}

function pickEnum<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  defaultValue: T
): T {
  const match = allowed.find((candidate) => candidate === value);
  return match ?? defaultValue;
}

/**
 * Load configuration from environment variables
 */
function loadConfig(warnings: string[]): ChimeConfig {
  const dataDir = expandPath(process.env.CHIME_DATA_DIR || DEFAULT_CONFIG.dataDir);
  const remindersFile = process.env.REMINDERS_FILE || DEFAULT_CONFIG.remindersFile;

  const config: ChimeConfig = {
    // Environment
    nodeEnv: pickEnum(process.env.NODE_ENV, NODE_ENVS, DEFAULT_CONFIG.nodeEnv),
    logLevel: pickEnum(process.env.LOG_LEVEL, LOG_LEVELS, DEFAULT_CONFIG.logLevel),
    logDir: expandPath(process.env.LOG_DIR || DEFAULT_CONFIG.logDir),

    // Storage
    dataDir,
    remindersFile: isAbsolute(remindersFile) ? remindersFile : join(dataDir, remindersFile),

    // Scheduler settings
    pollIntervalMs: parsePositiveEnvInt(
      'REMINDER_POLL_INTERVAL_MS',
      DEFAULT_CONFIG.pollIntervalMs,
      warnings
    ),
    errorBackoffMs: parsePositiveEnvInt(
      'REMINDER_ERROR_BACKOFF_MS',
      DEFAULT_CONFIG.errorBackoffMs,
      warnings
    ),
    dedupWindowMs: parsePositiveEnvInt(
      'REMINDER_DEDUP_WINDOW_MS',
      DEFAULT_CONFIG.dedupWindowMs,
      warnings
    ),
    trayPollIntervalMs: parsePositiveEnvInt(
      'TRAY_POLL_INTERVAL_MS',
      DEFAULT_CONFIG.trayPollIntervalMs,
      warnings
    ),

    // Notification settings
    speechEnabled: parseEnvBoolean(process.env.REMINDER_SPEECH, DEFAULT_CONFIG.speechEnabled),

    // User settings
    userName: process.env.USER_NAME || DEFAULT_CONFIG.userName,
  };

  return config;
}

/**
 * Validate configuration
 */
function validateConfig(config: ChimeConfig, warnings: string[]): ConfigValidationResult {
  if (config.pollIntervalMs < 1000) {
    warnings.push('pollIntervalMs below 1000 will poll the store very aggressively');
  }

  if (config.errorBackoffMs < config.pollIntervalMs) {
    warnings.push('errorBackoffMs should not be shorter than pollIntervalMs');
  }

  return { warnings };
}

// Cached config instance
let configInstance: ChimeConfig | null = null;

/**
 * Get configuration (loads once, caches result)
 */
export function getConfig(): ChimeConfig {
  if (!configInstance) {
    const warnings: string[] = [];
    configInstance = loadConfig(warnings);
    const validation = validateConfig(configInstance, warnings);

    // Use console for config warnings to avoid circular dependency with logger
    if (validation.warnings.length > 0) {
      console.warn('[Config] Configuration warnings:', validation.warnings);
    }
  }

  return configInstance;
}

export type { ChimeConfig };
