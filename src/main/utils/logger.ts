/**
 * Chime - Logger
 * Winston-based logging system with file rotation
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { mkdirSync, existsSync } from 'fs';
import { getConfig } from '../config';

// Custom format for console output
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
    const moduleStr = module ? `[${String(module)}]` : '[Chime]';
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level} ${moduleStr} ${String(message)}${metaStr}`;
  })
);

// Custom format for file output
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
    const moduleStr = module ? `[${String(module)}]` : '[Chime]';
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level.toUpperCase().padEnd(5)} ${moduleStr} ${String(message)}${metaStr}`;
  })
);

// Singleton logger instance
let loggerInstance: winston.Logger | null = null;
let isShuttingDown = false;

/**
 * Initialize the logger
 */
function initLogger(): winston.Logger {
  const config = getConfig();
  const logDir = config.logDir;
  const logLevel = config.logLevel;
  const isDev = config.nodeEnv === 'development';

  // Create log directory if it doesn't exist
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const transports: winston.transport[] = [];

  // Console transport only in dev; the CLI prints its own output
  if (isDev) {
    transports.push(
      new winston.transports.Console({
        format: consoleFormat,
        level: logLevel,
      })
    );
  }

  // File transport with daily rotation
  transports.push(
    new DailyRotateFile({
      dirname: logDir,
      filename: 'chime-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '14d',
      format: fileFormat,
      level: logLevel,
    })
  );

  // Error file (errors only)
  transports.push(
    new DailyRotateFile({
      dirname: logDir,
      filename: 'chime-error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      format: fileFormat,
      level: 'error',
    })
  );

  return winston.createLogger({
    level: logLevel,
    defaultMeta: {},
    transports,
    exitOnError: false,
  });
}

/**
 * Get the logger instance (creates if needed)
 */
function getLogger(): winston.Logger {
  if (!loggerInstance) {
    loggerInstance = initLogger();
  }
  return loggerInstance;
}

/**
 * Create a child logger for a specific module
 */
export function createModuleLogger(moduleName: string): ModuleLogger {
  return new ModuleLogger(getLogger(), moduleName);
}

/**
 * Module-specific logger with convenience methods
 */
export class ModuleLogger {
  private logger: winston.Logger;
  private module: string;

  constructor(logger: winston.Logger, module: string) {
    this.logger = logger;
    this.module = module;
  }

  private safeLog(level: string, message: string, meta?: Record<string, unknown>): void {
    if (isShuttingDown) {
      return; // Skip logging during shutdown to prevent EPIPE errors
    }
    try {
      this.logger.log(level, message, { module: this.module, ...meta });
    } catch (error) {
      // Last resort: the transports themselves are failing
      process.stderr.write(`[${this.module}] log write failed: ${String(error)}\n`);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.safeLog('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.safeLog('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.safeLog('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.safeLog('error', message, meta);
  }

  /**
   * Log with timing information
   */
  time(label: string): () => void {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(`${label} completed`, { duration: `${duration.toFixed(2)}ms` });
    };
  }

  /**
   * Log an error with stack trace
   */
  logError(error: Error, context?: string): void {
    this.error(context ? `${context}: ${error.message}` : error.message, {
      stack: error.stack,
      name: error.name,
    });
  }
}

/**
 * Shutdown the logger (close file handles)
 */
export function shutdownLogger(): Promise<void> {
  // Mark as shutting down first to prevent new writes
  isShuttingDown = true;

  return new Promise((resolve) => {
    if (!loggerInstance) {
      resolve();
      return;
    }
    const instance = loggerInstance;
    loggerInstance = null;
    instance.on('finish', () => resolve());
    instance.end();
  });
}
