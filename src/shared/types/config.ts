/**
 * Chime Configuration Types
 */

export interface ChimeConfig {
  // Environment
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  logDir: string;

  // Storage
  dataDir: string;
  /** Reminder snapshot file; relative names resolve inside dataDir */
  remindersFile: string;

  // Scheduler settings
  /** Cadence between poll iterations */
  pollIntervalMs: number;
  /** Pause after a failed iteration before resuming normal cadence */
  errorBackoffMs: number;
  /** Window in which a repeat notification for the same reminder is suppressed */
  dedupWindowMs: number;
  /** Cadence of the tray-style watcher */
  trayPollIntervalMs: number;

  // Notification settings
  /** Speak reminders aloud in addition to the visual alert */
  speechEnabled: boolean;

  // User settings
  userName: string;
}

export interface ConfigValidationResult {
  warnings: string[];
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: ChimeConfig = {
  nodeEnv: 'development',
  logLevel: 'info',
  logDir: '~/.chime/logs',
  dataDir: '~/.chime',
  remindersFile: 'reminders.json',
  pollIntervalMs: 10_000,
  errorBackoffMs: 60_000,
  dedupWindowMs: 5 * 60_000,
  trayPollIntervalMs: 30_000,
  speechEnabled: true,
  userName: 'there',
};
