/**
 * Chime - Process wiring
 * Builds the reminder system from configuration and runs it until signalled
 */

import { getConfig, type ChimeConfig } from './config';
import { createModuleLogger, shutdownLogger } from './utils/logger';
import { installGlobalErrorHandler } from './utils/errors';
import {
  createReminderSystem,
  type NotificationSinks,
  type ReminderSystem,
  type ToastSink,
} from './reminders';

const logger = createModuleLogger('Main');

export interface TerminalSinks {
  sinks: NotificationSinks;
  toast: ToastSink;
}

/**
 * Sinks that present reminders on the terminal the daemon runs in
 */
export function createTerminalSinks(
  config: ChimeConfig,
  write: (line: string) => void = (line) => process.stdout.write(`${line}\n`)
): TerminalSinks {
  const sinks: NotificationSinks = {
    alert: (title, body) => {
      write(`\u0007\n== ${title} ==\n${body}\n`);
    },
  };

  if (config.speechEnabled) {
    sinks.speech = (text) => {
      write(`(${config.userName}) ${text}`);
    };
  }

  return {
    sinks,
    toast: (title, message) => {
      write(`${title}: ${message}`);
    },
  };
}

export function buildReminderSystem(config: ChimeConfig = getConfig()): ReminderSystem {
  const { sinks, toast } = createTerminalSinks(config);
  return createReminderSystem({
    remindersFile: config.remindersFile,
    sinks,
    toast,
    pollIntervalMs: config.pollIntervalMs,
    errorBackoffMs: config.errorBackoffMs,
    dedupWindowMs: config.dedupWindowMs,
    trayPollIntervalMs: config.trayPollIntervalMs,
  });
}

/**
 * Run the scheduler and tray watcher until SIGINT/SIGTERM
 */
export async function runDaemon(config: ChimeConfig = getConfig()): Promise<void> {
  const system = buildReminderSystem(config);

  installGlobalErrorHandler({
    saveState: () => system.stop(),
  });

  system.scheduler.on('persistence:failed', (error) => {
    logger.warn('Reminders are not being saved', { filePath: error.filePath });
    process.stderr.write(`Warning: reminders could not be saved to ${error.filePath}\n`);
  });

  await system.start();
  logger.info('Chime running', { remindersFile: config.remindersFile });

  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info('Shutting down', { signal });
      resolve();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

  await system.stop();
  await shutdownLogger();
}
