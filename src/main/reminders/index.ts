/**
 * Chime - Reminder system composition root
 *
 * One process builds one store, one ledger and one scheduler, and hands them
 * to everything else explicitly; there are no module-level singletons here.
 *
 * @example
 * const system = createReminderSystem({
 *   remindersFile: '/tmp/reminders.json',
 *   sinks: { alert: showAlert, speech: speak },
 * });
 * await system.start();
 * await system.service.addFromText('remind me to stretch at 3pm');
 * await system.stop();
 */

import { createModuleLogger } from '../utils/logger';
import { ConfigError } from '../utils/errors';
import { ReminderStore } from './reminder-store';
import { DEFAULT_DEDUP_WINDOW_MS, NotificationLedger } from './notification-ledger';
import { NotificationDispatcher, type NotificationSinks } from './notification-dispatcher';
import { ReminderScheduler } from './reminder-scheduler';
import { ReminderService } from './reminder-service';
import { TrayWatcher, type ToastSink } from './tray-watcher';

const logger = createModuleLogger('ReminderSystem');

export interface ReminderSystemOptions {
  remindersFile: string;
  sinks: NotificationSinks;
  /** Enables the tray watcher when given */
  toast?: ToastSink;
  pollIntervalMs?: number;
  errorBackoffMs?: number;
  dedupWindowMs?: number;
  trayPollIntervalMs?: number;
  clock?: () => Date;
}

export interface ReminderSystem {
  store: ReminderStore;
  ledger: NotificationLedger;
  dispatcher: NotificationDispatcher;
  scheduler: ReminderScheduler;
  service: ReminderService;
  trayWatcher: TrayWatcher | null;
  /** Load persisted reminders and start the background workers */
  start(): Promise<void>;
  /** Stop the workers, waiting for in-flight work to finish */
  stop(): Promise<void>;
}

const TIMING_OPTIONS = [
  'pollIntervalMs',
  'errorBackoffMs',
  'dedupWindowMs',
  'trayPollIntervalMs',
] as const;

function assertPositiveTimings(options: ReminderSystemOptions): void {
  for (const name of TIMING_OPTIONS) {
    const value = options[name];
    if (value !== undefined && !(Number.isFinite(value) && value > 0)) {
      throw new ConfigError(`${name} must be a positive number of milliseconds`, { [name]: value });
    }
  }
}

export function createReminderSystem(options: ReminderSystemOptions): ReminderSystem {
  assertPositiveTimings(options);
  const clock = options.clock ?? (() => new Date());
  const store = new ReminderStore(options.remindersFile);
  const ledger = new NotificationLedger(options.dedupWindowMs ?? DEFAULT_DEDUP_WINDOW_MS);
  const dispatcher = new NotificationDispatcher(options.sinks, ledger);
  const scheduler = new ReminderScheduler(store, dispatcher, {
    pollIntervalMs: options.pollIntervalMs,
    errorBackoffMs: options.errorBackoffMs,
    clock,
  });
  const service = new ReminderService(store, clock);
  const trayWatcher = options.toast
    ? new TrayWatcher(store, ledger, options.toast, {
        pollIntervalMs: options.trayPollIntervalMs,
        clock,
      })
    : null;

  return {
    store,
    ledger,
    dispatcher,
    scheduler,
    service,
    trayWatcher,

    async start(): Promise<void> {
      const count = await store.load();
      scheduler.start();
      trayWatcher?.start();
      logger.info('Reminder system started', { reminders: count, tray: trayWatcher !== null });
    },

    async stop(): Promise<void> {
      await trayWatcher?.stop();
      await scheduler.stop();
      logger.info('Reminder system stopped');
    },
  };
}

export { ReminderStore, createReminder } from './reminder-store';
export { NotificationLedger } from './notification-ledger';
export { NotificationDispatcher, presentReminder } from './notification-dispatcher';
export type { AlertSink, SpeechSink, NotificationSinks } from './notification-dispatcher';
export { ReminderScheduler } from './reminder-scheduler';
export type { IterationSummary, ReminderSchedulerEvents } from './reminder-scheduler';
export { ReminderService, formatDueTime } from './reminder-service';
export { TrayWatcher } from './tray-watcher';
export type { ToastSink } from './tray-watcher';
export { parseReminderText } from './time-parser';
export { nextOccurrence } from './recurrence';
