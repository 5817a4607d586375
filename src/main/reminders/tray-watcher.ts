/**
 * Chime - Tray Watcher
 * Secondary observer that surfaces due reminders as tray toasts and renders
 * the upcoming-reminders summary for the tray menu
 *
 * The watcher only presents. Lifecycle transitions belong to the scheduler,
 * so a recurring reminder is never advanced twice for one occurrence.
 */

import { format } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import { createModuleLogger } from '../utils/logger';
import { DispatchError, getErrorMessage } from '../utils/errors';
import { TypedEventEmitter } from '../utils/typed-event-emitter';
import { ReminderStore } from './reminder-store';
import { NotificationLedger, occurrenceKey } from './notification-ledger';

const logger = createModuleLogger('TrayWatcher');

/**
 * Shows a tray balloon / toast
 */
export type ToastSink = (title: string, message: string) => Promise<void> | void;

export interface TrayWatcherOptions {
  /** Poll cadence (default: 30s) */
  pollIntervalMs?: number;
  clock?: () => Date;
}

export interface TrayWatcherEvents {
  'toast:shown': (id: string) => void;
  'toast:failed': (id: string, error: DispatchError) => void;
}

const DEFAULT_POLL_INTERVAL_MS = 30_000;

export class TrayWatcher extends TypedEventEmitter<TrayWatcherEvents> {
  private timer: NodeJS.Timeout | null = null;
  private polling: Promise<number> | null = null;
  private readonly pollIntervalMs: number;
  private readonly clock: () => Date;

  constructor(
    private readonly store: ReminderStore,
    private readonly ledger: NotificationLedger,
    private readonly toast: ToastSink,
    options: TrayWatcherOptions = {}
  ) {
    super();
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.clock = options.clock ?? (() => new Date());
  }

  start(): void {
    if (this.timer) {
      return; // Already running
    }

    this.timer = setInterval(() => {
      // Skip a tick while the previous check is still running
      if (this.polling) return;
      const check = this.checkNotifications(this.clock());
      this.polling = check;
      void check
        .catch((error: unknown) => {
          logger.error('Error checking notifications', { message: getErrorMessage(error) });
        })
        .finally(() => {
          this.polling = null;
        });
    }, this.pollIntervalMs);

    logger.info('Tray watcher started', { pollIntervalMs: this.pollIntervalMs });
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    const inFlight = this.polling;
    if (inFlight) {
      try {
        await inFlight;
      } catch (error) {
        logger.debug('Last tray check failed during stop', { message: getErrorMessage(error) });
      }
    }
    logger.info('Tray watcher stopped');
  }

  /**
   * Toast every due reminder nobody presented inside the dedup window
   *
   * @returns Number of toasts shown
   */
  async checkNotifications(now: Date): Promise<number> {
    const dueReminders = await this.store.due(now);
    let shown = 0;

    for (const reminder of dueReminders) {
      if (!this.ledger.claim(occurrenceKey(reminder), now)) {
        continue;
      }

      try {
        await this.toast('⏰ Reminder', reminder.text);
        shown++;
        this.emit('toast:shown', reminder.id);
      } catch (error) {
        const failure = new DispatchError(getErrorMessage(error), 'toast', { id: reminder.id });
        logger.error('Error showing tray notification', { message: failure.message, id: reminder.id });
        this.emit('toast:failed', reminder.id, failure);
      }
    }

    this.ledger.prune(now);
    return shown;
  }

  /**
   * Upcoming reminders as "yyyy-MM-dd HH:mm: text" lines for the tray menu
   */
  async summary(limit = 5): Promise<string[]> {
    const upcoming = await this.store.upcoming(limit);
    return upcoming.map(
      (reminder) =>
        `${format(new UTCDate(reminder.dueTime.getTime()), 'yyyy-MM-dd HH:mm')}: ${reminder.text}`
    );
  }
}
