/**
 * Chime - Reminder Scheduler
 * Background loop that fires due reminders and applies their lifecycle
 * transition (complete one-shot reminders, advance recurring ones)
 */

import { createModuleLogger } from '../utils/logger';
import { AsyncLock } from '../utils/async-lock';
import { PersistenceError, toError } from '../utils/errors';
import { TypedEventEmitter } from '../utils/typed-event-emitter';
import { ReminderStore } from './reminder-store';
import { NotificationDispatcher } from './notification-dispatcher';
import type { DispatchOutcome, Reminder } from '../../shared/types/reminder';

const logger = createModuleLogger('ReminderScheduler');

// =============================================================================
// Types
// =============================================================================

export type SchedulerState = 'stopped' | 'running';

export interface ReminderSchedulerOptions {
  /** Cadence between iteration starts (default: 10s) */
  pollIntervalMs?: number;
  /** Pause after a failed iteration (default: 60s) */
  errorBackoffMs?: number;
  /** Wall-clock source */
  clock?: () => Date;
}

export interface IterationSummary {
  checkedAt: Date;
  due: number;
  delivered: number;
  suppressed: number;
  failed: number;
  completed: number;
  rescheduled: number;
}

export interface ReminderSchedulerEvents {
  started: () => void;
  stopped: () => void;
  'reminder:fired': (reminder: Reminder, outcome: DispatchOutcome) => void;
  'iteration:complete': (summary: IterationSummary) => void;
  'iteration:error': (error: Error) => void;
  /** Emitted once per run of consecutive save failures */
  'persistence:failed': (error: PersistenceError) => void;
}

const DEFAULT_POLL_INTERVAL_MS = 10_000;
const DEFAULT_ERROR_BACKOFF_MS = 60_000;

// =============================================================================
// ReminderScheduler Class
// =============================================================================

export class ReminderScheduler extends TypedEventEmitter<ReminderSchedulerEvents> {
  private state: SchedulerState = 'stopped';
  private loop: Promise<void> | null = null;
  private generation = 0;
  private wakeUp: (() => void) | null = null;
  private persistenceWarned = false;
  private readonly iterationLock = new AsyncLock();
  private readonly pollIntervalMs: number;
  private readonly errorBackoffMs: number;
  private readonly clock: () => Date;

  constructor(
    private readonly store: ReminderStore,
    private readonly dispatcher: NotificationDispatcher,
    options: ReminderSchedulerOptions = {}
  ) {
    super();
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.errorBackoffMs = options.errorBackoffMs ?? DEFAULT_ERROR_BACKOFF_MS;
    this.clock = options.clock ?? (() => new Date());
  }

  // ===========================================================================
  // Lifecycle Methods
  // ===========================================================================

  /**
   * Start polling. No-op when already running. A loop still winding down
   * from an earlier stop() exits on its own; only the newest loop polls.
   */
  start(): void {
    if (this.state === 'running') {
      return;
    }

    this.state = 'running';
    this.loop = this.runLoop(++this.generation);
    logger.info('Reminder scheduler started', { pollIntervalMs: this.pollIntervalMs });
    this.emit('started');
  }

  /**
   * Stop polling. Resolves once the in-flight iteration (dispatch, lifecycle
   * transition and save) has finished; no iteration starts afterwards.
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (this.state === 'stopped' && !loop) {
      return;
    }

    this.state = 'stopped';
    this.wakeUp?.();
    if (loop) {
      await loop;
    }
    if (this.loop !== loop) {
      // restarted while this stop was waiting
      return;
    }
    this.loop = null;

    logger.info('Reminder scheduler stopped');
    this.emit('stopped');
  }

  getState(): SchedulerState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  // ===========================================================================
  // Iteration
  // ===========================================================================

  /**
   * Run one poll: dispatch every due reminder, then persist all lifecycle
   * transitions in a single write. Errors propagate to the caller.
   */
  async runOnce(now: Date = this.clock()): Promise<IterationSummary> {
    return this.iterationLock.runExclusive(async () => {
      const summary: IterationSummary = {
        checkedAt: now,
        due: 0,
        delivered: 0,
        suppressed: 0,
        failed: 0,
        completed: 0,
        rescheduled: 0,
      };

      const dueReminders = await this.store.due(now);
      summary.due = dueReminders.length;
      if (dueReminders.length === 0) {
        return summary;
      }

      const fired: Array<{ reminder: Reminder; outcome: DispatchOutcome }> = [];
      for (const reminder of dueReminders) {
        const outcome = await this.dispatcher.dispatch(reminder, now);
        summary[outcome]++;
        fired.push({ reminder, outcome });
      }

      try {
        const result = await this.store.applyFiredBatch(
          dueReminders.map((reminder) => reminder.id),
          now
        );
        summary.completed = result.completed.length;
        summary.rescheduled = result.rescheduled.length;
        this.persistenceWarned = false;
      } catch (error) {
        if (error instanceof PersistenceError && !this.persistenceWarned) {
          this.persistenceWarned = true;
          this.emit('persistence:failed', error);
        }
        throw error;
      }

      for (const { reminder, outcome } of fired) {
        this.notifyFired(reminder, outcome);
      }

      logger.info('Processed due reminders', { ...summary, checkedAt: now.toISOString() });
      this.emit('iteration:complete', summary);
      return summary;
    });
  }

  /**
   * Listeners run after the batch is saved; one that throws is logged and
   * does not affect the iteration.
   */
  private notifyFired(reminder: Reminder, outcome: DispatchOutcome): void {
    try {
      this.emit('reminder:fired', reminder, outcome);
    } catch (error) {
      logger.logError(toError(error), `reminder:fired listener failed for ${reminder.id}`);
    }
  }

  private isCurrent(generation: number): boolean {
    return this.state === 'running' && this.generation === generation;
  }

  /**
   * Poll until stopped. Ticks are deadline-based: the next iteration starts
   * one interval after the previous one started, not after it finished.
   */
  private async runLoop(generation: number): Promise<void> {
    while (this.isCurrent(generation)) {
      const startedAt = Date.now();
      let delayMs: number;

      try {
        await this.runOnce(this.clock());
        delayMs = Math.max(0, this.pollIntervalMs - (Date.now() - startedAt));
      } catch (caught) {
        const error = toError(caught);
        logger.error('Error in reminder processing', {
          message: error.message,
          backoffMs: this.errorBackoffMs,
        });
        this.emit('iteration:error', error);
        delayMs = this.errorBackoffMs;
      }

      if (!this.isCurrent(generation)) {
        break;
      }
      await this.sleep(delayMs);
    }
  }

  /**
   * Sleep that stop() can cut short
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const finish = (): void => {
        this.wakeUp = null;
        resolve();
      };
      const timer = setTimeout(finish, ms);
      this.wakeUp = () => {
        clearTimeout(timer);
        finish();
      };
    });
  }
}
