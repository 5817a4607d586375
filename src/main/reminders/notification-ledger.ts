/**
 * Chime - Notification Ledger
 * Shared last-notified timestamps that keep the scheduler and the tray
 * watcher from presenting the same reminder occurrence twice within the
 * dedup window
 */

import type { Reminder } from '../../shared/types/reminder';

export const DEFAULT_DEDUP_WINDOW_MS = 5 * 60 * 1000;

/**
 * Ledger key for one occurrence of a reminder. A snoozed or advanced
 * reminder has a new due time and therefore a fresh key.
 */
export function occurrenceKey(reminder: Pick<Reminder, 'id' | 'dueTime'>): string {
  return `${reminder.id}@${reminder.dueTime.toISOString()}`;
}

export class NotificationLedger {
  private lastNotified: Map<string, number> = new Map();

  constructor(private readonly windowMs: number = DEFAULT_DEDUP_WINDOW_MS) {}

  /**
   * Reserve the right to notify for `key` at `now`.
   *
   * Check and stamp happen in one synchronous step, so two observers on the
   * same event loop can never both win.
   *
   * @returns false when the key was already notified inside the window
   */
  claim(key: string, now: Date): boolean {
    const timestamp = now.getTime();
    const last = this.lastNotified.get(key);

    if (last !== undefined && Math.abs(timestamp - last) < this.windowMs) {
      return false;
    }

    this.lastNotified.set(key, timestamp);
    return true;
  }

  lastNotifiedAt(key: string): Date | null {
    const last = this.lastNotified.get(key);
    return last === undefined ? null : new Date(last);
  }

  /**
   * Forget entries whose window has passed
   *
   * @returns Number of entries dropped
   */
  prune(now: Date): number {
    const timestamp = now.getTime();
    let dropped = 0;
    for (const [key, last] of this.lastNotified) {
      if (timestamp - last >= this.windowMs) {
        this.lastNotified.delete(key);
        dropped++;
      }
    }
    return dropped;
  }

  get size(): number {
    return this.lastNotified.size;
  }
}
