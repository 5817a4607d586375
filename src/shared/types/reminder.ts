/**
 * Chime Reminder Types
 */

/**
 * Unit a recurring reminder advances by
 */
export type RecurrenceUnit = 'days' | 'weeks' | 'months';

/**
 * Recurrence descriptor for recurring reminders
 *
 * `count` is always a positive integer, e.g. `{ unit: 'weeks', count: 2 }`
 * for a fortnightly reminder.
 */
export interface Recurrence {
  unit: RecurrenceUnit;
  count: number;
}

export interface Reminder {
  id: string;
  /** Normalized reminder content, free of trigger phrases and time expressions */
  text: string;
  /** Absolute instant the reminder becomes due */
  dueTime: Date;
  createdAt: Date;
  completed: boolean;
  recurring: boolean;
  /** Present iff `recurring` is true */
  recurrence: Recurrence | null;
  lastTriggered: Date | null;
}

/**
 * Result of parsing a natural-language reminder request
 */
export interface ParsedReminder {
  text: string;
  dueTime: Date;
  recurrence: Recurrence | null;
}

/**
 * On-disk interval shape: exactly one of days, weeks or months
 */
export type StoredInterval = { days: number } | { weeks: number } | { months: number };

/**
 * Serializable reminder for storage
 */
export interface StoredReminder {
  id: string;
  text: string;
  due_time: string;
  created_at: string;
  completed: boolean;
  recurring: boolean;
  recurring_interval: StoredInterval | null;
  last_triggered: string | null;
}

/**
 * Outcome of a single notification attempt
 */
export type DispatchOutcome = 'delivered' | 'suppressed' | 'failed';

export interface ReminderStats {
  total: number;
  /** Due but not yet fired */
  overdue: number;
  upcoming: number;
  completed: number;
  recurring: number;
}
