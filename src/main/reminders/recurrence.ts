/**
 * Chime - Recurrence math
 * Advances recurring reminders by calendar days, weeks or months in UTC
 */

import { addDays, addMonths, addWeeks } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import type { Recurrence, RecurrenceUnit, StoredInterval } from '../../shared/types/reminder';

export const RECURRENCE_UNITS: readonly RecurrenceUnit[] = ['days', 'weeks', 'months'];

export function isValidRecurrence(recurrence: Recurrence): boolean {
  return Number.isInteger(recurrence.count) && recurrence.count >= 1;
}

/**
 * Move `from` forward by `steps` whole intervals.
 *
 * Months clamp to the end of shorter months, so Jan 31 + 1 month lands on
 * Feb 28 (or Feb 29 in a leap year).
 */
export function advance(from: Date, recurrence: Recurrence, steps = 1): Date {
  const anchor = new UTCDate(from.getTime());
  const amount = recurrence.count * steps;

  switch (recurrence.unit) {
    case 'days':
      return new Date(addDays(anchor, amount).getTime());
    case 'weeks':
      return new Date(addWeeks(anchor, amount).getTime());
    case 'months':
      return new Date(addMonths(anchor, amount).getTime());
    default: {
      const unknownUnit: never = recurrence.unit;
      throw new Error(`Unknown recurrence unit: ${String(unknownUnit)}`);
    }
  }
}

/**
 * Next due time after a recurring reminder fired.
 *
 * Always at least one interval past `dueTime`. When that is still not after
 * `now` (the process was offline across several occurrences) whole intervals
 * are stepped from the original anchor until it is, so missed occurrences
 * collapse into one notification.
 */
export function nextOccurrence(dueTime: Date, recurrence: Recurrence, now: Date): Date {
  if (!isValidRecurrence(recurrence)) {
    throw new RangeError(`Recurrence count must be a positive integer, got ${recurrence.count}`);
  }

  let steps = 1;
  let next = advance(dueTime, recurrence, steps);
  while (next.getTime() <= now.getTime()) {
    steps += 1;
    next = advance(dueTime, recurrence, steps);
  }
  return next;
}

export function toStoredInterval(recurrence: Recurrence): StoredInterval {
  switch (recurrence.unit) {
    case 'days':
      return { days: recurrence.count };
    case 'weeks':
      return { weeks: recurrence.count };
    case 'months':
      return { months: recurrence.count };
    default: {
      const unknownUnit: never = recurrence.unit;
      throw new Error(`Unknown recurrence unit: ${String(unknownUnit)}`);
    }
  }
}

export function fromStoredInterval(interval: StoredInterval): Recurrence {
  if ('days' in interval) return { unit: 'days', count: interval.days };
  if ('weeks' in interval) return { unit: 'weeks', count: interval.weeks };
  return { unit: 'months', count: interval.months };
}

/**
 * Human phrasing used in confirmations, e.g. " every day" or " every 2 weeks"
 */
export function describeRecurrence(recurrence: Recurrence | null): string {
  if (!recurrence) return '';
  const singular = recurrence.unit.slice(0, -1);
  return recurrence.count === 1
    ? ` every ${singular}`
    : ` every ${recurrence.count} ${recurrence.unit}`;
}
