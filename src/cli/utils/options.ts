/**
 * Argument parsers for the Chime CLI
 */

import { InvalidArgumentError } from 'commander';
import { RECURRENCE_UNITS } from '../../main/reminders/recurrence';
import type { Recurrence, RecurrenceUnit } from '../../shared/types/reminder';

function isRecurrenceUnit(value: string): value is RecurrenceUnit {
  return RECURRENCE_UNITS.some((unit) => unit === value);
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return parsed;
}

/**
 * ISO 8601 instant with an explicit offset, e.g. 2024-01-02T15:00:00Z
 */
export function parseDueTime(value: string): Date {
  if (!/(?:Z|[+-]\d{2}:?\d{2})$/i.test(value)) {
    throw new InvalidArgumentError('Due time needs a UTC offset, e.g. 2024-01-02T15:00:00Z.');
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new InvalidArgumentError(`Not a valid date: ${value}`);
  }
  return parsed;
}

/**
 * "days", "weeks:2" or "months:1"
 */
export function parseInterval(value: string): Recurrence {
  const [unit, rawCount = '1'] = value.trim().toLowerCase().split(':');
  if (!isRecurrenceUnit(unit)) {
    throw new InvalidArgumentError(`Interval unit must be one of ${RECURRENCE_UNITS.join(', ')}.`);
  }
  return { unit, count: parsePositiveInt(rawCount) };
}
