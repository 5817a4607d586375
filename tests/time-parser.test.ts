/**
 * Chime - Time-Expression Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { cleanReminderText, parseReminderText } from '../src/main/reminders/time-parser';

// Monday
const NOW = new Date('2024-01-01T10:00:00Z');

describe('parseReminderText', () => {
  it('resolves a day and time to the next matching instant', () => {
    const parsed = parseReminderText('Remind me to call Mom tomorrow at 3pm', NOW);

    expect(parsed).toEqual({
      text: 'call mom',
      dueTime: new Date('2024-01-02T15:00:00Z'),
      recurrence: null,
    });
  });

  it('extracts a daily recurrence and rolls a passed time to tomorrow', () => {
    const parsed = parseReminderText('Remind me every day at 8am to take my medicine', NOW);

    expect(parsed).toEqual({
      text: 'take my medicine',
      dueTime: new Date('2024-01-02T08:00:00Z'),
      recurrence: { unit: 'days', count: 1 },
    });
  });

  it('defaults to one hour from now without a time expression', () => {
    const parsed = parseReminderText('remind me to stretch', NOW);

    expect(parsed?.text).toBe('stretch');
    expect(parsed?.dueTime).toEqual(new Date('2024-01-01T11:00:00Z'));
  });

  it('treats 12am as midnight and 12pm as noon', () => {
    expect(parseReminderText('remind me at 12am to back up', NOW)).toEqual({
      text: 'back up',
      dueTime: new Date('2024-01-02T00:00:00Z'),
      recurrence: null,
    });
    expect(parseReminderText('remind me at 12pm to eat lunch', NOW)?.dueTime).toEqual(
      new Date('2024-01-01T12:00:00Z')
    );
  });

  it('parses 24-hour times', () => {
    const parsed = parseReminderText('remind me to leave at 17:45', NOW);

    expect(parsed?.text).toBe('leave');
    expect(parsed?.dueTime).toEqual(new Date('2024-01-01T17:45:00Z'));
  });

  it('returns null when nothing is left to remind about', () => {
    expect(parseReminderText('remind me at 9am', NOW)).toBeNull();
    expect(parseReminderText('', NOW)).toBeNull();
    expect(parseReminderText('   ', NOW)).toBeNull();
  });

  it('handles relative times', () => {
    expect(parseReminderText('remind me to check the oven in 30 minutes', NOW)).toEqual({
      text: 'check the oven',
      dueTime: new Date('2024-01-01T10:30:00Z'),
      recurrence: null,
    });
    expect(parseReminderText('remind me in 2 hours to call back', NOW)?.dueTime).toEqual(
      new Date('2024-01-01T12:00:00Z')
    );
  });

  it('resolves weekdays to the next future occurrence at 9am', () => {
    expect(parseReminderText('remind me on friday to water the plants', NOW)).toEqual({
      text: 'water the plants',
      dueTime: new Date('2024-01-05T09:00:00Z'),
      recurrence: null,
    });
    // Today's weekday means a week from today
    expect(parseReminderText('remind me on monday to call the bank', NOW)?.dueTime).toEqual(
      new Date('2024-01-08T09:00:00Z')
    );
  });

  it('parses "every N" recurrences', () => {
    expect(parseReminderText('remind me every 2 weeks at 9am to review the budget', NOW)).toEqual({
      text: 'review the budget',
      dueTime: new Date('2024-01-02T09:00:00Z'),
      recurrence: { unit: 'weeks', count: 2 },
    });
    expect(parseReminderText('remind me monthly to pay rent', NOW)?.recurrence).toEqual({
      unit: 'months',
      count: 1,
    });
  });

  it('does not mistake a duration for a clock time', () => {
    expect(parseReminderText('remind me to run for 10 minutes at 7pm', NOW)).toEqual({
      text: 'run for 10 minutes',
      dueTime: new Date('2024-01-01T19:00:00Z'),
      recurrence: null,
    });
  });

  it('ignores impossible times', () => {
    const parsed = parseReminderText('remind me at 25:00 to sleep', NOW);
    expect(parsed?.dueTime).toEqual(new Date('2024-01-01T11:00:00Z'));
  });
});

describe('cleanReminderText', () => {
  it('strips trigger phrases and punctuation', () => {
    expect(cleanReminderText('please remind me that the meeting moved.')).toBe('the meeting moved');
    expect(cleanReminderText('set a reminder to buy milk!')).toBe('buy milk');
  });
});
