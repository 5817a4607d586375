/**
 * Chime - Time-Expression Parser
 * Turns "remind me every day at 8am to take my medicine" into structured fields
 *
 * Pure: no I/O, no clock access. All wall-clock resolution happens in UTC
 * relative to the `now` the caller passes in.
 */

import { addDays, addHours, addMinutes, set } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import type { ParsedReminder, Recurrence } from '../../shared/types/reminder';

// =============================================================================
// Patterns
// =============================================================================

interface RecurrenceRule {
  pattern: RegExp;
  toRecurrence: (match: RegExpMatchArray) => Recurrence | null;
}

const RECURRENCE_RULES: RecurrenceRule[] = [
  {
    pattern: /\bevery\s+(\d{1,3})\s+(day|week|month)s?\b/,
    toRecurrence: (match) => {
      const count = parseInt(match[1], 10);
      if (count < 1) return null;
      const unit = match[2] === 'day' ? 'days' : match[2] === 'week' ? 'weeks' : 'months';
      return { unit, count };
    },
  },
  { pattern: /\b(?:every\s+day|daily)\b/, toRecurrence: () => ({ unit: 'days', count: 1 }) },
  { pattern: /\b(?:every\s+week|weekly)\b/, toRecurrence: () => ({ unit: 'weeks', count: 1 }) },
  { pattern: /\b(?:every\s+month|monthly)\b/, toRecurrence: () => ({ unit: 'months', count: 1 }) },
];

const RELATIVE_PATTERN = /\bin\s+(\d{1,4})\s*(minutes?|mins?|hours?|hrs?)\b/;

const DAY_PATTERN = /\b(today|tomorrow)\b/;
const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];
const WEEKDAY_PATTERN = new RegExp(`\\b(?:(?:on|next)\\s+)?(${WEEKDAYS.join('|')})\\b`);

// A number followed by a duration word is a length of time, not a clock time
const NOT_A_DURATION = String.raw`(?!\s*(?:minutes?|mins?|hours?|hrs?|days?|weeks?|months?)\b)`;

/** "at 3pm", "by 15:30", "for 9 am" */
const PREFIXED_TIME_PATTERN = new RegExp(
  String.raw`\b(?:at|by|for)\s+(\d{1,2})(?::(\d{2}))?\s*([ap]m)?\b` + NOT_A_DURATION,
  'g'
);

/** "3pm", "15:30", "7:05 am" anywhere in the text */
const BARE_TIME_PATTERN = new RegExp(
  String.raw`\b(\d{1,2})(?::(\d{2}))?\s*([ap]m)?\b` + NOT_A_DURATION,
  'g'
);

const TRIGGER_PATTERNS = [
  /\b(?:please\s+)?remind\s+me(?:\s+(?:to|that|about))?\b/g,
  /\b(?:please\s+)?(?:set|create|add)\s+(?:an?\s+)?reminder(?:\s+(?:to|for|that|about))?\b/g,
];

/** Time used when only a day ("tomorrow", "friday") was given */
const DEFAULT_DAY_TIME = { hours: 9, minutes: 0 };

// =============================================================================
// Helpers
// =============================================================================

interface ClockTime {
  hours: number;
  minutes: number;
}

/**
 * Remove the span a match occupied, leaving a space so words don't fuse
 */
function cut(text: string, match: RegExpMatchArray): string {
  const start = match.index ?? 0;
  return `${text.slice(0, start)} ${text.slice(start + match[0].length)}`;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Convert hour/minute/period captures to a 24-hour clock time, or null when
 * they don't describe a real time of day
 */
function toClockTime(hourStr: string, minuteStr: string | undefined, period: string | undefined): ClockTime | null {
  let hours = parseInt(hourStr, 10);
  const minutes = minuteStr ? parseInt(minuteStr, 10) : 0;

  if (minutes > 59) return null;

  if (period) {
    if (hours < 1 || hours > 12) return null;
    if (period === 'pm' && hours < 12) {
      hours += 12;
    } else if (period === 'am' && hours === 12) {
      hours = 0;
    }
  } else if (hours > 23) {
    return null;
  }

  return { hours, minutes };
}

/**
 * Find the first time expression. Prefixed expressions win over bare ones;
 * a bare number only counts when it carries minutes or am/pm.
 */
function extractTime(text: string): { time: ClockTime; match: RegExpMatchArray } | null {
  for (const match of text.matchAll(PREFIXED_TIME_PATTERN)) {
    const time = toClockTime(match[1], match[2], match[3]);
    if (time) return { time, match };
  }

  for (const match of text.matchAll(BARE_TIME_PATTERN)) {
    if (!match[2] && !match[3]) continue;
    const time = toClockTime(match[1], match[2], match[3]);
    if (time) return { time, match };
  }

  return null;
}

/**
 * Days from `now` to the named day; weekdays resolve to the next strictly
 * future occurrence (1-7 days ahead)
 */
function extractDayOffset(text: string, now: UTCDate): { offset: number; match: RegExpMatchArray } | null {
  const dayMatch = text.match(DAY_PATTERN);
  if (dayMatch) {
    return { offset: dayMatch[1] === 'tomorrow' ? 1 : 0, match: dayMatch };
  }

  const weekdayMatch = text.match(WEEKDAY_PATTERN);
  if (weekdayMatch) {
    const target = WEEKDAYS.indexOf(weekdayMatch[1]);
    const offset = (target - now.getDay() + 7) % 7 || 7;
    return { offset, match: weekdayMatch };
  }

  return null;
}

/**
 * Strip trigger phrases and filler, leaving only what to remind about
 */
export function cleanReminderText(text: string): string {
  let cleaned = text;
  for (const pattern of TRIGGER_PATTERNS) {
    cleaned = cleaned.replace(pattern, ' ');
  }

  cleaned = collapseWhitespace(cleaned);
  cleaned = cleaned.replace(/^(?:(?:that|to)\b\s*)+/, '');
  cleaned = cleaned.replace(/^[\s.,!?]+|[\s.,!?]+$/g, '');
  return collapseWhitespace(cleaned);
}

// =============================================================================
// Parser
// =============================================================================

/**
 * Parse a natural-language reminder request
 *
 * @returns Structured reminder, or null when nothing is left to remind about
 *
 * Examples:
 * - "Remind me to call mom tomorrow at 3pm"
 * - "Remind me every day at 8am to take my medicine"
 * - "Remind me in 30 minutes to check the oven"
 */
export function parseReminderText(rawText: string, now: Date): ParsedReminder | null {
  const reference = new UTCDate(now.getTime());
  let working = collapseWhitespace(rawText.toLowerCase());

  let recurrence: Recurrence | null = null;
  for (const rule of RECURRENCE_RULES) {
    const match = working.match(rule.pattern);
    if (!match) continue;
    recurrence = rule.toRecurrence(match);
    working = working.replace(new RegExp(rule.pattern.source, 'g'), ' ');
    if (recurrence) break;
  }

  let dueTime: Date;
  const relative = working.match(RELATIVE_PATTERN);

  if (relative) {
    const amount = parseInt(relative[1], 10);
    const unit = relative[2];
    dueTime = unit.startsWith('h') ? addHours(reference, amount) : addMinutes(reference, amount);
    working = cut(working, relative);
  } else {
    const day = extractDayOffset(working, reference);
    if (day) {
      working = cut(working, day.match);
    }

    const extracted = extractTime(working);
    if (extracted) {
      working = cut(working, extracted.match);
    }

    if (!extracted && !day) {
      dueTime = addHours(reference, 1);
    } else {
      const time = extracted?.time ?? DEFAULT_DAY_TIME;
      let candidate = set(addDays(reference, day?.offset ?? 0), {
        hours: time.hours,
        minutes: time.minutes,
        seconds: 0,
        milliseconds: 0,
      });

      // Never schedule in the past
      if (candidate.getTime() <= reference.getTime()) {
        candidate = addDays(candidate, 1);
      }
      dueTime = candidate;
    }
  }

  const text = cleanReminderText(working);
  if (!text) {
    return null;
  }

  return {
    text,
    dueTime: new Date(dueTime.getTime()),
    recurrence,
  };
}
