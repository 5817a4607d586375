/**
 * Chime - Reminder Service
 * Command-facing API the dialogue layer, CLI and other callers use
 */

import { format } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import { createModuleLogger } from '../utils/logger';
import { ChimeError, PersistenceError } from '../utils/errors';
import { createReminder, ReminderStore } from './reminder-store';
import { parseReminderText } from './time-parser';
import { describeRecurrence } from './recurrence';
import type { Recurrence, Reminder, ReminderStats } from '../../shared/types/reminder';

const logger = createModuleLogger('ReminderService');

const ADD_TRIGGERS = ['remind me', 'set a reminder', 'set reminder'];
const LIST_TRIGGERS = ['what are my reminders', 'list my reminders', 'show my reminders'];

export const REPLIES = {
  parseFailure: "I couldn't understand the reminder details. Please try again.",
  saveFailure: "I couldn't save that reminder. Please check available disk space.",
  saveStillFailing: "I still can't save reminders right now.",
  noReminders: "You don't have any upcoming reminders.",
} as const;

/**
 * "03:00 PM on Tuesday, January 02"
 */
export function formatDueTime(dueTime: Date): string {
  return format(new UTCDate(dueTime.getTime()), "hh:mm a 'on' EEEE, MMMM dd");
}

export class ReminderService {
  private persistenceWarned = false;

  constructor(
    private readonly store: ReminderStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Parse free text and store the result
   *
   * @returns New reminder id, or null when the text held nothing to remind about
   */
  async addFromText(rawText: string, now: Date = this.clock()): Promise<string | null> {
    const parsed = parseReminderText(rawText, now);
    if (!parsed) {
      logger.debug('Could not parse reminder text', { rawText });
      return null;
    }

    const reminder = createReminder(parsed.text, parsed.dueTime, parsed.recurrence, now);
    const id = await this.store.add(reminder);

    logger.info('Reminder scheduled from text', {
      id,
      dueTime: parsed.dueTime.toISOString(),
      recurrence: parsed.recurrence ?? undefined,
    });
    return id;
  }

  /**
   * Store a reminder without parsing. Any due time is accepted, including
   * past ones, which fire on the next poll.
   */
  async addStructured(
    text: string,
    dueTime: Date,
    recurrence: Recurrence | null = null,
    now: Date = this.clock()
  ): Promise<string> {
    const trimmed = text.trim();
    if (!trimmed) {
      throw new ChimeError('Reminder text must not be empty', 'INVALID_REMINDER');
    }

    const id = await this.store.add(createReminder(trimmed, dueTime, recurrence, now));
    logger.info('Reminder scheduled', { id, dueTime: dueTime.toISOString() });
    return id;
  }

  async cancel(id: string): Promise<boolean> {
    const removed = await this.store.remove(id);
    if (removed) {
      logger.info('Reminder cancelled', { id });
    }
    return removed;
  }

  async snooze(id: string, minutes: number, now: Date = this.clock()): Promise<Reminder | null> {
    return this.store.snooze(id, minutes, now);
  }

  async clearCompleted(): Promise<number> {
    return this.store.clearCompleted();
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  async upcoming(limit = 10): Promise<Reminder[]> {
    return this.store.upcoming(limit);
  }

  async dueNow(now: Date = this.clock()): Promise<Reminder[]> {
    return this.store.due(now);
  }

  async get(id: string): Promise<Reminder | null> {
    return this.store.get(id);
  }

  async stats(now: Date = this.clock()): Promise<ReminderStats> {
    return this.store.stats(now);
  }

  // ===========================================================================
  // Dialogue surface
  // ===========================================================================

  /**
   * Answer reminder-related utterances from the dialogue layer
   *
   * @returns Spoken reply, or null when the utterance isn't about reminders
   */
  async handleUtterance(utterance: string, now: Date = this.clock()): Promise<string | null> {
    const command = utterance.toLowerCase();

    if (LIST_TRIGGERS.some((trigger) => command.includes(trigger))) {
      return this.describeUpcoming();
    }

    if (!ADD_TRIGGERS.some((trigger) => command.includes(trigger))) {
      return null;
    }

    let id: string | null;
    try {
      id = await this.addFromText(utterance, now);
      this.persistenceWarned = false;
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      logger.warn('Reminder could not be saved', { message: error.message });
      if (this.persistenceWarned) {
        return REPLIES.saveStillFailing;
      }
      this.persistenceWarned = true;
      return REPLIES.saveFailure;
    }

    const reminder = id ? await this.store.get(id) : null;
    if (!reminder) {
      return REPLIES.parseFailure;
    }

    return `I'll remind you to ${reminder.text}${describeRecurrence(reminder.recurrence)} at ${formatDueTime(reminder.dueTime)}.`;
  }

  private async describeUpcoming(): Promise<string> {
    const reminders = await this.store.upcoming(10);
    if (reminders.length === 0) {
      return REPLIES.noReminders;
    }

    const lines = reminders.map(
      (reminder, index) => `${index + 1}. ${reminder.text} at ${formatDueTime(reminder.dueTime)}`
    );
    return ['Here are your upcoming reminders:', ...lines].join('\n');
  }
}
