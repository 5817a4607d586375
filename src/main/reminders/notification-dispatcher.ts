/**
 * Chime - Notification Dispatcher
 * Presents a due reminder through the visual-alert and speech sinks
 */

import { format } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import { createModuleLogger } from '../utils/logger';
import { DispatchError, getErrorMessage } from '../utils/errors';
import { NotificationLedger, occurrenceKey } from './notification-ledger';
import type { DispatchOutcome, Reminder } from '../../shared/types/reminder';

const logger = createModuleLogger('NotificationDispatcher');

/**
 * Shows a modal or toast
 */
export type AlertSink = (title: string, body: string) => Promise<void> | void;

/**
 * Renders text as audio
 */
export type SpeechSink = (text: string) => Promise<void> | void;

export interface NotificationSinks {
  alert: AlertSink;
  /** Omit to keep reminders silent */
  speech?: SpeechSink;
}

export interface ReminderPresentation {
  title: string;
  body: string;
  utterance: string;
}

/**
 * Text shown and spoken for a reminder
 */
export function presentReminder(reminder: Reminder): ReminderPresentation {
  const dueLabel = format(new UTCDate(reminder.dueTime.getTime()), 'yyyy-MM-dd HH:mm');
  return {
    title: `Reminder: ${reminder.text}`,
    body: `Time: ${dueLabel}\n${reminder.text}`,
    utterance: `Reminder: ${reminder.text}`,
  };
}

export class NotificationDispatcher {
  constructor(
    private readonly sinks: NotificationSinks,
    private readonly ledger: NotificationLedger
  ) {}

  /**
   * Present a reminder unless it was already presented inside the dedup
   * window. Never throws: sink failures are logged and reported as 'failed'.
   */
  async dispatch(reminder: Reminder, now: Date): Promise<DispatchOutcome> {
    this.ledger.prune(now);
    if (!this.ledger.claim(occurrenceKey(reminder), now)) {
      logger.debug('Suppressing duplicate notification', { id: reminder.id });
      return 'suppressed';
    }

    const presentation = presentReminder(reminder);
    const failures: DispatchError[] = [];

    try {
      await this.sinks.alert(presentation.title, presentation.body);
    } catch (error) {
      failures.push(new DispatchError(getErrorMessage(error), 'alert', { id: reminder.id }));
    }

    if (this.sinks.speech) {
      try {
        await this.sinks.speech(presentation.utterance);
      } catch (error) {
        failures.push(new DispatchError(getErrorMessage(error), 'speech', { id: reminder.id }));
      }
    }

    if (failures.length > 0) {
      for (const failure of failures) {
        logger.error('Error showing reminder', {
          code: failure.code,
          message: failure.message,
          ...failure.context,
        });
      }
      return 'failed';
    }

    logger.info('Reminder delivered', { id: reminder.id });
    return 'delivered';
  }
}
