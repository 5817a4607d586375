#!/usr/bin/env tsx
/**
 * Chime CLI
 *
 * Works directly on the reminders file the daemon uses; a running daemon
 * reloads the file when it changes. `chime run` starts the daemon itself.
 *
 * @example
 * ```bash
 * chime add remind me to stretch at 3pm
 * chime schedule --text "pay rent" --due 2024-02-01T09:00:00Z --every months
 * chime list --limit 5
 * chime snooze 0190f1d2-... 15
 * chime run
 * ```
 */

import { Command } from 'commander';
import { format } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import { getConfig } from '../main/config';
import { getErrorMessage } from '../main/utils/errors';
import { shutdownLogger } from '../main/utils/logger';
import { runDaemon } from '../main';
import { ReminderService, ReminderStore } from '../main/reminders';
import { describeRecurrence } from '../main/reminders/recurrence';
import { parseDueTime, parseInterval, parsePositiveInt } from './utils/options';
import type { Recurrence, Reminder } from '../shared/types/reminder';

// =============================================================================
// CLI Setup
// =============================================================================

const program = new Command();

program
  .name('chime')
  .description('Chime - reminders from the command line')
  .version('1.0.0')
  .option('-f, --file <path>', 'Reminders file (default: from configuration)');

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Service over a freshly loaded store
 */
async function openService(): Promise<ReminderService> {
  const opts = program.opts<{ file?: string }>();
  const store = new ReminderStore(opts.file ?? getConfig().remindersFile);
  await store.load();
  return new ReminderService(store);
}

/**
 * Run an action, reporting failures on stderr with a non-zero exit code
 */
async function withService(action: (service: ReminderService) => Promise<void>): Promise<void> {
  try {
    await action(await openService());
  } catch (error) {
    console.error('Error:', getErrorMessage(error));
    process.exitCode = 1;
  } finally {
    await shutdownLogger();
  }
}

function formatInstant(date: Date): string {
  return format(new UTCDate(date.getTime()), 'yyyy-MM-dd HH:mm');
}

/**
 * Format table output
 */
function formatTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => {
    const maxRow = rows.reduce((max, row) => Math.max(max, (row[i] || '').length), 0);
    return Math.max(h.length, maxRow);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  console.log(headerLine);
  console.log('-'.repeat(headerLine.length));

  for (const row of rows) {
    console.log(row.map((cell, i) => (cell || '').padEnd(widths[i])).join('  '));
  }
}

function printReminders(reminders: Reminder[], emptyMessage: string): void {
  if (reminders.length === 0) {
    console.log(emptyMessage);
    return;
  }

  formatTable(
    ['ID', 'DUE (UTC)', 'REPEATS', 'TEXT'],
    reminders.map((r) => [r.id, formatInstant(r.dueTime), describeRecurrence(r.recurrence).trim() || '-', r.text])
  );
}

// =============================================================================
// Reminder Commands
// =============================================================================

program
  .command('add <text...>')
  .description('Add a reminder from natural language, e.g. "remind me to call mom at 3pm"')
  .action((words: string[]) =>
    withService(async (service) => {
      const id = await service.addFromText(words.join(' '));
      if (!id) {
        console.error("Couldn't find anything to remind you about.");
        process.exitCode = 1;
        return;
      }
      const reminder = await service.get(id);
      if (reminder) {
        console.log(`Added ${id}: ${reminder.text} at ${formatInstant(reminder.dueTime)} UTC`);
      }
    })
  );

program
  .command('schedule')
  .description('Add a reminder with an exact due time')
  .requiredOption('-t, --text <text>', 'Reminder text')
  .requiredOption('-d, --due <instant>', 'Due time (ISO 8601 with offset)', parseDueTime)
  .option('-e, --every <interval>', 'Repeat interval: days, weeks or months, optionally ":N"', parseInterval)
  .action((options: { text: string; due: Date; every?: Recurrence }) =>
    withService(async (service) => {
      const id = await service.addStructured(options.text, options.due, options.every ?? null);
      console.log(`Scheduled ${id}`);
    })
  );

program
  .command('list')
  .description('List upcoming reminders')
  .option('-n, --limit <n>', 'Maximum number of reminders', parsePositiveInt, 10)
  .action((options: { limit: number }) =>
    withService(async (service) => {
      printReminders(await service.upcoming(options.limit), 'No upcoming reminders');
    })
  );

program
  .command('due')
  .description('List reminders that are due now')
  .action(() =>
    withService(async (service) => {
      printReminders(await service.dueNow(), 'Nothing is due');
    })
  );

program
  .command('cancel <id>')
  .description('Delete a reminder')
  .action((id: string) =>
    withService(async (service) => {
      if (await service.cancel(id)) {
        console.log(`Reminder ${id} cancelled`);
      } else {
        console.error(`Reminder ${id} not found`);
        process.exitCode = 1;
      }
    })
  );

program
  .command('snooze <id> <minutes>')
  .description('Push a reminder back by some minutes')
  .action((id: string, minutes: string) =>
    withService(async (service) => {
      const reminder = await service.snooze(id, parsePositiveInt(minutes));
      if (!reminder) {
        console.error(`Reminder ${id} not found`);
        process.exitCode = 1;
        return;
      }
      console.log(`Reminder ${id} now due at ${formatInstant(reminder.dueTime)} UTC`);
    })
  );

program
  .command('clear-completed')
  .description('Remove completed reminders')
  .action(() =>
    withService(async (service) => {
      const removed = await service.clearCompleted();
      console.log(`Removed ${removed} completed reminder${removed === 1 ? '' : 's'}`);
    })
  );

program
  .command('stats')
  .description('Show reminder counts')
  .action(() =>
    withService(async (service) => {
      console.log(JSON.stringify(await service.stats(), null, 2));
    })
  );

program
  .command('run')
  .description('Run the reminder daemon until interrupted')
  .action(async () => {
    const opts = program.opts<{ file?: string }>();
    const config = getConfig();
    await runDaemon(opts.file ? { ...config, remindersFile: opts.file } : config);
  });

// =============================================================================
// Parse and Execute
// =============================================================================

if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error('Error:', getErrorMessage(error));
    process.exitCode = 1;
  });
}
