/**
 * Chime - Reminder Service Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

vi.mock('../src/main/utils/logger', () => ({
  createModuleLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    logError: vi.fn(),
  }),
}));

import { ReminderStore } from '../src/main/reminders/reminder-store';
import { formatDueTime, REPLIES, ReminderService } from '../src/main/reminders/reminder-service';

// Monday
const NOW = new Date('2024-01-01T10:00:00Z');

describe('ReminderService', () => {
  let dir: string;
  let store: ReminderStore;
  let service: ReminderService;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'chime-service-'));
    store = new ReminderStore(join(dir, 'reminders.json'));
    await store.load();
    service = new ReminderService(store, () => NOW);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('formats due times for replies', () => {
    expect(formatDueTime(new Date('2024-01-02T15:00:00Z'))).toBe('03:00 PM on Tuesday, January 02');
  });

  describe('commands', () => {
    it('adds reminders from free text', async () => {
      const id = await service.addFromText('remind me to call mom tomorrow at 3pm');

      expect(id).not.toBeNull();
      const stored = id ? await service.get(id) : null;
      expect(stored?.text).toBe('call mom');
      expect(stored?.dueTime).toEqual(new Date('2024-01-02T15:00:00Z'));
      expect(stored?.createdAt).toEqual(NOW);
    });

    it('returns null for text with nothing to remind about', async () => {
      expect(await service.addFromText('remind me at 9am')).toBeNull();
      expect(await service.upcoming()).toEqual([]);
    });

    it('accepts structured reminders already in the past', async () => {
      const id = await service.addStructured('renew passport', new Date('2023-12-31T00:00:00Z'));

      expect((await service.dueNow()).map((r) => r.id)).toEqual([id]);
    });

    it('rejects structured reminders without text', async () => {
      await expect(service.addStructured('  ', NOW)).rejects.toMatchObject({ code: 'INVALID_REMINDER' });
    });

    it('cancels and snoozes reminders', async () => {
      const id = await service.addStructured('stretch', new Date('2024-01-01T09:30:00Z'));

      expect((await service.snooze(id, 10))?.dueTime).toEqual(new Date('2024-01-01T10:10:00Z'));
      expect(await service.cancel(id)).toBe(true);
      expect(await service.cancel(id)).toBe(false);
    });

    it('reports stats as of the clock', async () => {
      await service.addStructured('overdue', new Date('2024-01-01T09:00:00Z'));
      await service.addStructured('soon', new Date('2024-01-01T11:00:00Z'), { unit: 'days', count: 1 });

      expect(await service.stats()).toEqual({
        total: 2,
        overdue: 1,
        upcoming: 1,
        completed: 0,
        recurring: 1,
      });
    });
  });

  describe('handleUtterance', () => {
    it('confirms a new reminder', async () => {
      expect(await service.handleUtterance('Remind me to call mom tomorrow at 3pm')).toBe(
        "I'll remind you to call mom at 03:00 PM on Tuesday, January 02."
      );
    });

    it('mentions the recurrence in the confirmation', async () => {
      expect(await service.handleUtterance('Remind me every day at 8am to take my medicine')).toBe(
        "I'll remind you to take my medicine every day at 08:00 AM on Tuesday, January 02."
      );
    });

    it('lists upcoming reminders', async () => {
      expect(await service.handleUtterance('what are my reminders')).toBe(REPLIES.noReminders);

      await service.handleUtterance('remind me to call mom tomorrow at 3pm');
      await service.handleUtterance('remind me every day at 8am to take my medicine');

      expect(await service.handleUtterance('List my reminders please')).toBe(
        [
          'Here are your upcoming reminders:',
          '1. take my medicine at 08:00 AM on Tuesday, January 02',
          '2. call mom at 03:00 PM on Tuesday, January 02',
        ].join('\n')
      );
    });

    it('apologizes when the details cannot be parsed', async () => {
      expect(await service.handleUtterance('remind me at 9am')).toBe(REPLIES.parseFailure);
    });

    it('ignores unrelated utterances', async () => {
      expect(await service.handleUtterance("what's the weather like")).toBeNull();
    });

    it('warns about save failures once, then briefly', async () => {
      const blocker = join(dir, 'blocker');
      await writeFile(blocker, '');
      const blockedStore = new ReminderStore(join(blocker, 'reminders.json'));
      await blockedStore.load();
      const blocked = new ReminderService(blockedStore, () => NOW);

      expect(await blocked.handleUtterance('remind me to stretch')).toBe(REPLIES.saveFailure);
      expect(await blocked.handleUtterance('remind me to drink water')).toBe(REPLIES.saveStillFailing);
    });
  });
});
