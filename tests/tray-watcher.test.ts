/**
 * Chime - Tray Watcher Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
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

import { ReminderStore, createReminder } from '../src/main/reminders/reminder-store';
import { NotificationLedger } from '../src/main/reminders/notification-ledger';
import { NotificationDispatcher } from '../src/main/reminders/notification-dispatcher';
import { TrayWatcher } from '../src/main/reminders/tray-watcher';

const NOW = new Date('2024-01-01T10:00:00Z');

describe('TrayWatcher', () => {
  let dir: string;
  let store: ReminderStore;
  let ledger: NotificationLedger;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'chime-tray-'));
    store = new ReminderStore(join(dir, 'reminders.json'));
    await store.load();
    ledger = new NotificationLedger();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('toasts due reminders once without completing them', async () => {
    const id = await store.add(createReminder('stand up', new Date('2024-01-01T09:59:00Z'), null, NOW));
    const toast = vi.fn();
    const watcher = new TrayWatcher(store, ledger, toast);

    expect(await watcher.checkNotifications(NOW)).toBe(1);
    expect(toast).toHaveBeenCalledWith('⏰ Reminder', 'stand up');

    expect(await watcher.checkNotifications(new Date('2024-01-01T10:01:00Z'))).toBe(0);
    expect((await store.get(id))?.completed).toBe(false);
  });

  it('shares the dedup ledger with the dispatcher', async () => {
    const reminder = createReminder('stand up', new Date('2024-01-01T09:59:00Z'), null, NOW);
    await store.add(reminder);
    const alert = vi.fn();
    const dispatcher = new NotificationDispatcher({ alert }, ledger);
    const watcher = new TrayWatcher(store, ledger, vi.fn());

    await watcher.checkNotifications(NOW);

    expect(await dispatcher.dispatch(reminder, NOW)).toBe('suppressed');
    expect(alert).not.toHaveBeenCalled();
  });

  it('reports toast failures as events', async () => {
    await store.add(createReminder('stand up', new Date('2024-01-01T09:59:00Z'), null, NOW));
    const watcher = new TrayWatcher(store, ledger, () => {
      throw new Error('tray gone');
    });
    const failed = vi.fn();
    watcher.on('toast:failed', failed);

    expect(await watcher.checkNotifications(NOW)).toBe(0);
    expect(failed).toHaveBeenCalledTimes(1);
    expect(failed.mock.calls[0][1]).toMatchObject({ code: 'DISPATCH_TOAST_ERROR', message: 'tray gone' });
  });

  it('summarizes upcoming reminders for the menu', async () => {
    await store.add(createReminder('call mom', new Date('2024-01-02T15:00:00Z'), null, NOW));
    await store.add(createReminder('stretch', new Date('2024-01-01T11:30:00Z'), null, NOW));
    const watcher = new TrayWatcher(store, ledger, vi.fn());

    expect(await watcher.summary()).toEqual(['2024-01-01 11:30: stretch', '2024-01-02 15:00: call mom']);
  });

  it('polls on its interval until stopped', async () => {
    await store.add(createReminder('stand up', new Date('2024-01-01T09:59:00Z'), null, NOW));
    const toast = vi.fn();
    const watcher = new TrayWatcher(store, ledger, toast, { pollIntervalMs: 20, clock: () => NOW });

    watcher.start();
    await vi.waitFor(() => expect(toast).toHaveBeenCalledTimes(1));
    await watcher.stop();

    expect(toast).toHaveBeenCalledTimes(1);
  });
});
