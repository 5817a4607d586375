/**
 * Chime - Reminder System Wiring Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
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

import { createReminderSystem } from '../src/main/reminders';
import { ConfigError } from '../src/main/utils/errors';

const NOW = new Date('2024-01-01T10:00:00Z');

describe('createReminderSystem', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'chime-system-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('fires a reminder once even with the tray watcher running', async () => {
    const remindersFile = join(dir, 'reminders.json');
    const alert = vi.fn();
    const toast = vi.fn();
    const system = createReminderSystem({
      remindersFile,
      sinks: { alert },
      toast,
      pollIntervalMs: 20,
      trayPollIntervalMs: 20,
      clock: () => NOW,
    });

    await system.start();
    const id = await system.service.addStructured('stand up', new Date('2024-01-01T09:59:00Z'));

    await vi.waitFor(async () => expect((await system.store.get(id))?.completed).toBe(true));
    await system.stop();

    expect(alert.mock.calls.length + toast.mock.calls.length).toBe(1);
    const onDisk = JSON.parse(await readFile(remindersFile, 'utf-8'));
    expect(onDisk[id].completed).toBe(true);
  });

  it('refuses non-positive timings', () => {
    const build = (): unknown =>
      createReminderSystem({
        remindersFile: join(dir, 'r.json'),
        sinks: { alert: vi.fn() },
        dedupWindowMs: 0,
      });

    expect(build).toThrow(ConfigError);
    expect(build).toThrow('dedupWindowMs must be a positive number of milliseconds');
  });

  it('leaves the tray watcher out without a toast sink', () => {
    const system = createReminderSystem({ remindersFile: join(dir, 'r.json'), sinks: { alert: vi.fn() } });

    expect(system.trayWatcher).toBeNull();
  });
});
