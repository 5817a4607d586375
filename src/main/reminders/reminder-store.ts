/**
 * Chime - Reminder Store
 * Single owner of reminder state, mirrored to a JSON snapshot on every mutation
 *
 * Snapshots are written to a temp file and renamed over the target, so the
 * file on disk is always a complete snapshot. Mutations are applied to a copy
 * that only replaces the live map once the write succeeded.
 *
 * The daemon and CLI invocations share one file. Every operation first checks
 * whether the file changed since this store last read or wrote it, and reloads
 * it if so; a mutation then applies on top of the other process's writes.
 */

import { mkdir, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { addMinutes } from 'date-fns';
import { v7 as uuidv7 } from 'uuid';
import { z } from 'zod';
import { createModuleLogger } from '../utils/logger';
import { AsyncLock } from '../utils/async-lock';
import { ChimeError, PersistenceError, StoreCorruptionError, getErrorMessage } from '../utils/errors';
import {
  fromStoredInterval,
  isValidRecurrence,
  nextOccurrence,
  toStoredInterval,
} from './recurrence';
import type {
  Recurrence,
  Reminder,
  ReminderStats,
  StoredReminder,
} from '../../shared/types/reminder';

const logger = createModuleLogger('ReminderStore');

// =============================================================================
// Snapshot schema
// =============================================================================

const isoInstant = z
  .string()
  .datetime({ offset: true })
  .refine((value) => !Number.isNaN(Date.parse(value)), 'Invalid instant');

const positiveCount = z.number().int().positive();

const storedIntervalSchema = z.union([
  z.object({ days: positiveCount }).strict(),
  z.object({ weeks: positiveCount }).strict(),
  z.object({ months: positiveCount }).strict(),
]);

const storedReminderSchema = z
  .object({
    id: z.string().min(1),
    text: z.string(),
    due_time: isoInstant,
    created_at: isoInstant,
    completed: z.boolean().default(false),
    recurring: z.boolean().default(false),
    recurring_interval: storedIntervalSchema.nullish().transform((value) => value ?? null),
    last_triggered: isoInstant.nullish().transform((value) => value ?? null),
  })
  .refine((value) => value.recurring === (value.recurring_interval !== null), {
    message: 'recurring_interval must be present exactly when recurring is true',
  });

const snapshotSchema = z
  .record(z.string(), storedReminderSchema)
  .superRefine((record, ctx) => {
    for (const [key, value] of Object.entries(record)) {
      if (key !== value.id) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Key ${key} does not match reminder id ${value.id}`,
          path: [key],
        });
      }
    }
  });

// =============================================================================
// Serialization
// =============================================================================

export function serializeReminder(reminder: Reminder): StoredReminder {
  return {
    id: reminder.id,
    text: reminder.text,
    due_time: reminder.dueTime.toISOString(),
    created_at: reminder.createdAt.toISOString(),
    completed: reminder.completed,
    recurring: reminder.recurring,
    recurring_interval: reminder.recurrence ? toStoredInterval(reminder.recurrence) : null,
    last_triggered: reminder.lastTriggered ? reminder.lastTriggered.toISOString() : null,
  };
}

export function deserializeReminder(stored: StoredReminder): Reminder {
  return {
    id: stored.id,
    text: stored.text,
    dueTime: new Date(stored.due_time),
    createdAt: new Date(stored.created_at),
    completed: stored.completed,
    recurring: stored.recurring,
    recurrence: stored.recurring_interval ? fromStoredInterval(stored.recurring_interval) : null,
    lastTriggered: stored.last_triggered ? new Date(stored.last_triggered) : null,
  };
}

/**
 * Render the whole store as the human-diffable snapshot format
 */
export function serializeSnapshot(reminders: Iterable<Reminder>): string {
  const record: Record<string, StoredReminder> = {};
  for (const reminder of reminders) {
    record[reminder.id] = serializeReminder(reminder);
  }
  return `${JSON.stringify(record, null, 2)}\n`;
}

/**
 * Parse snapshot text; throws StoreCorruptionError on anything unreadable
 */
export function parseSnapshot(content: string, filePath: string): Reminder[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new StoreCorruptionError(`Reminder file is not valid JSON: ${getErrorMessage(error)}`, filePath);
  }

  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StoreCorruptionError('Reminder file does not match the snapshot format', filePath, {
      issues: parsed.error.issues.slice(0, 5).map((issue) => issue.message),
    });
  }

  return Object.values(parsed.data).map(deserializeReminder);
}

// =============================================================================
// Helpers
// =============================================================================

function cloneReminder(reminder: Reminder): Reminder {
  return {
    ...reminder,
    dueTime: new Date(reminder.dueTime.getTime()),
    createdAt: new Date(reminder.createdAt.getTime()),
    recurrence: reminder.recurrence ? { ...reminder.recurrence } : null,
    lastTriggered: reminder.lastTriggered ? new Date(reminder.lastTriggered.getTime()) : null,
  };
}

function byDueTime(a: Reminder, b: Reminder): number {
  return (
    a.dueTime.getTime() - b.dueTime.getTime() ||
    a.createdAt.getTime() - b.createdAt.getTime() ||
    a.id.localeCompare(b.id)
  );
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Build a new pending reminder with a fresh time-ordered id
 */
export function createReminder(
  text: string,
  dueTime: Date,
  recurrence: Recurrence | null,
  now: Date
): Reminder {
  return {
    id: uuidv7(),
    text,
    dueTime: new Date(dueTime.getTime()),
    createdAt: new Date(now.getTime()),
    completed: false,
    recurring: recurrence !== null,
    recurrence: recurrence ? { ...recurrence } : null,
    lastTriggered: null,
  };
}

function assertValidReminder(reminder: Reminder): void {
  if (!reminder.id) {
    throw new ChimeError('Reminder id must not be empty', 'INVALID_REMINDER');
  }
  if (!reminder.text.trim()) {
    throw new ChimeError('Reminder text must not be empty', 'INVALID_REMINDER', true, {
      id: reminder.id,
    });
  }
  if (Number.isNaN(reminder.dueTime.getTime())) {
    throw new ChimeError('Reminder due time is not a valid date', 'INVALID_REMINDER', true, {
      id: reminder.id,
    });
  }
  if (reminder.recurring !== (reminder.recurrence !== null)) {
    throw new ChimeError('Recurring reminders need exactly one interval', 'INVALID_REMINDER', true, {
      id: reminder.id,
    });
  }
  if (reminder.recurrence && !isValidRecurrence(reminder.recurrence)) {
    throw new ChimeError('Recurrence count must be a positive integer', 'INVALID_REMINDER', true, {
      id: reminder.id,
      count: reminder.recurrence.count,
    });
  }
}

// =============================================================================
// Store
// =============================================================================

/**
 * What a scheduler batch did to each fired reminder
 */
export interface FiredBatchResult {
  completed: string[];
  rescheduled: Array<{ id: string; dueTime: Date }>;
}

interface Mutation<T> {
  result: T;
  changed: boolean;
}

export class ReminderStore {
  private reminders: Map<string, Reminder> = new Map();
  private readonly lock = new AsyncLock();
  private writeCounter = 0;
  /** inode/size/mtime of the file as this store last saw it */
  private fileSignature: string | null = null;

  constructor(private readonly filePath: string) {}

  getFilePath(): string {
    return this.filePath;
  }

  // ===========================================================================
  // Loading & persistence
  // ===========================================================================

  /**
   * Replace in-memory state with the persisted snapshot.
   * A missing file yields an empty store; an unreadable one is moved aside
   * and also yields an empty store.
   *
   * @returns Number of reminders loaded
   */
  async load(): Promise<number> {
    return this.lock.runExclusive(async () => {
      let content: string;
      try {
        content = await readFile(this.filePath, 'utf-8');
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          logger.debug('No existing reminders file', { filePath: this.filePath });
          this.reminders = new Map();
          this.fileSignature = null;
          return 0;
        }
        logger.warn('Reminder file could not be read, starting with an empty store', {
          filePath: this.filePath,
          message: getErrorMessage(error),
        });
        this.reminders = new Map();
        return 0;
      }

      try {
        const loaded = parseSnapshot(content, this.filePath);
        this.reminders = new Map(loaded.map((reminder) => [reminder.id, reminder]));
        this.fileSignature = await this.readSignature();
      } catch (error) {
        if (!(error instanceof StoreCorruptionError)) throw error;
        logger.warn('Reminder file is corrupt, starting with an empty store', {
          message: error.message,
          ...error.context,
        });
        await this.quarantine();
        this.reminders = new Map();
        this.fileSignature = null;
        return 0;
      }

      logger.info('Loaded reminders from storage', { count: this.reminders.size });
      return this.reminders.size;
    });
  }

  /**
   * Move a corrupt snapshot aside so the next save doesn't destroy it
   */
  private async quarantine(): Promise<void> {
    const target = `${this.filePath}.corrupt-${Date.now()}`;
    try {
      await rename(this.filePath, target);
      logger.warn('Corrupt reminder file moved aside', { target });
    } catch (error) {
      logger.error('Failed to move corrupt reminder file aside', {
        message: getErrorMessage(error),
      });
    }
  }

  /**
   * Identity of the file currently on disk, or null when there is none we
   * can stat. Every snapshot write renames a fresh file into place, so the
   * inode alone changes on each write.
   */
  private async readSignature(): Promise<string | null> {
    try {
      const info = await stat(this.filePath);
      return `${info.ino}:${info.size}:${info.mtimeMs}`;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        logger.debug('Reminder file could not be checked', {
          filePath: this.filePath,
          message: getErrorMessage(error),
        });
      }
      return null;
    }
  }

  /**
   * Reload the snapshot when another process replaced it. An unreadable
   * replacement is ignored; the next write from this store supersedes it.
   */
  private async syncWithDisk(): Promise<void> {
    const signature = await this.readSignature();
    if (signature === null || signature === this.fileSignature) {
      return;
    }

    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      logger.warn('Changed reminder file could not be read', {
        filePath: this.filePath,
        message: getErrorMessage(error),
      });
      return;
    }

    this.fileSignature = signature;
    try {
      const loaded = parseSnapshot(content, this.filePath);
      this.reminders = new Map(loaded.map((reminder) => [reminder.id, reminder]));
      logger.info('Reloaded reminders changed by another process', { count: this.reminders.size });
    } catch (error) {
      if (!(error instanceof StoreCorruptionError)) throw error;
      logger.warn('Ignoring unreadable change to the reminder file', {
        message: error.message,
        ...error.context,
      });
    }
  }

  private async writeSnapshot(reminders: Map<string, Reminder>): Promise<void> {
    const tempPath = `${this.filePath}.tmp-${process.pid}-${++this.writeCounter}`;
    const content = serializeSnapshot(reminders.values());

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, content, 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      try {
        await rm(tempPath, { force: true });
      } catch (cleanupError) {
        logger.warn('Failed to remove temporary snapshot', {
          tempPath,
          message: getErrorMessage(cleanupError),
        });
      }
      throw new PersistenceError(
        `Failed to save reminders: ${getErrorMessage(error)}`,
        this.filePath
      );
    }

    this.fileSignature = await this.readSignature();
    logger.debug('Saved reminders to storage', { count: reminders.size });
  }

  /**
   * Run a mutation against a copy of the store. The copy replaces the live
   * map only after its snapshot hit the disk.
   */
  private async mutate<T>(fn: (draft: Map<string, Reminder>) => Mutation<T>): Promise<T> {
    return this.lock.runExclusive(async () => {
      await this.syncWithDisk();
      const draft = new Map<string, Reminder>();
      for (const [id, reminder] of this.reminders) {
        draft.set(id, cloneReminder(reminder));
      }

      const { result, changed } = fn(draft);
      if (changed) {
        await this.writeSnapshot(draft);
        this.reminders = draft;
      }
      return result;
    });
  }

  private async read<T>(fn: (reminders: Reminder[]) => T): Promise<T> {
    return this.lock.runExclusive(async () => {
      await this.syncWithDisk();
      return fn(Array.from(this.reminders.values()));
    });
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  async add(reminder: Reminder): Promise<string> {
    assertValidReminder(reminder);

    return this.mutate((draft) => {
      if (draft.has(reminder.id)) {
        throw new ChimeError(`Reminder ${reminder.id} already exists`, 'DUPLICATE_REMINDER');
      }
      draft.set(reminder.id, cloneReminder(reminder));
      return { result: reminder.id, changed: true };
    });
  }

  async remove(id: string): Promise<boolean> {
    return this.mutate((draft) => {
      const existed = draft.delete(id);
      return { result: existed, changed: existed };
    });
  }

  /**
   * Mark a reminder completed. A second call is a no-op that keeps the
   * original lastTriggered stamp.
   */
  async markCompleted(id: string, now: Date): Promise<boolean> {
    return this.mutate((draft) => {
      const reminder = draft.get(id);
      if (!reminder) return { result: false, changed: false };
      if (reminder.completed) return { result: true, changed: false };

      reminder.completed = true;
      reminder.lastTriggered = new Date(now.getTime());
      return { result: true, changed: true };
    });
  }

  /**
   * Apply the fire transition to a batch with a single snapshot write:
   * recurring reminders advance, the rest complete. Ids that were cancelled
   * or already moved past `now` are skipped.
   */
  async applyFiredBatch(ids: string[], now: Date): Promise<FiredBatchResult> {
    return this.mutate((draft) => {
      const outcome: FiredBatchResult = { completed: [], rescheduled: [] };

      for (const id of ids) {
        const reminder = draft.get(id);
        if (!reminder || reminder.completed) continue;
        if (reminder.dueTime.getTime() > now.getTime()) continue;

        reminder.lastTriggered = new Date(now.getTime());
        if (reminder.recurring && reminder.recurrence) {
          reminder.dueTime = nextOccurrence(reminder.dueTime, reminder.recurrence, now);
          reminder.completed = false;
          outcome.rescheduled.push({ id, dueTime: new Date(reminder.dueTime.getTime()) });
        } else {
          reminder.completed = true;
          outcome.completed.push(id);
        }
      }

      const changed = outcome.completed.length + outcome.rescheduled.length > 0;
      return { result: outcome, changed };
    });
  }

  /**
   * Push a reminder out to `now + minutes` and make it pending again.
   * Due times never move backwards, so snoozing a reminder that is already
   * due later than that changes nothing.
   *
   * @returns The reminder after snoozing, or null when it doesn't exist
   */
  async snooze(id: string, minutes: number, now: Date): Promise<Reminder | null> {
    if (!Number.isFinite(minutes) || minutes <= 0) {
      throw new ChimeError('Snooze minutes must be positive', 'INVALID_SNOOZE', true, { minutes });
    }

    return this.mutate((draft) => {
      const reminder = draft.get(id);
      if (!reminder) return { result: null, changed: false };

      const until = addMinutes(now, minutes);
      if (until.getTime() <= reminder.dueTime.getTime()) {
        return { result: cloneReminder(reminder), changed: false };
      }

      reminder.dueTime = new Date(until.getTime());
      reminder.completed = false;
      return { result: cloneReminder(reminder), changed: true };
    });
  }

  /**
   * Drop every completed reminder
   *
   * @returns Number of reminders removed
   */
  async clearCompleted(): Promise<number> {
    return this.mutate((draft) => {
      let removed = 0;
      for (const [id, reminder] of draft) {
        if (reminder.completed) {
          draft.delete(id);
          removed++;
        }
      }
      return { result: removed, changed: removed > 0 };
    });
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  async get(id: string): Promise<Reminder | null> {
    return this.read((reminders) => {
      const match = reminders.find((reminder) => reminder.id === id);
      return match ? cloneReminder(match) : null;
    });
  }

  /**
   * Pending reminders ordered by due time, soonest first
   */
  async upcoming(limit = 10): Promise<Reminder[]> {
    return this.read((reminders) =>
      reminders
        .filter((reminder) => !reminder.completed)
        .sort(byDueTime)
        .slice(0, Math.max(0, limit))
        .map(cloneReminder)
    );
  }

  /**
   * Pending reminders whose due time is at or before `now`
   */
  async due(now: Date): Promise<Reminder[]> {
    const cutoff = now.getTime();
    return this.read((reminders) =>
      reminders
        .filter((reminder) => !reminder.completed && reminder.dueTime.getTime() <= cutoff)
        .sort(byDueTime)
        .map(cloneReminder)
    );
  }

  async all(): Promise<Reminder[]> {
    return this.read((reminders) => reminders.slice().sort(byDueTime).map(cloneReminder));
  }

  async stats(now: Date): Promise<ReminderStats> {
    const cutoff = now.getTime();
    return this.read((reminders) => {
      const stats: ReminderStats = {
        total: reminders.length,
        overdue: 0,
        upcoming: 0,
        completed: 0,
        recurring: 0,
      };

      for (const reminder of reminders) {
        if (reminder.recurring) stats.recurring++;
        if (reminder.completed) {
          stats.completed++;
        } else if (reminder.dueTime.getTime() <= cutoff) {
          stats.overdue++;
        } else {
          stats.upcoming++;
        }
      }

      return stats;
    });
  }
}
