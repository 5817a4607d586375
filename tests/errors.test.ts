/**
 * Chime - Error Handling Tests
 */

import { describe, it, expect, vi } from 'vitest';

vi.mock('../src/main/utils/logger', () => ({
  createModuleLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    logError: vi.fn(),
  }),
}));

import {
  ChimeError,
  ConfigError,
  DispatchError,
  PersistenceError,
  StoreCorruptionError,
  getErrorMessage,
  toError,
} from '../src/main/utils/errors';

describe('Error Classes', () => {
  it('should create ChimeError with correct properties', () => {
    const error = new ChimeError('Test error', 'TEST_CODE', true, { key: 'value' });

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.recoverable).toBe(true);
    expect(error.context).toEqual({ key: 'value' });
    expect(error.name).toBe('ChimeError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should make ConfigError unrecoverable', () => {
    const error = new ConfigError('bad config');

    expect(error.code).toBe('CONFIG_ERROR');
    expect(error.recoverable).toBe(false);
    expect(error.name).toBe('ConfigError');
  });

  it('should carry the file path on store errors', () => {
    const persistence = new PersistenceError('disk full', '/data/reminders.json', { attempt: 2 });
    const corruption = new StoreCorruptionError('bad json', '/data/reminders.json');

    expect(persistence.code).toBe('PERSISTENCE_ERROR');
    expect(persistence.context).toEqual({ filePath: '/data/reminders.json', attempt: 2 });
    expect(corruption.code).toBe('STORE_CORRUPTION');
    expect(corruption.filePath).toBe('/data/reminders.json');
    expect(corruption).toBeInstanceOf(ChimeError);
  });

  it('should name the failing sink in DispatchError codes', () => {
    const error = new DispatchError('no display', 'alert', { id: 'r1' });

    expect(error.code).toBe('DISPATCH_ALERT_ERROR');
    expect(error.sink).toBe('alert');
    expect(error.recoverable).toBe(true);
  });
});

describe('Error helpers', () => {
  it('should extract messages from anything thrown', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain string')).toBe('plain string');
    expect(getErrorMessage(42)).toBe('42');
  });

  it('should normalize thrown values to Error', () => {
    const original = new Error('boom');

    expect(toError(original)).toBe(original);
    expect(toError('oops')).toEqual(new Error('oops'));
  });
});
