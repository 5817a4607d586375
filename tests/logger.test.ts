/**
 * Logger Tests
 * Note: Uses a silent winston instance so nothing touches the log directory
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import winston from 'winston';

describe('Logger Module', () => {
  let base: winston.Logger;

  beforeEach(() => {
    vi.resetModules();
    base = winston.createLogger({ silent: true });
  });

  it('should tag entries with the module name', async () => {
    const { ModuleLogger } = await import('../src/main/utils/logger');
    const log = vi.spyOn(base, 'log');
    const moduleLogger = new ModuleLogger(base, 'TestModule');

    moduleLogger.info('hello', { count: 2 });
    moduleLogger.warn('careful');

    expect(log).toHaveBeenNthCalledWith(1, 'info', 'hello', { module: 'TestModule', count: 2 });
    expect(log).toHaveBeenNthCalledWith(2, 'warn', 'careful', { module: 'TestModule' });
  });

  it('should log errors with their stack', async () => {
    const { ModuleLogger } = await import('../src/main/utils/logger');
    const log = vi.spyOn(base, 'log');
    const error = new Error('boom');

    new ModuleLogger(base, 'TestModule').logError(error, 'Saving failed');

    expect(log).toHaveBeenCalledWith('error', 'Saving failed: boom', {
      module: 'TestModule',
      stack: error.stack,
      name: 'Error',
    });
  });

  it('should stop writing once shutdown begins', async () => {
    const { ModuleLogger, shutdownLogger } = await import('../src/main/utils/logger');
    const log = vi.spyOn(base, 'log');
    const moduleLogger = new ModuleLogger(base, 'TestModule');

    await shutdownLogger();
    moduleLogger.error('dropped');

    expect(log).not.toHaveBeenCalled();
  });

  it('should report timings at debug level', async () => {
    const { ModuleLogger } = await import('../src/main/utils/logger');
    const log = vi.spyOn(base, 'log');

    const done = new ModuleLogger(base, 'TestModule').time('load');
    done();

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(
      'debug',
      'load completed',
      expect.objectContaining({ module: 'TestModule', duration: expect.stringMatching(/^\d+\.\d{2}ms$/) })
    );
  });
});
