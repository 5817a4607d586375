/**
 * Chime - Error Handling Utilities
 * Error taxonomy and global process error handler
 */

import { createModuleLogger } from './logger';

const errorLogger = createModuleLogger('Error');

// ============================================================================
// Custom Error Types
// ============================================================================

export class ChimeError extends Error {
  constructor(
    message: string,
    public code: string,
    public recoverable: boolean = true,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ChimeError';
    Error.captureStackTrace(this, ChimeError);
  }
}

export class ConfigError extends ChimeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', false, context);
    this.name = 'ConfigError';
  }
}

/**
 * Writing the reminder snapshot failed; in-memory state was left untouched
 */
export class PersistenceError extends ChimeError {
  constructor(
    message: string,
    public filePath: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'PERSISTENCE_ERROR', true, { filePath, ...context });
    this.name = 'PersistenceError';
  }
}

/**
 * The reminder snapshot could not be read back; the store boots empty
 */
export class StoreCorruptionError extends ChimeError {
  constructor(
    message: string,
    public filePath: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'STORE_CORRUPTION', true, { filePath, ...context });
    this.name = 'StoreCorruptionError';
  }
}

export class DispatchError extends ChimeError {
  constructor(
    message: string,
    public sink: 'alert' | 'speech' | 'toast',
    context?: Record<string, unknown>
  ) {
    super(message, `DISPATCH_${sink.toUpperCase()}_ERROR`, true, context);
    this.name = 'DispatchError';
  }
}

/**
 * Extract a readable message from anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Normalize anything that was thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// Global Error Handler
// ============================================================================

interface GlobalErrorHandlerOptions {
  exitOnCritical?: boolean;
  saveState?: () => Promise<void>;
}

let globalErrorHandlerInstalled = false;
let globalOptions: GlobalErrorHandlerOptions = {};
const isDev = process.env.NODE_ENV === 'development';

/**
 * Install global error handlers for the process
 */
export function installGlobalErrorHandler(options: GlobalErrorHandlerOptions = {}): void {
  if (globalErrorHandlerInstalled) {
    errorLogger.warn('Global error handler already installed');
    return;
  }

  globalOptions = {
    exitOnCritical: !isDev, // Don't exit in dev mode
    ...options,
  };

  process.on('uncaughtException', (error: Error) => {
    errorLogger.logError(error, 'Uncaught Exception');

    void handleCriticalError(error);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    const error = toError(reason);

    errorLogger.error('Unhandled Promise Rejection', {
      message: error.message,
      stack: error.stack,
      reason: String(reason),
    });

    // Only unrecoverable Chime errors take the process down
    if (error instanceof ChimeError && !error.recoverable) {
      void handleCriticalError(error);
    }
  });

  process.on('warning', (warning: Error) => {
    errorLogger.warn('Process Warning', {
      message: warning.message,
      name: warning.name,
    });
  });

  globalErrorHandlerInstalled = true;
  errorLogger.info('Global error handler installed');
}

/**
 * Handle critical errors that require a restart
 */
async function handleCriticalError(error: Error): Promise<void> {
  if (globalOptions.saveState) {
    try {
      await globalOptions.saveState();
      errorLogger.info('State saved before crash');
    } catch (saveError) {
      errorLogger.error('Failed to save state before crash', {
        message: getErrorMessage(saveError),
      });
    }
  }

  if (globalOptions.exitOnCritical) {
    errorLogger.error('Exiting due to critical error', { message: error.message });
    process.exit(1);
  }
}
