/**
 * @fileoverview Standardized error handling utilities.
 *
 * Provides consistent error patterns across the relay:
 * - AppError: Base class for application-specific errors
 * - Typed subclasses for each failure the pipeline distinguishes
 * - safeExecute: Returns result objects instead of throwing
 */

import { createLogger } from './observability/index.js';

const logger = createLogger({ domain: 'errors' });

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Missing or invalid environment configuration. Fatal before any I/O. */
export class ConfigError extends AppError {
  constructor(public readonly problems: string[]) {
    super(`Configuration validation failed:\n  - ${problems.join('\n  - ')}`, 'CONFIG_INVALID', false, { problems });
    this.name = 'ConfigError';
  }
}

/** A "From" header that is not of the form `<digits>@<domain>`. */
export class MalformedAddressError extends AppError {
  constructor(public readonly address: string) {
    super(`Malformed gateway address: ${address}`, 'MALFORMED_ADDRESS', true);
    this.name = 'MalformedAddressError';
  }
}

/** A carrier id or gateway domain absent from the carrier directory. */
export class UnknownCarrierError extends AppError {
  constructor(public readonly carrier: string) {
    super(`Unknown carrier: ${carrier}`, 'UNKNOWN_CARRIER', true, { carrier });
    this.name = 'UnknownCarrierError';
  }
}

export type NoMessagesReason = 'mailbox-empty' | 'all-filtered';

/** Nothing to process this run. Distinguishes an empty selection from one filtered to nothing. */
export class NoMessagesFoundError extends AppError {
  constructor(public readonly reason: NoMessagesReason, public readonly inspected: number = 0) {
    super(
      reason === 'mailbox-empty'
        ? 'No messages matched the selection'
        : `No usable messages among ${inspected} selected`,
      'NO_MESSAGES_FOUND',
      true,
      { reason, inspected }
    );
    this.name = 'NoMessagesFoundError';
  }
}

/** The message store could not be opened or written. */
export class StoreUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'STORE_UNAVAILABLE', false, {
      cause: cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause),
    });
    this.name = 'StoreUnavailableError';
  }
}

/**
 * Result type for operations that may fail.
 * Prefer this over try-catch when callers need to handle both cases.
 */
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Execute an async function and return a Result object.
 * Use for operations where the caller wants to handle failure without exceptions.
 */
export async function safeExecute<T>(
  fn: () => Promise<T>,
  context: string
): Promise<Result<T>> {
  try {
    const data = await fn();
    return { success: true, data };
  } catch (error) {
    logger.error('operation_failed', { operation: context, error: errorMessage(error) });
    return { success: false, error: errorMessage(error) };
  }
}
