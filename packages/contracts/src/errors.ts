/**
 * @fileoverview Base error class for the iqbridge packages.
 *
 * Every error raised by a feed component carries a machine-readable code,
 * a structured data payload and the moment it was created, so callers can
 * branch on `code` and log `toJSON()` without string matching.
 *
 * @module @iqbridge/contracts/errors
 */

/**
 * Base error class for all feed errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new FeedError('CUSTOM_ERROR', 'Something went wrong', { ticker: 'AAPL' });
 * ```
 */
export class FeedError extends Error {
  /**
   * Machine-readable error code (e.g., 'IQFEED_NO_DATA').
   */
  readonly code: string;

  /**
   * Structured error data for debugging and caller decisions.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when the error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'FeedError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace?.(this, new.target);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Type guard to check if an error is a FeedError.
 *
 * @example
 * ```typescript
 * try {
 *   await history.requestBarsInPeriod('AAPL', start, end, 60);
 * } catch (err) {
 *   if (isFeedError(err)) {
 *     logger.error('Feed request failed', { code: err.code, data: err.data });
 *   }
 * }
 * ```
 */
export function isFeedError(error: unknown): error is FeedError {
  return error instanceof FeedError;
}
