/**
 * Error classes for the IQFeed provider.
 *
 * Each failure outcome of a feed request or connection operation has its own
 * class and code, so callers can tell an empty result from a vendor error or
 * a dropped connection without inspecting messages.
 */

import { FeedError } from '@iqbridge/contracts';

/**
 * Thrown when the feed reports that it has no data for a ticker or period.
 *
 * @example
 * ```typescript
 * try {
 *   await history.requestDailyBarForDate('AAPL', day);
 * } catch (err) {
 *   if (isNoDataError(err)) {
 *     return null;
 *   }
 *   throw err;
 * }
 * ```
 */
export class NoDataError extends FeedError {
  readonly ticker: string;

  constructor(ticker: string, data?: Record<string, unknown>) {
    super('IQFEED_NO_DATA', `No data for ${ticker}`, { ticker, ...data });
    this.name = 'NoDataError';
    this.ticker = ticker;
  }
}

/**
 * Thrown when the feed answers a request with its error marker.
 *
 * The message is the text the server sent in the third field.
 */
export class ServerError extends FeedError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('IQFEED_SERVER_ERROR', message, data);
    this.name = 'ServerError';
  }
}

/**
 * Thrown when a line or a single field cannot be interpreted.
 *
 * @example
 * ```typescript
 * throw new MalformedFieldError('Expected a number', {
 *   field: 'close',
 *   value: 'abc'
 * });
 * ```
 */
export class MalformedFieldError extends FeedError {
  constructor(
    message: string,
    data?: {
      field?: string;
      value?: string;
      line?: string;
      [key: string]: unknown;
    }
  ) {
    super('IQFEED_MALFORMED_FIELD', message, data);
    this.name = 'MalformedFieldError';
  }
}

/**
 * Thrown when a connection is used in a way its state does not allow:
 * connecting twice, sending while disconnected, or reusing a request id.
 */
export class ProtocolUsageError extends FeedError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('IQFEED_PROTOCOL_USAGE', message, data);
    this.name = 'ProtocolUsageError';
  }
}

/**
 * Thrown when a request is not answered within its deadline.
 */
export class RequestTimeoutError extends FeedError {
  readonly timeoutSeconds: number;

  constructor(requestId: string, timeoutSeconds: number) {
    super('IQFEED_TIMEOUT', `Request ${requestId} timed out after ${timeoutSeconds}s`, {
      requestId,
      timeoutSeconds,
    });
    this.name = 'RequestTimeoutError';
    this.timeoutSeconds = timeoutSeconds;
  }
}

/**
 * Thrown to every outstanding request when its connection goes away.
 */
export class ConnectionClosedError extends FeedError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('IQFEED_CONNECTION_CLOSED', message, data);
    this.name = 'ConnectionClosedError';
  }
}

export function isNoDataError(error: unknown): error is NoDataError {
  return error instanceof NoDataError;
}

export function isServerError(error: unknown): error is ServerError {
  return error instanceof ServerError;
}

export function isMalformedFieldError(error: unknown): error is MalformedFieldError {
  return error instanceof MalformedFieldError;
}

export function isProtocolUsageError(error: unknown): error is ProtocolUsageError {
  return error instanceof ProtocolUsageError;
}

/**
 * Type guard to check if an error is a RequestTimeoutError.
 *
 * @example
 * ```typescript
 * catch (err) {
 *   if (isRequestTimeoutError(err)) {
 *     logger.warn('History request timed out', { timeout: err.timeoutSeconds });
 *   }
 * }
 * ```
 */
export function isRequestTimeoutError(error: unknown): error is RequestTimeoutError {
  return error instanceof RequestTimeoutError;
}

export function isConnectionClosedError(error: unknown): error is ConnectionClosedError {
  return error instanceof ConnectionClosedError;
}
