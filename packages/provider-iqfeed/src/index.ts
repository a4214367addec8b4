/**
 * @fileoverview Public API of @iqbridge/provider-iqfeed.
 *
 * @module @iqbridge/provider-iqfeed
 */

export { IQFeedConnection } from './connection.js';
export { BarStream } from './bar-stream.js';
export type { BarObserver } from './bar-stream.js';
export { HistoryClient } from './history-client.js';
export { LineSocket } from './line-socket.js';
export type { LineRead } from './line-socket.js';

export { ConnectionState, TerminationStyle, HandlerResult } from './types.js';
export type { ConnectionOptions, LineHandler, MessageClassifier } from './types.js';

export {
  formatDate,
  formatDateTime,
  formatTimestamp,
  getField,
  parseClockTime,
  parseCompactDate,
  parseDate,
  parseFloatField,
  parseIntField,
  parseTimestamp,
  splitFields,
  toDateTime,
} from './field-codec.js';
export { parseStreamBar, parseHistoryBar, parseDailyBar } from './parser.js';

export * from './constants.js';

export {
  NoDataError,
  ServerError,
  MalformedFieldError,
  ProtocolUsageError,
  RequestTimeoutError,
  ConnectionClosedError,
  isNoDataError,
  isServerError,
  isMalformedFieldError,
  isProtocolUsageError,
  isRequestTimeoutError,
  isConnectionClosedError,
} from './errors.js';
