/**
 * @fileoverview Public API exports for @iqbridge/logger
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers, describeError } from './errorHandler.js';

export {
  generateRequestId,
  getRequestContext,
  getRequestId,
  withRequestContext,
} from './request-context.js';

export { startTimer, measureAsync } from './perf-timer.js';

export { MemoryTransport, createMemoryLogger } from './memory-transport.js';

export { redactValue } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, LogEntry, ChildLoggerContext } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
