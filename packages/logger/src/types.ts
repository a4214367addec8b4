/**
 * @fileoverview Type definitions for the iqbridge logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Failures that lose data or a request
 * - 'warn': Conditions worth reviewing
 * - 'info': Normal lifecycle events (connect, disconnect, jobs)
 * - 'debug': Per-line protocol traffic
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/relay.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format instead of pretty-print.
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Optional file path for file transport, written in addition to console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;
}

/**
 * Structured log entry with the fields the feed components emit.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;

  /** Ticker symbol (e.g., "AAPL") */
  ticker?: string;

  /** Session correlation ID of a relay client */
  request_id?: string;

  /** Protocol request id echoed by the feed (e.g., "H_AAPL0000000042") */
  feed_request_id?: string;

  /** Component or module name (typically from child logger) */
  component?: string;

  /** Operation duration in milliseconds */
  duration_ms?: number;

  /** Number of items processed */
  count?: number;

  [key: string]: unknown;
}

/**
 * Child logger context fields.
 *
 * @example
 * ```typescript
 * const connLogger = logger.child({ component: 'history-client' });
 * connLogger.info('Connected'); // Includes component=history-client
 * ```
 */
export interface ChildLoggerContext {
  component?: string;
  ticker?: string;
  request_id?: string;
  [key: string]: unknown;
}

/**
 * Winston's Logger, re-exported so packages depend on this module only.
 */
export type Logger = WinstonLogger;
