/**
 * Type definitions for the IQFeed provider.
 */

import type { Logger } from '@iqbridge/logger';

export enum ConnectionState {
  NOT_RUNNING = 'NOT_RUNNING',
  READING_MESSAGES = 'READING_MESSAGES',
}

/**
 * How the read loop reacts when no line arrives within the idle timeout.
 */
export enum TerminationStyle {
  /** Keep reading until disconnected */
  RUN_FOREVER = 'RUN_FOREVER',
  /** Stop reading at the first idle period */
  TERMINATE_ON_IDLE = 'TERMINATE_ON_IDLE',
}

export enum HandlerResult {
  HANDLED = 'HANDLED',
  UNKNOWN_MESSAGE = 'UNKNOWN_MESSAGE',
}

/**
 * Parses the fields of one result line into a record. The first field is the
 * ticker of the request, never the request id.
 */
export type LineHandler<T> = (fields: string[]) => T;

/**
 * Classifies and handles a line before it is matched against the request
 * table. Push-style messages carry no request id and are claimed here.
 */
export interface MessageClassifier {
  handleFields(fields: string[]): Promise<HandlerResult>;
}

/**
 * Options shared by every connection class.
 */
export interface ConnectionOptions {
  /** Parent logger; a console logger at `info` is used when omitted */
  logger?: Logger;

  /** Component name attached to every log entry */
  component?: string;

  /** Idle read timeout in milliseconds (default: 4000) */
  idleTimeoutMs?: number;

  /** Source of the request id jitter, returning values in [0, 1) */
  random?: () => number;
}
