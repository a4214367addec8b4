/**
 * @fileoverview In-memory Winston transport.
 * Keeps recent log entries for inspection, e.g. by tests or a status endpoint.
 */

import Transport from 'winston-transport';
import winston from 'winston';
import type { LogEntry, LogLevel, Logger } from './types.js';

const DEFAULT_CAPACITY = 1000;

export class MemoryTransport extends Transport {
  readonly entries: LogEntry[] = [];
  private readonly capacity: number;

  constructor(options: Transport.TransportStreamOptions & { capacity?: number } = {}) {
    super(options);
    this.capacity = options.capacity ?? DEFAULT_CAPACITY;
  }

  override log(info: LogEntry, next: () => void): void {
    this.entries.push(info);
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
    next();
  }

  /**
   * Entries at `level` whose message equals `message`.
   */
  find(level: LogLevel, message: string): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level && entry.message === message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * A logger that writes only to a {@link MemoryTransport}.
 *
 * @example
 * ```typescript
 * const { logger, memory } = createMemoryLogger('debug');
 * stream.registerLiveBarObserver(() => { throw new Error('boom'); });
 * // ...
 * expect(memory.find('error', 'Bar observer failed')).toHaveLength(1);
 * ```
 */
export function createMemoryLogger(level: LogLevel = 'debug'): {
  logger: Logger;
  memory: MemoryTransport;
} {
  const memory = new MemoryTransport({ level });
  const logger = winston.createLogger({
    level,
    format: winston.format.combine(winston.format.errors({ stack: true })),
    transports: [memory],
    exitOnError: false,
  });
  return { logger, memory };
}
