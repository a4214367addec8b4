/**
 * @fileoverview Custom Winston formats.
 * Includes secret redaction, standard fields, request ID injection and pretty output.
 */

import { format } from 'winston';
import { getRequestId } from './request-context.js';

/**
 * Metadata keys whose values must never reach a log sink.
 * Matches are case-insensitive.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/** Winston-owned keys that are never redacted */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label']);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with every sensitive key replaced, recursively.
 *
 * @example
 * ```typescript
 * redactValue({ host: 'feed', password: 'test-secret' });
 * // { host: 'feed', password: '[REDACTED]' }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  // Errors keep their identity so format.errors() can still read the stack
  if (value instanceof Error) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    result[key] = isSensitiveKey(key) ? REDACTED : redactValue(nested);
  }
  return result;
}

/**
 * Winston format that redacts sensitive metadata.
 * Must be applied first in the chain.
 *
 * @example
 * ```typescript
 * logger.info('Upstream configured', { host: 'feed', apiKey: 'test-secret' });
 * // {"level":"info","message":"Upstream configured","host":"feed","apiKey":"[REDACTED]"}
 * ```
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveKey(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * Winston format that adds the timestamp, error stacks, and the request_id of
 * the active request context, if any.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const requestId = getRequestId();
    if (requestId && !info['request_id']) {
      info['request_id'] = requestId;
    }
    return info;
  })()
);

/**
 * Human-readable output for development.
 *
 * @example
 * ```typescript
 * // [2024-03-04T15:30:00.000Z] info: Live bar delivered component=bar-stream ticker=AAPL
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, ticker, request_id, stack, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (ticker) context.push(`ticker=${String(ticker)}`);
    if (request_id) context.push(`request_id=${String(request_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (key === 'splat') {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    if (stack) {
      return `${baseMsg}\n${String(stack)}`;
    }

    return baseMsg;
  })
);
