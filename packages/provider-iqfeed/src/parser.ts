/**
 * Positional parsers for bar lines.
 *
 * Each parser takes the comma-split fields of one line and returns an
 * immutable record, or throws {@link MalformedFieldError}.
 */

import type { Bar, DailyBar } from '@iqbridge/contracts';
import { MalformedFieldError } from './errors.js';
import { getField, parseDate, parseFloatField, parseIntField, parseTimestamp } from './field-codec.js';

/** `requestId, tag, ticker, timestamp, open, high, low, close, totalVolume, intervalVolume, numTrades` */
export const STREAM_BAR_FIELD_COUNT = 11;

/** `ticker, timestamp, high, low, open, close, totalVolume, intervalVolume, numTrades` */
export const HISTORY_BAR_FIELD_COUNT = 9;

/** `ticker, date, high, low, open, close, intervalVolume, openInterest` */
export const DAILY_BAR_FIELD_COUNT = 8;

function expectFieldCount(fields: readonly string[], expected: number, kind: string): void {
  if (fields.length !== expected) {
    throw new MalformedFieldError(`Expected ${expected} fields in ${kind}, got ${fields.length}`, {
      line: fields.join(','),
    });
  }
}

/**
 * Drops the message-type field some server versions put after the request id.
 */
function withoutMessageType(fields: readonly string[], expected: number): readonly string[] {
  return fields.length === expected + 1 ? [getField(fields, 0), ...fields.slice(2)] : fields;
}

/**
 * Parses a pushed `BH` or `BC` line.
 *
 * @example
 * ```typescript
 * parseStreamBar(
 *   'B-AAPL-0060-s,BC,AAPL,2019-11-29 11:37:00,267.8,268,267.7,267.9,1502000,12000,85'.split(',')
 * ).close; // 267.9
 * ```
 */
export function parseStreamBar(fields: readonly string[]): Bar {
  expectFieldCount(fields, STREAM_BAR_FIELD_COUNT, 'bar push');
  const { date, time } = parseTimestamp(getField(fields, 3));
  return {
    ticker: getField(fields, 2),
    date,
    time,
    open: parseFloatField(getField(fields, 4), 'open'),
    high: parseFloatField(getField(fields, 5), 'high'),
    low: parseFloatField(getField(fields, 6), 'low'),
    close: parseFloatField(getField(fields, 7), 'close'),
    cumulativeVolume: parseIntField(getField(fields, 8), 'totalVolume'),
    intervalVolume: parseIntField(getField(fields, 9), 'intervalVolume'),
    numTrades: parseIntField(getField(fields, 10), 'numTrades'),
  };
}

/**
 * Parses one line of a bars-in-period result. The first field is the ticker.
 */
export function parseHistoryBar(fields: string[]): Bar {
  const record = withoutMessageType(fields, HISTORY_BAR_FIELD_COUNT);
  expectFieldCount(record, HISTORY_BAR_FIELD_COUNT, 'history bar');
  const { date, time } = parseTimestamp(getField(record, 1));
  return {
    ticker: getField(record, 0),
    date,
    time,
    high: parseFloatField(getField(record, 2), 'high'),
    low: parseFloatField(getField(record, 3), 'low'),
    open: parseFloatField(getField(record, 4), 'open'),
    close: parseFloatField(getField(record, 5), 'close'),
    cumulativeVolume: parseIntField(getField(record, 6), 'totalVolume'),
    intervalVolume: parseIntField(getField(record, 7), 'intervalVolume'),
    numTrades: parseIntField(getField(record, 8), 'numTrades'),
  };
}

/**
 * Parses one line of a daily-bar result. The first field is the ticker.
 */
export function parseDailyBar(fields: string[]): DailyBar {
  const record = withoutMessageType(fields, DAILY_BAR_FIELD_COUNT);
  expectFieldCount(record, DAILY_BAR_FIELD_COUNT, 'daily bar');
  return {
    ticker: getField(record, 0),
    date: parseDate(getField(record, 1)),
    high: parseFloatField(getField(record, 2), 'high'),
    low: parseFloatField(getField(record, 3), 'low'),
    open: parseFloatField(getField(record, 4), 'open'),
    close: parseFloatField(getField(record, 5), 'close'),
    intervalVolume: parseIntField(getField(record, 6), 'intervalVolume'),
    openInterest: parseIntField(getField(record, 7), 'openInterest'),
  };
}
