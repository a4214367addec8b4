/**
 * @fileoverview Market data types shared by the feed client and the relay.
 *
 * All types are pure, immutable data structures with no I/O.
 *
 * @module @iqbridge/contracts/market
 */

/**
 * How the length of a bar interval is measured.
 *
 * The values are the single-letter codes the wire protocol expects.
 */
export enum IntervalType {
  SECONDS = 's',
  VOLUME = 'v',
  TICKS = 't',
}

/**
 * A calendar day without a time zone. `month` is 1-based.
 */
export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

/**
 * A wall-clock time of day.
 */
export interface ClockTime {
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

/**
 * One OHLCV record for a ticker over a fixed interval.
 *
 * Produced by parsing one inbound line and never mutated afterwards.
 *
 * @example
 * ```typescript
 * const bar: Bar = {
 *   date: { year: 2019, month: 11, day: 29 },
 *   time: { hour: 11, minute: 37, second: 0 },
 *   open: 267.8,
 *   high: 268.0,
 *   low: 267.7,
 *   close: 267.9,
 *   cumulativeVolume: 1502000,
 *   intervalVolume: 12000,
 *   numTrades: 85,
 *   ticker: 'AAPL'
 * };
 * ```
 */
export interface Bar {
  readonly date: CalendarDate;
  readonly time: ClockTime;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  /** Volume traded so far in the session */
  readonly cumulativeVolume: number;
  /** Volume traded within this bar */
  readonly intervalVolume: number;
  readonly numTrades: number;
  readonly ticker: string;
}

/**
 * One end-of-day record. Unlike {@link Bar} it has no time of day and no trade
 * count, but carries open interest.
 */
export interface DailyBar {
  readonly date: CalendarDate;
  readonly high: number;
  readonly low: number;
  readonly open: number;
  readonly close: number;
  readonly intervalVolume: number;
  readonly openInterest: number;
  readonly ticker: string;
}

/**
 * Field-by-field equality of two bars.
 *
 * @example
 * ```typescript
 * if (!barsEqual(previous, next)) {
 *   publish(next);
 * }
 * ```
 */
export function barsEqual(a: Bar, b: Bar): boolean {
  return (
    a.ticker === b.ticker &&
    a.date.year === b.date.year &&
    a.date.month === b.date.month &&
    a.date.day === b.date.day &&
    a.time.hour === b.time.hour &&
    a.time.minute === b.time.minute &&
    a.time.second === b.time.second &&
    a.open === b.open &&
    a.high === b.high &&
    a.low === b.low &&
    a.close === b.close &&
    a.cumulativeVolume === b.cumulativeVolume &&
    a.intervalVolume === b.intervalVolume &&
    a.numTrades === b.numTrades
  );
}
