/**
 * @fileoverview Main entry point for @iqbridge/contracts package.
 *
 * @module @iqbridge/contracts
 */

// Market data types
export { IntervalType, barsEqual } from './market.js';
export type { Bar, DailyBar, CalendarDate, ClockTime } from './market.js';

// Error classes and guards
export { FeedError, isFeedError } from './errors.js';
