/**
 * Conversions between wire text and structured values.
 *
 * Dates are read and built through their UTC components: a `Date` handed to
 * or returned from this module carries the exchange wall-clock time in its UTC
 * fields, whatever the host time zone is.
 */

import moment from 'moment-timezone';
import type { CalendarDate, ClockTime } from '@iqbridge/contracts';
import { MalformedFieldError } from './errors.js';
import { FIELD_SEPARATOR } from './constants.js';

/** Outbound date-time form, e.g. `20191129 093000` */
export const WIRE_DATETIME_FORMAT = 'YYYYMMDD HHmmss';
/** Outbound date form, e.g. `20191129` */
export const WIRE_DATE_FORMAT = 'YYYYMMDD';
/** Inbound timestamp form, e.g. `2019-11-29 09:30:00` */
export const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';
/** Inbound date form, e.g. `2019-11-29` */
export const DATE_FORMAT = 'YYYY-MM-DD';
export const CLOCK_FORMAT = 'HH:mm';

const INTEGER_PATTERN = /^[+-]?\d+$/;

function toMoment(date: Date): moment.Moment {
  if (Number.isNaN(date.getTime())) {
    throw new MalformedFieldError('Cannot format an invalid date', { field: 'date' });
  }
  return moment.utc(date);
}

function parseStrict(text: string, format: string, field: string): moment.Moment {
  const value = moment.utc(text, format, true);
  if (!value.isValid()) {
    throw new MalformedFieldError(`Expected ${format}`, { field, value: text });
  }
  return value;
}

function calendarDateOf(value: moment.Moment): CalendarDate {
  return { year: value.year(), month: value.month() + 1, day: value.date() };
}

/**
 * Formats a date-time the way commands expect it.
 *
 * @example
 * ```typescript
 * formatDateTime(new Date(Date.UTC(2019, 10, 29, 9, 30))); // '20191129 093000'
 * ```
 */
export function formatDateTime(date: Date): string {
  return toMoment(date).format(WIRE_DATETIME_FORMAT);
}

export function formatDate(date: Date): string {
  return toMoment(date).format(WIRE_DATE_FORMAT);
}

/**
 * Parses an inbound `YYYY-MM-DD HH:mm:ss` timestamp into its date and time.
 *
 * @throws {MalformedFieldError} When the text does not match exactly
 */
export function parseTimestamp(text: string): { date: CalendarDate; time: ClockTime } {
  const value = parseStrict(text, TIMESTAMP_FORMAT, 'timestamp');
  return {
    date: calendarDateOf(value),
    time: { hour: value.hours(), minute: value.minutes(), second: value.seconds() },
  };
}

export function parseDate(text: string): CalendarDate {
  return calendarDateOf(parseStrict(text, DATE_FORMAT, 'date'));
}

/**
 * Parses a compact `YYYYMMDD` day as sent in watch commands.
 */
export function parseCompactDate(text: string): CalendarDate {
  return calendarDateOf(parseStrict(text, WIRE_DATE_FORMAT, 'date'));
}

/**
 * Parses an `HH:mm` time of day.
 */
export function parseClockTime(text: string): ClockTime {
  const value = parseStrict(text, CLOCK_FORMAT, 'time');
  return { hour: value.hours(), minute: value.minutes(), second: 0 };
}

/**
 * Combines a calendar day and a time of day into a wall-clock `Date`.
 */
export function toDateTime(date: CalendarDate, time: ClockTime): Date {
  const value = moment.utc({
    year: date.year,
    month: date.month - 1,
    date: date.day,
    hour: time.hour,
    minute: time.minute,
    second: time.second,
  });
  if (!value.isValid()) {
    throw new MalformedFieldError('Invalid date or time', { field: 'date', ...date, ...time });
  }
  return value.toDate();
}

/**
 * Formats a date and time back to the inbound timestamp form.
 */
export function formatTimestamp(date: CalendarDate, time: ClockTime): string {
  return moment.utc(toDateTime(date, time)).format(TIMESTAMP_FORMAT);
}

/**
 * Parses a price field. Empty or non-numeric text is an error rather than `NaN`.
 */
export function parseFloatField(text: string, field: string): number {
  const trimmed = text.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(value)) {
    throw new MalformedFieldError(`Expected a number in ${field}`, { field, value: text });
  }
  return value;
}

export function parseIntField(text: string, field: string): number {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new MalformedFieldError(`Expected an integer in ${field}`, { field, value: text });
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Returns the field at `index`, or `''` past the end of the line.
 */
export function getField(fields: readonly string[], index: number): string {
  return fields[index] ?? '';
}

/**
 * Splits a line into fields after dropping trailing separators.
 *
 * @example
 * ```typescript
 * splitFields('H_AAPL0000000042,!ENDMSG!,'); // ['H_AAPL0000000042', '!ENDMSG!']
 * ```
 */
export function splitFields(line: string): string[] {
  const fields = line.split(FIELD_SEPARATOR);
  while (fields.length > 1 && fields[fields.length - 1] === '') {
    fields.pop();
  }
  return fields;
}
