/**
 * Tests for wire text conversions
 */

import { describe, it, expect } from 'vitest';
import {
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
} from '../src/field-codec.js';
import { MalformedFieldError, isMalformedFieldError } from '../src/errors.js';

describe('formatDateTime', () => {
  it('should format the wall-clock components', () => {
    expect(formatDateTime(new Date(Date.UTC(2019, 10, 29, 9, 30, 5)))).toBe('20191129 093005');
  });

  it('should reject an invalid date', () => {
    expect(() => formatDateTime(new Date(Number.NaN))).toThrow(MalformedFieldError);
  });
});

describe('formatDate', () => {
  it('should format the day only', () => {
    expect(formatDate(new Date(Date.UTC(2020, 0, 2, 23, 59, 59)))).toBe('20200102');
  });
});

describe('parseTimestamp', () => {
  it('should split a timestamp into date and time', () => {
    expect(parseTimestamp('2019-11-29 11:37:00')).toEqual({
      date: { year: 2019, month: 11, day: 29 },
      time: { hour: 11, minute: 37, second: 0 },
    });
  });

  it.each(['2019-11-29', '2019/11/29 11:37:00', '2019-13-01 00:00:00', 'garbage', ''])(
    'should reject %j',
    (text) => {
      expect(() => parseTimestamp(text)).toThrow(MalformedFieldError);
    }
  );

  it('should round-trip a formatted date-time through the inbound form', () => {
    const original = new Date(Date.UTC(2021, 6, 4, 15, 59, 30));
    const { date, time } = parseTimestamp(
      formatDateTime(original).replace(/^(\d{4})(\d{2})(\d{2}) (\d{2})(\d{2})(\d{2})$/, '$1-$2-$3 $4:$5:$6')
    );

    expect(toDateTime(date, time).getTime()).toBe(original.getTime());
  });
});

describe('parseDate', () => {
  it('should parse a day', () => {
    expect(parseDate('2019-11-29')).toEqual({ year: 2019, month: 11, day: 29 });
  });

  it('should reject a day with a time', () => {
    expect(() => parseDate('2019-11-29 09:30:00')).toThrow(MalformedFieldError);
  });
});

describe('parseCompactDate', () => {
  it('should parse the compact form', () => {
    expect(parseCompactDate('20191129')).toEqual({ year: 2019, month: 11, day: 29 });
  });

  it('should reject an impossible day', () => {
    expect(() => parseCompactDate('20190230')).toThrow(MalformedFieldError);
  });
});

describe('parseClockTime', () => {
  it('should parse hours and minutes', () => {
    expect(parseClockTime('09:30')).toEqual({ hour: 9, minute: 30, second: 0 });
  });

  it('should reject an hour out of range', () => {
    expect(() => parseClockTime('25:00')).toThrow(MalformedFieldError);
  });
});

describe('formatTimestamp', () => {
  it('should produce the inbound form', () => {
    expect(
      formatTimestamp({ year: 2019, month: 11, day: 29 }, { hour: 9, minute: 31, second: 0 })
    ).toBe('2019-11-29 09:31:00');
  });
});

describe('numeric fields', () => {
  it('should parse prices', () => {
    expect(parseFloatField('267.9', 'close')).toBe(267.9);
    expect(parseFloatField(' 12 ', 'close')).toBe(12);
  });

  it('should reject empty or non-numeric prices', () => {
    expect(() => parseFloatField('', 'close')).toThrow(MalformedFieldError);
    expect(() => parseFloatField('abc', 'close')).toThrow(MalformedFieldError);
  });

  it('should parse integers', () => {
    expect(parseIntField('1502000', 'totalVolume')).toBe(1502000);
  });

  it('should reject fractional integers and name the field', () => {
    try {
      parseIntField('1.5', 'numTrades');
      expect.unreachable();
    } catch (error) {
      expect(isMalformedFieldError(error)).toBe(true);
      if (isMalformedFieldError(error)) {
        expect(error.code).toBe('IQFEED_MALFORMED_FIELD');
        expect(error.data).toEqual({ field: 'numTrades', value: '1.5' });
      }
    }
  });
});

describe('getField', () => {
  it('should return the field or an empty string past the end', () => {
    const fields = ['a', 'b'];
    expect(getField(fields, 1)).toBe('b');
    expect(getField(fields, 2)).toBe('');
    expect(getField(fields, 99)).toBe('');
  });
});

describe('splitFields', () => {
  it('should drop trailing separators only', () => {
    expect(splitFields('H_AAPL0000000042,!ENDMSG!,')).toEqual(['H_AAPL0000000042', '!ENDMSG!']);
    expect(splitFields('BW,AAPL,60,20191129 093000,,,,,,s,,')).toEqual([
      'BW',
      'AAPL',
      '60',
      '20191129 093000',
      '',
      '',
      '',
      '',
      '',
      's',
    ]);
  });

  it('should keep one empty field for a line of separators', () => {
    expect(splitFields(',,,')).toEqual(['']);
    expect(splitFields('')).toEqual(['']);
  });
});
