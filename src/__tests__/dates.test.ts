import { describe, expect, it } from 'vitest';
import { isoToAppleScriptDate, lenientDateToIso } from '../bridge/dates.js';
import { DateFormatError } from '../bridge/errors.js';

describe('isoToAppleScriptDate', () => {
  it.each([
    ['2025-05-23T09:00:00', '05/23/2025 09:00:00 AM'],
    ['2025-05-23', '05/23/2025 12:00:00 AM'],
    ['2025-05-23T14:30:00Z', '05/23/2025 02:30:00 PM'],
    ['2025-12-31T23:59:00', '12/31/2025 11:59:00 PM'],
    ['2025-01-01T00:00:00', '01/01/2025 12:00:00 AM'],
    ['2025-06-15T12:00:00', '06/15/2025 12:00:00 PM'],
  ])('converts %s', (input, expected) => {
    expect(isoToAppleScriptDate(input)).toBe(expected);
  });

  it('drops a numeric offset without shifting the clock', () => {
    expect(isoToAppleScriptDate('2025-03-09T18:05:07+05:30')).toBe('03/09/2025 06:05:07 PM');
    expect(isoToAppleScriptDate('2025-03-09T18:05:07-0800')).toBe('03/09/2025 06:05:07 PM');
  });

  it('accepts a timezone suffix on a date-only value', () => {
    expect(isoToAppleScriptDate('2025-03-09Z')).toBe('03/09/2025 12:00:00 AM');
  });

  it('rejects empty input with a distinct message', () => {
    expect(() => isoToAppleScriptDate('')).toThrow('Date string cannot be empty');
    expect(() => isoToAppleScriptDate('   ')).toThrow(DateFormatError);
  });

  it('names both accepted formats for unparseable input', () => {
    expect(() => isoToAppleScriptDate('not-a-date')).toThrow(
      "Invalid date format 'not-a-date'. Expected ISO 8601 format (YYYY-MM-DDTHH:MM:SS or YYYY-MM-DD)"
    );
  });

  it('rejects out-of-range fields', () => {
    expect(() => isoToAppleScriptDate('2025-02-30')).toThrow(DateFormatError);
    expect(() => isoToAppleScriptDate('2025-13-01')).toThrow(DateFormatError);
    expect(() => isoToAppleScriptDate('2025-05-23T24:00:00')).toThrow(DateFormatError);
  });

  it('accepts a leap day only in leap years', () => {
    expect(isoToAppleScriptDate('2024-02-29')).toBe('02/29/2024 12:00:00 AM');
    expect(() => isoToAppleScriptDate('2025-02-29')).toThrow(DateFormatError);
  });

  it('applies the Gregorian leap rule to early years and centuries', () => {
    expect(isoToAppleScriptDate('0000-02-29')).toBe('02/29/0000 12:00:00 AM');
    expect(isoToAppleScriptDate('0004-02-29')).toBe('02/29/0004 12:00:00 AM');
    expect(isoToAppleScriptDate('2000-02-29')).toBe('02/29/2000 12:00:00 AM');
    expect(() => isoToAppleScriptDate('1900-02-29')).toThrow(DateFormatError);
    expect(() => isoToAppleScriptDate('0001-02-29')).toThrow(DateFormatError);
  });

  it('tags failures with the date_format kind', () => {
    try {
      isoToAppleScriptDate('tomorrow');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DateFormatError);
      expect(err instanceof DateFormatError && err.kind).toBe('date_format');
    }
  });
});

describe('lenientDateToIso', () => {
  it('parses the verbose date text scripts produce', () => {
    expect(lenientDateToIso('Friday, May 23, 2025 at 2:30:00 PM')).toBe('2025-05-23T14:30:00');
  });

  it('handles midnight, noon and a missing seconds field', () => {
    expect(lenientDateToIso('Wednesday, January 1, 2025 at 12:00:00 AM')).toBe(
      '2025-01-01T00:00:00'
    );
    expect(lenientDateToIso('Sunday, June 15, 2025 at 12:00 PM')).toBe('2025-06-15T12:00:00');
  });

  it('accepts a date prefix, no weekday and a narrow no-break space', () => {
    expect(lenientDateToIso('date March 3, 2025 at 9:05:00 am')).toBe('2025-03-03T09:05:00');
    expect(lenientDateToIso('Monday, March 3, 2025 at 9:05:00\u202FPM')).toBe(
      '2025-03-03T21:05:00'
    );
  });

  it('returns the trimmed original for text it cannot parse', () => {
    expect(lenientDateToIso('  sometime next week  ')).toBe('sometime next week');
    expect(lenientDateToIso('Smarch 3, 2025 at 9:05:00 AM')).toBe('Smarch 3, 2025 at 9:05:00 AM');
    expect(lenientDateToIso('February 30, 2025 at 1:00:00 PM')).toBe(
      'February 30, 2025 at 1:00:00 PM'
    );
    expect(lenientDateToIso('')).toBe('');
  });
});
