import { DateFormatError } from './errors.js';

const ISO_INPUT =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2}):(\d{2}))?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/;

// "Monday, January 1, 2024 at 12:00:00 PM". Recent macOS releases put a narrow
// no-break space before the meridiem.
const APPLESCRIPT_DATE =
  /^(?:date\s+)?(?:[A-Za-z]+,\s*)?([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})(?:\s+at)?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*(AM|PM)$/i;

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const pad = (n: number): string => String(n).padStart(2, '0');

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

// Proleptic Gregorian, so year 0 is a leap year.
function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  return month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
}

function validParts(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number
): boolean {
  return (
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month) &&
    hour <= 23 &&
    minute <= 59 &&
    second <= 59
  );
}

/**
 * Convert `YYYY-MM-DD` or `YYYY-MM-DDTHH:MM:SS` (with an optional `Z` or UTC
 * offset, which is dropped) into the `MM/DD/YYYY hh:mm:ss AM|PM` literal that
 * AppleScript's `date "..."` accepts. Wall-clock fields are used as written;
 * no timezone arithmetic happens.
 */
export function isoToAppleScriptDate(input: string): string {
  const text = input.trim();
  if (!text) {
    throw new DateFormatError('Date string cannot be empty');
  }

  const match = ISO_INPUT.exec(text);
  const invalid = (): DateFormatError =>
    new DateFormatError(
      `Invalid date format '${input}'. Expected ISO 8601 format (YYYY-MM-DDTHH:MM:SS or YYYY-MM-DD)`
    );
  if (!match) throw invalid();

  const [, y, mo, d, h = '00', mi = '00', s = '00'] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (!validParts(year, month, day, hour, minute, second)) throw invalid();

  const meridiem = hour < 12 ? 'AM' : 'PM';
  const hour12 = hour % 12 === 0 ? 12 : hour % 12;
  return `${pad(month)}/${pad(day)}/${y} ${pad(hour12)}:${pad(minute)}:${pad(second)} ${meridiem}`;
}

/**
 * Best-effort reverse of AppleScript's `date as string` output into
 * `YYYY-MM-DDTHH:MM:SS`. Text that does not parse comes back trimmed but
 * otherwise untouched; this never throws.
 */
export function lenientDateToIso(text: string): string {
  const trimmed = text.trim();
  const match = APPLESCRIPT_DATE.exec(trimmed);
  if (!match) return trimmed;

  const [, monthName, d, y, h, mi, s = '00', meridiem] = match;
  const month = MONTHS.indexOf(monthName.toLowerCase()) + 1;
  const day = Number(d);
  const year = Number(y);
  const hour12 = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (month === 0 || hour12 < 1 || hour12 > 12) return trimmed;

  const pm = meridiem.toUpperCase() === 'PM';
  const hour = (hour12 % 12) + (pm ? 12 : 0);
  if (!validParts(year, month, day, hour, minute, second)) return trimmed;

  return `${y}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}`;
}
