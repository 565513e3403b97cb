/**
 * Tolerant Date Parsing
 *
 * Source systems write dates in many shapes. This module recovers a calendar
 * date from most of them and returns null instead of throwing otherwise.
 *
 * Supported (tried in this order, anywhere inside the text):
 * - ISO / year-first:   2024-03-05, 2024/03/05, 2024.03.05, 2024-03-05T10:00:00Z
 * - Compact:            20240305
 * - Month names:        5 Mar 2024, 05-Mar-24, 5th of March 2024, March 5, 2024, Mar-05-2024
 * - Month and year:     March 2024 (the 1st of the month)
 * - Numeric day-first:  05/03/2024, 5-3-24, 05.03.2024
 *   (falls back to month-first when the day-first reading is impossible,
 *    e.g. 03/25/2024)
 *
 * All results are UTC midnight so day differences are whole numbers.
 */

const MS_PER_DAY = 1000 * 60 * 60 * 24;

const MONTHS: Readonly<Record<string, number>> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  sept: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

const MONTH_NAME =
  '(?<![a-z])(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)(?![a-z])\\.?';

const YEAR_FIRST = /(?<!\d)(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?!\d)/;
const COMPACT = /(?<!\d)(\d{4})(\d{2})(\d{2})(?!\d)/;
const DAY_MONTH_NAME = new RegExp(
  `(?<!\\d)(\\d{1,2})(?:st|nd|rd|th)?[\\s\\-/.]*(?:of\\s+)?${MONTH_NAME}[\\s\\-/.,]*(\\d{4}|\\d{2})(?!\\d)`,
  'i'
);
// Day and year need a separator, so "March 2024" is not day 20 of year 24
const MONTH_NAME_DAY = new RegExp(
  `${MONTH_NAME}[\\s\\-/.]*(\\d{1,2})(?!\\d)(?:st|nd|rd|th)?,?[\\s\\-/.,]+(\\d{4}|\\d{2})(?!\\d)`,
  'i'
);
const MONTH_YEAR = new RegExp(`${MONTH_NAME}[\\s\\-/.,]*(\\d{4})(?!\\d)`, 'i');
const NUMERIC = /(?<!\d)(\d{1,2})[-/.](\d{1,2})[-/.](\d{4}|\d{2})(?!\d)/;

/**
 * Two-digit years: 00-69 are read as 20xx, 70-99 as 19xx.
 */
function expandYear(raw: string): number {
  const year = parseInt(raw, 10);
  if (raw.length > 2) return year;
  return year < 70 ? 2000 + year : 1900 + year;
}

/**
 * Builds a UTC date, rejecting impossible calendar days (no rollover).
 */
export function utcDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
}

function monthFromName(name: string): number | null {
  const key = name.toLowerCase().replace('.', '');
  return MONTHS[key.slice(0, 4)] ?? MONTHS[key.slice(0, 3)] ?? null;
}

/**
 * Parses a date string permissively with a day-first bias.
 *
 * @returns UTC midnight of the recovered date, or null
 *
 * @example
 * parseFlexibleDate('05/03/2024')       // 2024-03-05
 * parseFlexibleDate('March 5, 2024')    // 2024-03-05
 * parseFlexibleDate('rcvd 2024-03-05')  // 2024-03-05
 * parseFlexibleDate('n/a')              // null
 */
export function parseFlexibleDate(value: string | null | undefined): Date | null {
  if (!value || value.trim() === '') {
    return null;
  }

  const text = value.trim();

  const yearFirst = text.match(YEAR_FIRST);
  if (yearFirst) {
    const [, y, m, d] = yearFirst;
    return utcDate(parseInt(y, 10), parseInt(m, 10), parseInt(d, 10));
  }

  const compact = text.match(COMPACT);
  if (compact) {
    const [, y, m, d] = compact;
    const date = utcDate(parseInt(y, 10), parseInt(m, 10), parseInt(d, 10));
    if (date) return date;
  }

  const dayMonthName = text.match(DAY_MONTH_NAME);
  if (dayMonthName) {
    const [, d, monthName, y] = dayMonthName;
    const month = monthFromName(monthName);
    if (month !== null) {
      return utcDate(expandYear(y), month, parseInt(d, 10));
    }
  }

  const monthNameDay = text.match(MONTH_NAME_DAY);
  if (monthNameDay) {
    const [, monthName, d, y] = monthNameDay;
    const month = monthFromName(monthName);
    if (month !== null) {
      return utcDate(expandYear(y), month, parseInt(d, 10));
    }
  }

  const monthYear = text.match(MONTH_YEAR);
  if (monthYear) {
    const [, monthName, y] = monthYear;
    const month = monthFromName(monthName);
    if (month !== null) {
      return utcDate(parseInt(y, 10), month, 1);
    }
  }

  const numeric = text.match(NUMERIC);
  if (numeric) {
    const [, first, second, y] = numeric;
    const year = expandYear(y);
    const a = parseInt(first, 10);
    const b = parseInt(second, 10);
    // Day-first, unless that reading cannot be a real date
    return utcDate(year, b, a) ?? utcDate(year, a, b);
  }

  return null;
}

/**
 * Signed number of whole days from `to` until `from` (from − to).
 * Returns null when either date is missing.
 *
 * @example
 * daysBetween(new Date('2024-01-20'), new Date('2024-01-15')) // 5
 * daysBetween(new Date('2024-01-10'), new Date('2024-01-15')) // -5
 */
export function daysBetween(from: Date | null, to: Date | null): number | null {
  if (!from || !to) {
    return null;
  }

  return Math.floor((from.getTime() - to.getTime()) / MS_PER_DAY);
}

export default parseFlexibleDate;
