/**
 * Date parsing and calendar helpers. Calendar fields are always read in UTC.
 */

const MS_PER_DAY = 1000 * 60 * 60 * 24;

/**
 * ISO 8601 date or date-time: 2024-01-15, 2024-01-15T10:30:00.000+0000, 2024-01-15 10:30
 */
const ISO_DATE_REGEX =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?\s*(Z|[+-]\d{2}:?\d{2})?)?$/i;

/**
 * US-style date exported by spreadsheets: 01/15/2024 or 01/15/2024 10:30[:00]
 */
const US_DATE_REGEX =
  /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

const MONTH_NAMES = [
  "jan",
  "feb",
  "mar",
  "apr",
  "may",
  "jun",
  "jul",
  "aug",
  "sep",
  "oct",
  "nov",
  "dec",
];

/**
 * Builds a UTC date, rejecting out-of-range components instead of rolling them over
 */
function buildUtcDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
  millis = 0
): Date | undefined {
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return undefined;
  }

  const date = new Date(
    Date.UTC(year, month - 1, day, hours, minutes, seconds, millis)
  );

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }

  return date;
}

function parseOffsetMinutes(offset: string | undefined): number {
  if (!offset || offset.toUpperCase() === "Z") {
    return 0;
  }
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/**
 * Parses a date-like value using the accepted formats
 * @returns The parsed date, or undefined when the value is not a recognized date
 */
export function parseDate(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : new Date(value.getTime());
  }

  if (typeof value === "number") {
    const date = new Date(value);
    // out-of-range epochs yield an Invalid Date
    return Number.isNaN(date.getTime()) ? undefined : date;
  }

  if (typeof value !== "string") {
    return undefined;
  }

  const text = value.trim();

  const iso = text.match(ISO_DATE_REGEX);
  if (iso) {
    const [, year, month, day, hours, minutes, seconds, fraction, offset] = iso;
    const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0;
    const date = buildUtcDate(
      Number(year),
      Number(month),
      Number(day),
      Number(hours ?? 0),
      Number(minutes ?? 0),
      Number(seconds ?? 0),
      millis
    );
    if (!date) {
      return undefined;
    }
    return new Date(date.getTime() - parseOffsetMinutes(offset) * 60 * 1000);
  }

  const us = text.match(US_DATE_REGEX);
  if (us) {
    const [, month, day, year, hours, minutes, seconds] = us;
    return buildUtcDate(
      Number(year),
      Number(month),
      Number(day),
      Number(hours ?? 0),
      Number(minutes ?? 0),
      Number(seconds ?? 0)
    );
  }

  return undefined;
}

/**
 * Formats a date as its "YYYY-MM" month bucket
 */
export function toMonthYear(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  return `${date.getUTCFullYear()}-${month}`;
}

/**
 * Returns the 1-based quarter of a date
 */
export function getQuarter(date: Date): number {
  return Math.floor(date.getUTCMonth() / 3) + 1;
}

/**
 * Converts a duration to whole days, floored
 */
export function msToWholeDays(ms: number): number {
  return Math.floor(ms / MS_PER_DAY);
}

/**
 * Encodes a month/day pair as a sortable number (Nov 20 -> 1120)
 */
export function toMonthDay(month: number, day: number): number {
  return month * 100 + day;
}

/**
 * Month/day ordinal of a date in UTC
 */
export function getMonthDay(date: Date): number {
  return toMonthDay(date.getUTCMonth() + 1, date.getUTCDate());
}

/**
 * Parses a year-independent month/day such as "Nov 20", "November 20", "11-20" or "12/24"
 */
export function parseMonthDay(value: string): number | undefined {
  const text = value.trim().toLowerCase();

  const named = text.match(/^([a-z]+)\.?\s+(\d{1,2})$/);
  if (named) {
    const month = MONTH_NAMES.indexOf(named[1].slice(0, 3)) + 1;
    return month > 0 ? validMonthDay(month, Number(named[2])) : undefined;
  }

  const numeric = text.match(/^(\d{1,2})[-/](\d{1,2})$/);
  if (numeric) {
    return validMonthDay(Number(numeric[1]), Number(numeric[2]));
  }

  return undefined;
}

function validMonthDay(month: number, day: number): number | undefined {
  // 2024 is a leap year, so Feb 29 is accepted
  return buildUtcDate(2024, month, day) ? toMonthDay(month, day) : undefined;
}

/**
 * Lists every "YYYY-MM" month from `first` to `last` inclusive
 */
export function monthRange(first: string, last: string): string[] {
  const [firstYear, firstMonth] = first.split("-").map(Number);
  const [lastYear, lastMonth] = last.split("-").map(Number);
  const months: string[] = [];

  let year = firstYear;
  let month = firstMonth;
  while (year < lastYear || (year === lastYear && month <= lastMonth)) {
    months.push(`${year}-${String(month).padStart(2, "0")}`);
    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
  }

  return months;
}

/**
 * Matches a "YYYY-MM" month bucket
 */
export function isMonthBucket(value: string): boolean {
  return /^\d{4}-(0[1-9]|1[0-2])$/.test(value);
}
