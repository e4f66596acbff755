/**
 * Study Planner - Date and Calendar Math
 *
 * Pure helpers over ISO dates (YYYY-MM-DD) in the proleptic Gregorian
 * calendar. Month indexes are zero-based (0 = January) wherever a function
 * takes a `monthIndex`; parsed dates carry a 1-based `month`.
 */

import { ValidationError } from './errors';

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export interface DateParts {
  year: number;
  month: number; // 1-12
  day: number;
}

export interface MonthRef {
  year: number;
  month: number; // 0-11
}

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Number of days in a month (zero-based month index)
 */
export function daysInMonth(year: number, monthIndex: number): number {
  const lengths = [31, isLeapYear(year) ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
  return lengths[monthIndex];
}

/**
 * Strict parse: the string must be YYYY-MM-DD and name a real date
 */
export function tryParseIsoDate(value: string): DateParts | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (year < 1 || month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month - 1)) return null;

  return { year, month, day };
}

export function isIsoDate(value: unknown): value is string {
  return typeof value === 'string' && tryParseIsoDate(value) !== null;
}

export function parseIsoDate(value: string, field = 'date'): DateParts {
  const parts = tryParseIsoDate(value);
  if (!parts) {
    throw new ValidationError(`Invalid ${field}: expected YYYY-MM-DD, got "${value}"`, field);
  }
  return parts;
}

export function assertIsoDate(value: unknown, field = 'date'): string {
  if (typeof value !== 'string') {
    throw new ValidationError(`Missing ${field}`, field);
  }
  parseIsoDate(value, field);
  return value;
}

export function toIsoDate(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export function assertMonthRef(year: number, monthIndex: number): void {
  if (!Number.isInteger(year) || year < 1 || year > 9999) {
    throw new ValidationError(`Invalid year: ${year}`, 'year');
  }
  if (!Number.isInteger(monthIndex) || monthIndex < 0 || monthIndex > 11) {
    throw new ValidationError(`Invalid month: ${monthIndex} (expected 0-11)`, 'month');
  }
}

/**
 * Weekday of the 1st of the month, 0 = Sunday ... 6 = Saturday
 */
export function firstWeekday(year: number, monthIndex: number): number {
  // Sakamoto's method; Date maps years below 100 onto 19xx
  const m = monthIndex + 1;
  const y = m < 3 ? year - 1 : year;
  const t = [0, 3, 2, 5, 0, 3, 5, 1, 4, 6, 2, 4];
  return (y + Math.floor(y / 4) - Math.floor(y / 100) + Math.floor(y / 400) + t[m - 1] + 1) % 7;
}

export function monthBounds(year: number, monthIndex: number): { start: string; end: string } {
  return {
    start: toIsoDate(year, monthIndex + 1, 1),
    end: toIsoDate(year, monthIndex + 1, daysInMonth(year, monthIndex)),
  };
}

export function monthDates(year: number, monthIndex: number): string[] {
  const count = daysInMonth(year, monthIndex);
  const dates: string[] = [];
  for (let day = 1; day <= count; day++) {
    dates.push(toIsoDate(year, monthIndex + 1, day));
  }
  return dates;
}

export function neighborMonths(year: number, monthIndex: number): { prev: MonthRef; next: MonthRef } {
  return {
    prev: monthIndex === 0 ? { year: year - 1, month: 11 } : { year, month: monthIndex - 1 },
    next: monthIndex === 11 ? { year: year + 1, month: 0 } : { year, month: monthIndex + 1 },
  };
}

/**
 * Completed years between a birth date and a reference date
 */
export function ageOn(birthIso: string, todayIso: string): number {
  const birth = parseIsoDate(birthIso, 'birthdate');
  const today = parseIsoDate(todayIso, 'today');
  const beforeBirthday =
    today.month < birth.month || (today.month === birth.month && today.day < birth.day);
  return today.year - birth.year - (beforeBirthday ? 1 : 0);
}

/**
 * Local calendar date in YYYY-MM-DD format
 */
export function todayIso(now: Date = new Date()): string {
  return toIsoDate(now.getFullYear(), now.getMonth() + 1, now.getDate());
}
