/**
 * Study Planner - Calendar Form Handling
 *
 * The calendar page posts one form for the whole month with a
 * note_<date> and status_<date> field per day.
 */

import { ValidationError } from './errors';
import { assertMonthRef, monthDates } from './dates';
import { readField, readRawField } from './forms';
import type { FieldSource } from './forms';
import { CALENDAR_STATUSES } from './db/types';
import type { CalendarStatus, CalendarSubmission } from './db/types';

export function isCalendarStatus(value: unknown): value is CalendarStatus {
  return typeof value === 'string' && CALENDAR_STATUSES.some(s => s === value);
}

/**
 * Parse year and zero-based month from query parameters, falling back to
 * the given reference month when absent
 */
export function readMonthParams(
  params: FieldSource,
  fallback: { year: number; month: number }
): { year: number; month: number } {
  const rawYear = readField(params, 'year');
  const rawMonth = readField(params, 'month');

  const year = rawYear === null ? fallback.year : Number(rawYear);
  const month = rawMonth === null ? fallback.month : Number(rawMonth);

  if (rawYear !== null && !/^\d+$/.test(rawYear)) {
    throw new ValidationError(`Invalid year: "${rawYear}"`, 'year');
  }
  if (rawMonth !== null && !/^\d+$/.test(rawMonth)) {
    throw new ValidationError(`Invalid month: "${rawMonth}"`, 'month');
  }
  assertMonthRef(year, month);
  return { year, month };
}

/**
 * Collect one submission per day of the month.
 * A missing or blank status field means "keep the stored status".
 */
export function readMonthSubmissions(
  year: number,
  monthIndex: number,
  form: FieldSource
): CalendarSubmission[] {
  assertMonthRef(year, monthIndex);

  return monthDates(year, monthIndex).map(cdate => {
    const status = readField(form, `status_${cdate}`);
    if (status !== null && !isCalendarStatus(status)) {
      throw new ValidationError(`Invalid status "${status}" for ${cdate}`, `status_${cdate}`);
    }
    return {
      cdate,
      note: readRawField(form, `note_${cdate}`).trim(),
      status,
    };
  });
}
