/**
 * Study Planner - Database Query Helpers
 *
 * Typed reads and writes for the calendar, exam log, fitness log and
 * profile. Every date argument is validated before a statement runs;
 * multi-row writes run in a single transaction.
 */

import { getDatabase } from './Database';
import { ensureServerOnly } from '../server-only-guard';
import { ValidationError } from '../errors';
import { assertIsoDate, assertMonthRef, monthBounds } from '../dates';
import { checkExamCounts } from '../exams';
import { computeBmi, mergeFitnessDay } from '../fitness';
import type {
  CalendarDay,
  CalendarSubmission,
  ExamAttempt,
  ExamAttemptInput,
  FitnessDay,
  FitnessDayInput,
  Profile,
  ProfilePatch,
} from './types';

// Ensure this module is only used server-side
ensureServerOnly('lib/db/queries');

/**
 * Calendar - single day
 */
export function getCalendarDay(cdate: string): CalendarDay | null {
  assertIsoDate(cdate, 'cdate');
  const db = getDatabase();
  return db.prepare<CalendarDay>('SELECT cdate, note, status FROM calendar WHERE cdate = ?').get(cdate) ?? null;
}

/**
 * Calendar - inclusive date range, ascending
 */
export function getCalendarDaysInRange(start: string, end: string): CalendarDay[] {
  assertIsoDate(start, 'start');
  assertIsoDate(end, 'end');
  const db = getDatabase();
  return db
    .prepare<CalendarDay>('SELECT cdate, note, status FROM calendar WHERE cdate BETWEEN ? AND ? ORDER BY cdate')
    .all(start, end);
}

export function getCalendarMonth(year: number, monthIndex: number): CalendarDay[] {
  assertMonthRef(year, monthIndex);
  const { start, end } = monthBounds(year, monthIndex);
  return getCalendarDaysInRange(start, end);
}

/**
 * Calendar - Month Save
 *
 * Submitted status wins, otherwise the stored status is kept. Existing rows
 * are updated even when they become empty; new rows are only created when
 * they carry a note or a status.
 */
export function saveCalendarMonth(submissions: readonly CalendarSubmission[]): { written: number } {
  for (const submission of submissions) {
    assertIsoDate(submission.cdate, 'cdate');
  }
  if (submissions.length === 0) return { written: 0 };

  const db = getDatabase();
  const select = db.prepare<Pick<CalendarDay, 'status'>>('SELECT status FROM calendar WHERE cdate = ?');
  const update = db.prepare('UPDATE calendar SET note = ?, status = ? WHERE cdate = ?');
  const insert = db.prepare('INSERT INTO calendar (cdate, note, status) VALUES (?, ?, ?)');

  return db.transaction(() => {
    let written = 0;
    for (const { cdate, note, status } of submissions) {
      const existing = select.get(cdate);
      const nextStatus = status ?? existing?.status ?? 'none';

      if (existing) {
        update.run(note, nextStatus, cdate);
        written++;
      } else if (note !== '' || nextStatus !== 'none') {
        insert.run(cdate, note, nextStatus);
        written++;
      }
    }
    return { written };
  });
}

/**
 * Calendar - clear one day (no-op when absent)
 */
export function deleteCalendarDay(cdate: string): number {
  assertIsoDate(cdate, 'cdate');
  const db = getDatabase();
  return db.prepare('DELETE FROM calendar WHERE cdate = ?').run(cdate).changes;
}

/**
 * Exams - most recent first
 */
export function listExamAttempts(): ExamAttempt[] {
  const db = getDatabase();
  return db
    .prepare<ExamAttempt>('SELECT id, sdate, q, a, disc FROM simulados ORDER BY sdate DESC, id DESC')
    .all();
}

export function insertExamAttempt(input: ExamAttemptInput): ExamAttempt {
  assertIsoDate(input.sdate, 'sdate');
  checkExamCounts(input.q, input.a);

  const db = getDatabase();
  const result = db
    .prepare('INSERT INTO simulados (sdate, q, a, disc) VALUES (?, ?, ?, ?)')
    .run(input.sdate, input.q, input.a, input.disc);

  return { id: Number(result.lastInsertRowid), ...input };
}

export function deleteExamAttempt(id: number): number {
  if (!Number.isInteger(id)) {
    throw new ValidationError(`Invalid exam id: ${id}`, 'id');
  }
  const db = getDatabase();
  return db.prepare('DELETE FROM simulados WHERE id = ?').run(id).changes;
}

export function deleteExamAttemptsByDate(sdate: string): number {
  assertIsoDate(sdate, 'sdate');
  const db = getDatabase();
  return db.prepare('DELETE FROM simulados WHERE sdate = ?').run(sdate).changes;
}

/**
 * Fitness - most recent first
 */
export function listFitnessDays(): FitnessDay[] {
  const db = getDatabase();
  return db.prepare<FitnessDay>('SELECT * FROM taf_summary ORDER BY adate DESC').all();
}

/**
 * Fitness - oldest first, for charts
 */
export function listFitnessDaysAscending(): FitnessDay[] {
  const db = getDatabase();
  return db.prepare<FitnessDay>('SELECT * FROM taf_summary ORDER BY adate').all();
}

export function getFitnessDay(adate: string): FitnessDay | null {
  assertIsoDate(adate, 'adate');
  const db = getDatabase();
  return db.prepare<FitnessDay>('SELECT * FROM taf_summary WHERE adate = ?').get(adate) ?? null;
}

/**
 * Fitness - Coalescing Upsert
 *
 * null fields keep the stored value. When this submission carries a weight,
 * BMI is recomputed from the profile height as it is right now.
 */
export function upsertFitnessDay(input: FitnessDayInput): FitnessDay {
  assertIsoDate(input.adate, 'adate');

  const db = getDatabase();
  const select = db.prepare<FitnessDay>('SELECT * FROM taf_summary WHERE adate = ?');
  const upsert = db.prepare(`
    INSERT INTO taf_summary (adate, running_km, running_minutes, pushups, situps, pullups, weight)
    VALUES (?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(adate) DO UPDATE SET
      running_km = excluded.running_km,
      running_minutes = excluded.running_minutes,
      pushups = excluded.pushups,
      situps = excluded.situps,
      pullups = excluded.pullups,
      weight = excluded.weight
  `);
  const setBmi = db.prepare('UPDATE taf_summary SET bmi = ? WHERE adate = ?');
  const selectHeight = db.prepare<Pick<Profile, 'height_m'>>('SELECT height_m FROM user_profile WHERE id = 1');

  return db.transaction(() => {
    const merged = mergeFitnessDay(select.get(input.adate) ?? null, input);
    upsert.run(
      merged.adate,
      merged.running_km,
      merged.running_minutes,
      merged.pushups,
      merged.situps,
      merged.pullups,
      merged.weight
    );

    if (input.weight !== null) {
      const height = selectHeight.get()?.height_m ?? null;
      if (height === null) {
        console.warn(`[Fitness] No profile height; BMI for ${input.adate} left unchanged`);
      } else {
        setBmi.run(computeBmi(input.weight, height), input.adate);
      }
    }

    const saved = select.get(input.adate);
    if (!saved) {
      throw new Error(`Fitness day ${input.adate} missing after upsert`);
    }
    return saved;
  });
}

export function deleteFitnessDay(adate: string): number {
  assertIsoDate(adate, 'adate');
  const db = getDatabase();
  return db.prepare('DELETE FROM taf_summary WHERE adate = ?').run(adate).changes;
}

/**
 * Fitness - delete an inclusive date range
 */
export function deleteFitnessRange(start: string, end: string): number {
  assertIsoDate(start, 'start');
  assertIsoDate(end, 'end');
  if (start > end) {
    throw new ValidationError(`Range start ${start} is after end ${end}`, 'start');
  }
  const db = getDatabase();
  return db.prepare('DELETE FROM taf_summary WHERE adate BETWEEN ? AND ?').run(start, end).changes;
}

/**
 * Profile singleton
 */
export function getProfile(): Profile {
  const db = getDatabase();
  const profile = db.prepare<Profile>('SELECT id, height_m, birthdate FROM user_profile WHERE id = 1').get();
  if (!profile) {
    // Database initialization seeds this row
    throw new Error('Profile row is missing');
  }
  return profile;
}

/**
 * Update height and/or birth date. Absent fields are kept.
 * Stored BMI values are not rewritten.
 */
export function updateProfile(patch: ProfilePatch): Profile {
  if (patch.height_m !== undefined && patch.height_m !== null && !(patch.height_m > 0)) {
    throw new ValidationError('Height must be greater than zero', 'height_m');
  }
  if (patch.birthdate !== undefined && patch.birthdate !== null) {
    assertIsoDate(patch.birthdate, 'birthdate');
  }

  const db = getDatabase();
  return db.transaction(() => {
    const current = getProfile();
    db.prepare('UPDATE user_profile SET height_m = ?, birthdate = ? WHERE id = 1').run(
      patch.height_m ?? current.height_m,
      patch.birthdate ?? current.birthdate
    );
    return getProfile();
  });
}
