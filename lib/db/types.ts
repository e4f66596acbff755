/**
 * Study Planner - Database TypeScript Types
 *
 * Type definitions matching the SQLite schema for all tables.
 */

export type CalendarStatus = 'none' | 'ok' | 'miss';

export const CALENDAR_STATUSES: readonly CalendarStatus[] = ['none', 'ok', 'miss'];

/**
 * Calendar Table
 * One row per day with a study note and completion status.
 * A missing row reads as { note: '', status: 'none' }.
 */
export interface CalendarDay {
  cdate: string; // YYYY-MM-DD (PRIMARY KEY)
  note: string | null;
  status: CalendarStatus;
}

/**
 * Simulados Table
 * Practice-exam attempts; several may share a date
 */
export interface ExamAttempt {
  id: number; // INTEGER PRIMARY KEY
  sdate: string; // YYYY-MM-DD
  q: number; // question count, > 0
  a: number; // correct answers, 0..q
  disc: string | null; // discipline label
}

export type ExamAttemptInput = Omit<ExamAttempt, 'id'>;

/**
 * TAF Summary Table
 * Physical-test results per day
 */
export interface FitnessDay {
  adate: string; // YYYY-MM-DD (PRIMARY KEY)
  running_km: number | null;
  running_minutes: number | null; // no write path sets this yet
  pushups: number | null;
  situps: number | null;
  pullups: number | null;
  weight: number | null; // kg
  bmi: number | null; // weight / height_m^2 at the time weight was written
}

/**
 * Fields accepted by the upsert. null keeps the stored value.
 */
export type FitnessDayInput = Omit<FitnessDay, 'running_minutes' | 'bmi'>;

/**
 * User Profile Table
 * Singleton row (id = 1)
 */
export interface Profile {
  id: 1;
  height_m: number | null;
  birthdate: string | null; // YYYY-MM-DD
}

export type ProfilePatch = Partial<Pick<Profile, 'height_m' | 'birthdate'>>;

/**
 * One day of a month-wide calendar save.
 * status null keeps whatever is stored (or 'none').
 */
export interface CalendarSubmission {
  cdate: string;
  note: string;
  status: CalendarStatus | null;
}
