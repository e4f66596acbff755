/**
 * Study Planner - Additive Schema Requirements
 *
 * Columns added after the first release. Files created by an older build
 * pass the baseline migration untouched (CREATE TABLE IF NOT EXISTS), so
 * these are checked and added individually on every open.
 */

export interface RequiredColumn {
  table: string;
  column: string;
  definition: string;
}

export const REQUIRED_COLUMNS: readonly RequiredColumn[] = [
  { table: 'taf_summary', column: 'bmi', definition: 'REAL' },
  { table: 'user_profile', column: 'height_m', definition: 'REAL' },
  { table: 'user_profile', column: 'birthdate', definition: 'TEXT' },
];
