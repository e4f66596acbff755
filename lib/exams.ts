/**
 * Study Planner - Practice Exam Validation and Statistics
 */

import { ValidationError } from './errors';
import { assertIsoDate } from './dates';
import { readField } from './forms';
import type { FieldSource } from './forms';
import type { ExamAttempt, ExamAttemptInput } from './db/types';

export interface ExamStats {
  count: number;
  avg: number; // percent
  best: number; // percent
  worst: number; // percent
}

/**
 * Score of one attempt as a percentage
 */
export function examPercent(attempt: Pick<ExamAttempt, 'q' | 'a'>): number {
  return (100 * attempt.a) / attempt.q;
}

/**
 * Aggregate percentages over all attempts with q > 0.
 * count is the number of rows; an empty log yields zeros.
 */
export function computeExamStats(rows: ReadonlyArray<Pick<ExamAttempt, 'q' | 'a'>>): ExamStats {
  const percents = rows.filter(r => r.q > 0).map(examPercent);

  if (percents.length === 0) {
    return { count: rows.length, avg: 0, best: 0, worst: 0 };
  }

  const total = percents.reduce((sum, p) => sum + p, 0);
  return {
    count: rows.length,
    avg: total / percents.length,
    best: Math.max(...percents),
    worst: Math.min(...percents),
  };
}

export function checkExamCounts(q: number, a: number): void {
  if (!Number.isInteger(q) || q <= 0) {
    throw new ValidationError('Question count must be a whole number greater than zero', 'q');
  }
  if (!Number.isInteger(a) || a < 0 || a > q) {
    throw new ValidationError(`Correct answers must be between 0 and ${q}`, 'a');
  }
}

function parseCount(raw: string | null, field: 'q' | 'a'): number {
  if (raw === null || !/^-?\d+$/.test(raw)) {
    throw new ValidationError(`Invalid values: ${field} must be a whole number`, field);
  }
  return Number(raw);
}

/**
 * Validate an add-exam form: sdate, q, a, disc
 */
export function readExamForm(form: FieldSource): ExamAttemptInput {
  const sdate = assertIsoDate(readField(form, 'sdate'), 'sdate');
  const q = parseCount(readField(form, 'q'), 'q');
  const a = parseCount(readField(form, 'a'), 'a');
  checkExamCounts(q, a);

  return { sdate, q, a, disc: readField(form, 'disc') ?? '' };
}
