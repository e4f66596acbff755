/**
 * Study Planner - Fitness Log Parsing and Derived Metrics
 *
 * Form parsing for the daily physical-test entry, BMI computation, and the
 * chart series served to the fitness page. Blank fields parse to null,
 * which the upsert reads as "keep the stored value".
 */

import { ValidationError } from './errors';
import { assertIsoDate, todayIso } from './dates';
import { readField } from './forms';
import type { FieldSource } from './forms';
import type { FitnessDay, FitnessDayInput } from './db/types';

export const FITNESS_METRICS = ['BMI', 'Push-ups', 'Sit-ups', 'Pull-ups', 'Running'] as const;

export type FitnessMetric = (typeof FITNESS_METRICS)[number];

export interface ChartSeries {
  labels: string[];
  values: number[];
}

const METRIC_COLUMNS: Record<FitnessMetric, keyof FitnessDay> = {
  BMI: 'bmi',
  'Push-ups': 'pushups',
  'Sit-ups': 'situps',
  'Pull-ups': 'pullups',
  Running: 'running_km',
};

export function isFitnessMetric(value: unknown): value is FitnessMetric {
  return typeof value === 'string' && FITNESS_METRICS.some(m => m === value);
}

/**
 * Body-mass index: weight (kg) / height (m)^2
 */
export function computeBmi(weightKg: number, heightM: number): number {
  if (!(heightM > 0)) {
    throw new ValidationError(`Height must be greater than zero (got ${heightM})`, 'height_m');
  }
  return weightKg / (heightM * heightM);
}

function parseDecimal(raw: string | null, field: string, opts: { positive: boolean }): number | null {
  if (raw === null) return null;
  // accept a decimal comma as typed on some keyboards
  const normalized = raw.replace(',', '.');
  if (!/^\d+(\.\d+)?$|^\.\d+$/.test(normalized)) {
    throw new ValidationError(`${field} must be a number (got "${raw}")`, field);
  }
  const value = Number(normalized);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${field} is out of range`, field);
  }
  if (opts.positive && value <= 0) {
    throw new ValidationError(`${field} must be greater than zero`, field);
  }
  return value;
}

function parseCount(raw: string | null, field: string): number | null {
  if (raw === null) return null;
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError(`${field} must be a whole number (got "${raw}")`, field);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(`${field} is out of range`, field);
  }
  return value;
}

/**
 * Read the fitness form. Absent date means today.
 */
export function parseFitnessForm(form: FieldSource, today: string = todayIso()): FitnessDayInput {
  const date = readField(form, 'date');
  return {
    adate: date === null ? today : assertIsoDate(date, 'date'),
    running_km: parseDecimal(readField(form, 'running_km'), 'running_km', { positive: false }),
    pushups: parseCount(readField(form, 'pushups'), 'pushups'),
    situps: parseCount(readField(form, 'situps'), 'situps'),
    pullups: parseCount(readField(form, 'pullups'), 'pullups'),
    weight: parseDecimal(readField(form, 'weight'), 'weight', { positive: true }),
  };
}

/**
 * Field-level coalesce: incoming non-null values win, stored values survive
 */
export function mergeFitnessDay(
  stored: FitnessDay | null,
  incoming: FitnessDayInput
): Omit<FitnessDay, 'bmi'> {
  return {
    adate: incoming.adate,
    running_km: incoming.running_km ?? stored?.running_km ?? null,
    running_minutes: stored?.running_minutes ?? null,
    pushups: incoming.pushups ?? stored?.pushups ?? null,
    situps: incoming.situps ?? stored?.situps ?? null,
    pullups: incoming.pullups ?? stored?.pullups ?? null,
    weight: incoming.weight ?? stored?.weight ?? null,
  };
}

/**
 * Metric name from a query string; absent means BMI
 */
export function resolveMetric(raw: string | null): FitnessMetric {
  if (raw === null) return 'BMI';
  if (!isFitnessMetric(raw)) {
    throw new ValidationError(`Unknown metric "${raw}". Expected one of: ${FITNESS_METRICS.join(', ')}`, 'metric');
  }
  return raw;
}

/**
 * Chart series for rows already ordered by date ascending. Missing values plot as 0.
 */
export function fitnessChartSeries(rows: readonly FitnessDay[], metric: FitnessMetric): ChartSeries {
  const column = METRIC_COLUMNS[metric];
  return {
    labels: rows.map(r => r.adate),
    values: rows.map(r => {
      const value = r[column];
      return typeof value === 'number' ? value : 0;
    }),
  };
}
