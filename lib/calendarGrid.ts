/**
 * Study Planner - Month Grid Builder
 *
 * Turns a (year, month) and the stored calendar rows for that month into
 * the Sunday-first grid the calendar page renders. Pure: callers load the
 * rows and pass them in.
 */

import {
  MONTH_NAMES,
  assertMonthRef,
  daysInMonth,
  firstWeekday,
  neighborMonths,
  toIsoDate,
} from './dates';
import type { MonthRef } from './dates';
import type { CalendarDay, CalendarStatus } from './db/types';

export interface PaddingCell {
  inMonth: false;
}

export interface DayCell {
  inMonth: true;
  day: number;
  date: string;
  note: string;
  status: CalendarStatus;
}

export type GridCell = PaddingCell | DayCell;

export interface MonthStats {
  ok: number;
  miss: number;
  planned: number; // a note but no status yet
}

export interface MonthView {
  year: number;
  month: number; // 0-11
  monthName: string;
  cells: GridCell[];
  stats: MonthStats;
  prev: MonthRef;
  next: MonthRef;
}

export function summarizeCells(cells: readonly GridCell[]): MonthStats {
  const stats: MonthStats = { ok: 0, miss: 0, planned: 0 };
  for (const cell of cells) {
    if (!cell.inMonth) continue;
    if (cell.status === 'ok') stats.ok++;
    else if (cell.status === 'miss') stats.miss++;
    else if (cell.note.trim() !== '') stats.planned++;
  }
  return stats;
}

export function buildMonthView(
  year: number,
  monthIndex: number,
  rows: readonly CalendarDay[]
): MonthView {
  assertMonthRef(year, monthIndex);

  const byDate = new Map(rows.map(row => [row.cdate, row]));
  const cells: GridCell[] = [];

  const padStart = firstWeekday(year, monthIndex);
  for (let i = 0; i < padStart; i++) {
    cells.push({ inMonth: false });
  }

  const count = daysInMonth(year, monthIndex);
  for (let day = 1; day <= count; day++) {
    const date = toIsoDate(year, monthIndex + 1, day);
    const row = byDate.get(date);
    cells.push({
      inMonth: true,
      day,
      date,
      note: row?.note ?? '',
      status: row?.status ?? 'none',
    });
  }

  while (cells.length % 7 !== 0) {
    cells.push({ inMonth: false });
  }

  const { prev, next } = neighborMonths(year, monthIndex);

  return {
    year,
    month: monthIndex,
    monthName: MONTH_NAMES[monthIndex],
    cells,
    stats: summarizeCells(cells),
    prev,
    next,
  };
}
