/**
 * Study Planner - Calendar API Route
 *
 * GET  /api/calendar?year=2024&month=5  - month grid, stats, neighbor months
 * POST /api/calendar?year=2024&month=5  - save the month form
 *
 * month is zero-based; both parameters default to the current month.
 */

import { NextRequest, NextResponse } from 'next/server';
import { ensureServerOnly } from '@/lib/server-only-guard';
import { errorResponse, readRequestForm } from '@/lib/apiResponses';
import { readMonthParams, readMonthSubmissions } from '@/lib/calendar';
import { buildMonthView } from '@/lib/calendarGrid';
import { getCalendarMonth, saveCalendarMonth } from '@/lib/db/queries';

ensureServerOnly('app/api/calendar/route');

function currentMonth(): { year: number; month: number } {
  const now = new Date();
  return { year: now.getFullYear(), month: now.getMonth() };
}

export async function GET(request: NextRequest) {
  try {
    const { year, month } = readMonthParams(request.nextUrl.searchParams, currentMonth());
    const view = buildMonthView(year, month, getCalendarMonth(year, month));
    return NextResponse.json(view, { status: 200 });
  } catch (error) {
    return errorResponse('Calendar API', error, 'Failed to load calendar');
  }
}

export async function POST(request: NextRequest) {
  try {
    const { year, month } = readMonthParams(request.nextUrl.searchParams, currentMonth());
    const form = await readRequestForm(request);
    const submissions = readMonthSubmissions(year, month, form);
    const { written } = saveCalendarMonth(submissions);

    console.log(`[Calendar API] Saved ${year}-${String(month + 1).padStart(2, '0')} (${written} rows)`);
    return NextResponse.json({ success: true, message: 'Calendar saved.', year, month, written });
  } catch (error) {
    return errorResponse('Calendar API', error, 'Failed to save calendar');
  }
}
