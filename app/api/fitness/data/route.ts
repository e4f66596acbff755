/**
 * Study Planner - Fitness Chart Data
 *
 * GET /api/fitness/data?metric=Push-ups
 * metric is one of BMI (default), Push-ups, Sit-ups, Pull-ups, Running.
 * Returns { labels, values } ordered by date ascending.
 */

import { NextRequest, NextResponse } from 'next/server';
import { ensureServerOnly } from '@/lib/server-only-guard';
import { errorResponse } from '@/lib/apiResponses';
import { fitnessChartSeries, resolveMetric } from '@/lib/fitness';
import { readField } from '@/lib/forms';
import { listFitnessDaysAscending } from '@/lib/db/queries';

ensureServerOnly('app/api/fitness/data/route');

export async function GET(request: NextRequest) {
  try {
    const metric = resolveMetric(readField(request.nextUrl.searchParams, 'metric'));
    return NextResponse.json(fitnessChartSeries(listFitnessDaysAscending(), metric));
  } catch (error) {
    return errorResponse('Fitness API', error, 'Failed to load chart data');
  }
}
