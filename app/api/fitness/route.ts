/**
 * Study Planner - Fitness Log API Route
 *
 * GET  /api/fitness - all days (most recent first) plus profile and age
 * POST /api/fitness - add or update one day; blank fields keep stored values
 *
 * Features:
 * - Field-level merge with the stored day
 * - BMI recomputed from the current profile height whenever weight is sent
 */

import { NextRequest, NextResponse } from 'next/server';
import { ensureServerOnly } from '@/lib/server-only-guard';
import { errorResponse, readRequestForm } from '@/lib/apiResponses';
import { parseFitnessForm } from '@/lib/fitness';
import { profileView } from '@/lib/profile';
import { getProfile, listFitnessDays, upsertFitnessDay } from '@/lib/db/queries';

ensureServerOnly('app/api/fitness/route');

export async function GET() {
  try {
    const rows = listFitnessDays();
    return NextResponse.json({ rows, profile: profileView(getProfile()) }, { status: 200 });
  } catch (error) {
    return errorResponse('Fitness API', error, 'Failed to load fitness log');
  }
}

export async function POST(request: NextRequest) {
  try {
    const form = await readRequestForm(request);
    const day = upsertFitnessDay(parseFitnessForm(form));
    return NextResponse.json({ success: true, message: 'Day saved.', day }, { status: 200 });
  } catch (error) {
    return errorResponse('Fitness API', error, 'Failed to save fitness day');
  }
}
