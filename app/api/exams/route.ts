/**
 * Study Planner - Practice Exams API Route
 *
 * GET  /api/exams - all attempts (most recent first) with aggregate stats
 * POST /api/exams - add an attempt from form fields sdate, q, a, disc
 */

import { NextRequest, NextResponse } from 'next/server';
import { ensureServerOnly } from '@/lib/server-only-guard';
import { errorResponse, readRequestForm } from '@/lib/apiResponses';
import { computeExamStats, readExamForm } from '@/lib/exams';
import { insertExamAttempt, listExamAttempts } from '@/lib/db/queries';

ensureServerOnly('app/api/exams/route');

export async function GET() {
  try {
    const rows = listExamAttempts();
    return NextResponse.json({ rows, stats: computeExamStats(rows) }, { status: 200 });
  } catch (error) {
    return errorResponse('Exams API', error, 'Failed to load exams');
  }
}

export async function POST(request: NextRequest) {
  try {
    const form = await readRequestForm(request);
    const attempt = insertExamAttempt(readExamForm(form));
    return NextResponse.json({ success: true, message: 'Test added.', attempt }, { status: 201 });
  } catch (error) {
    return errorResponse('Exams API', error, 'Failed to add exam');
  }
}
