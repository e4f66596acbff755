import { NextRequest, NextResponse } from 'next/server';
import { ensureServerOnly } from '@/lib/server-only-guard';
import { errorResponse } from '@/lib/apiResponses';
import { assertIsoDate } from '@/lib/dates';
import { readField } from '@/lib/forms';
import { deleteFitnessRange } from '@/lib/db/queries';

ensureServerOnly('app/api/fitness/range/route');

/**
 * DELETE /api/fitness/range?start=2024-06-01&end=2024-06-30 - inclusive
 */
export async function DELETE(request: NextRequest) {
  try {
    const params = request.nextUrl.searchParams;
    const start = assertIsoDate(readField(params, 'start'), 'start');
    const end = assertIsoDate(readField(params, 'end'), 'end');
    const deleted = deleteFitnessRange(start, end);

    console.log(`[Fitness API] Removed ${deleted} day(s) from ${start} to ${end}`);
    return NextResponse.json({
      success: true,
      message: `Fitness days removed: ${start} → ${end}`,
      deleted,
    });
  } catch (error) {
    return errorResponse('Fitness API', error, 'Failed to delete fitness range');
  }
}
