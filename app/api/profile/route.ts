/**
 * Study Planner - Profile API Route
 *
 * GET /api/profile - height, birth date and derived age
 * PUT /api/profile - JSON { height_m?, birthdate? }; absent fields are kept
 */

import { NextRequest, NextResponse } from 'next/server';
import { ensureServerOnly } from '@/lib/server-only-guard';
import { errorResponse, readRequestJson } from '@/lib/apiResponses';
import { readProfilePatch, profileView } from '@/lib/profile';
import { getProfile, updateProfile } from '@/lib/db/queries';

ensureServerOnly('app/api/profile/route');

export async function GET() {
  try {
    return NextResponse.json({ success: true, profile: profileView(getProfile()) });
  } catch (error) {
    return errorResponse('Profile API', error, 'Failed to load profile');
  }
}

export async function PUT(request: NextRequest) {
  try {
    const patch = readProfilePatch(await readRequestJson(request));
    const profile = updateProfile(patch);
    return NextResponse.json({ success: true, profile: profileView(profile) });
  } catch (error) {
    return errorResponse('Profile API', error, 'Failed to update profile');
  }
}
