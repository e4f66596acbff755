/**
 * Study Planner - Route Handler Helpers
 *
 * Shared request parsing and error mapping for app/api routes:
 * ValidationError -> 400, anything else -> logged and 500.
 */

import { NextRequest, NextResponse } from 'next/server';
import { ValidationError, isValidationError } from './errors';

/**
 * Read a URL-encoded or multipart body
 */
export async function readRequestForm(request: NextRequest): Promise<FormData> {
  try {
    return await request.formData();
  } catch {
    throw new ValidationError('Expected a form body (application/x-www-form-urlencoded or multipart/form-data)');
  }
}

/**
 * Read a JSON object body
 */
export async function readRequestJson(request: NextRequest): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new ValidationError('Expected a JSON body');
  }
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('Expected a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
}

export function errorResponse(scope: string, error: unknown, fallbackMessage: string): NextResponse {
  if (isValidationError(error)) {
    return NextResponse.json({ success: false, error: error.message }, { status: 400 });
  }
  console.error(`[${scope}] Error:`, error);
  return NextResponse.json({ success: false, error: fallbackMessage }, { status: 500 });
}
