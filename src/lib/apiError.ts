import { NextResponse } from 'next/server';
import type { Failure, FailureKind, Result } from '@/core/result';
import { isRecord } from '@/data/json_store';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('api');

const FAILURE_STATUS: Record<FailureKind, number> = {
  validation: 400,
  not_found: 404,
  persistence: 500,
};

export function sanitizeError(error: unknown): string {
  if (error instanceof Error) {
    if (process.env.NODE_ENV === 'development') {
      return error.message;
    }
    return 'An internal error occurred';
  }
  return 'An unknown error occurred';
}

export function apiError(message: string, status: number = 500): NextResponse {
  return NextResponse.json({ error: message }, { status });
}

export function apiErrorResponse(error: unknown, route: string, status: number = 500): NextResponse {
  logger.error({ err: error, route }, 'Unhandled route error');
  return apiError(sanitizeError(error), status);
}

export function failureResponse(failure: Failure): NextResponse {
  return apiError(failure.message, FAILURE_STATUS[failure.kind]);
}

/** Success body via `toBody`, or the failure mapped to its status code. */
export function resultResponse<T>(
  result: Result<T>,
  toBody: (value: T) => unknown,
  status: number = 200
): NextResponse {
  if (!result.ok) {
    return failureResponse(result.error);
  }
  return NextResponse.json(toBody(result.value), { status });
}

/**
 * Parses a JSON request body; a missing or malformed body reads as `{}` so
 * field validation reports what is missing.
 */
export async function readJsonBody(request: Request): Promise<Record<string, unknown>> {
  try {
    const body: unknown = await request.json();
    return isRecord(body) ? body : {};
  } catch {
    return {};
  }
}

export function parseIdParam(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number.parseInt(raw, 10);
  return Number.isSafeInteger(id) ? id : null;
}
