import { NextRequest, NextResponse } from 'next/server';
import { getDataPaths } from '@/core/paths';
import { addCoveredCall, getCoveredCallBook } from '@/data/covered_calls';
import { apiErrorResponse, readJsonBody, resultResponse } from '@/lib/apiError';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    return NextResponse.json(await getCoveredCallBook(getDataPaths().coveredCalls));
  } catch (error) {
    return apiErrorResponse(error, '/api/calls');
  }
}

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const result = await addCoveredCall(getDataPaths().coveredCalls, body);
    return resultResponse(result, (trade) => ({ ok: true, trade }), 201);
  } catch (error) {
    return apiErrorResponse(error, '/api/calls');
  }
}
