import { NextRequest, NextResponse } from 'next/server';
import { getDataPaths } from '@/core/paths';
import { addPosition, getPositionBook } from '@/data/positions';
import { apiErrorResponse, readJsonBody, resultResponse } from '@/lib/apiError';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    return NextResponse.json(await getPositionBook(getDataPaths().positions));
  } catch (error) {
    return apiErrorResponse(error, '/api/positions');
  }
}

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const result = await addPosition(getDataPaths().positions, body);
    return resultResponse(result, (position) => ({ ok: true, position }), 201);
  } catch (error) {
    return apiErrorResponse(error, '/api/positions');
  }
}
