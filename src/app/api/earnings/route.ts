import { NextRequest, NextResponse } from 'next/server';
import { getDataPaths } from '@/core/paths';
import { listEarnings, setEarningsDate } from '@/data/earnings';
import { apiErrorResponse, readJsonBody, resultResponse } from '@/lib/apiError';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    return NextResponse.json(await listEarnings(getDataPaths().earnings));
  } catch (error) {
    return apiErrorResponse(error, '/api/earnings');
  }
}

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const result = await setEarningsDate(getDataPaths().earnings, body.ticker, body.date);
    return resultResponse(result, (entry) => entry);
  } catch (error) {
    return apiErrorResponse(error, '/api/earnings');
  }
}
