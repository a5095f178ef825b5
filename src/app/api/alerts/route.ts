import { NextRequest, NextResponse } from 'next/server';
import { getDataPaths } from '@/core/paths';
import { addAlert, listAlerts } from '@/data/alerts';
import { apiErrorResponse, readJsonBody, resultResponse } from '@/lib/apiError';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    return NextResponse.json(await listAlerts(getDataPaths().alerts));
  } catch (error) {
    return apiErrorResponse(error, '/api/alerts');
  }
}

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const result = await addAlert(getDataPaths().alerts, body);
    return resultResponse(result, (alert) => alert, 201);
  } catch (error) {
    return apiErrorResponse(error, '/api/alerts');
  }
}
