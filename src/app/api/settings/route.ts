import { NextRequest, NextResponse } from 'next/server';
import { getDataPaths } from '@/core/paths';
import { getSettings, updateSettings } from '@/data/settings';
import { apiErrorResponse, readJsonBody, resultResponse } from '@/lib/apiError';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    return NextResponse.json(await getSettings(getDataPaths().settings));
  } catch (error) {
    return apiErrorResponse(error, '/api/settings');
  }
}

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const result = await updateSettings(getDataPaths().settings, body);
    return resultResponse(result, (settings) => settings);
  } catch (error) {
    return apiErrorResponse(error, '/api/settings');
  }
}
