import { NextResponse } from 'next/server';
import { apiError, apiErrorResponse } from '@/lib/apiError';
import { loadAnnotatedScan, SCAN_CACHE_HEADER } from '@/lib/scanResponse';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    const scan = await loadAnnotatedScan();
    if (!scan.available) {
      return apiError('Failed to fetch data', 503);
    }

    return NextResponse.json(scan.snapshot, {
      headers: { [SCAN_CACHE_HEADER]: scan.status },
    });
  } catch (error) {
    return apiErrorResponse(error, '/api/data');
  }
}
