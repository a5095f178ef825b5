import { NextResponse } from 'next/server';
import { apiError, apiErrorResponse } from '@/lib/apiError';
import { loadAnnotatedScan, SCAN_CACHE_HEADER } from '@/lib/scanResponse';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    const scan = await loadAnnotatedScan(true);
    if (!scan.available) {
      return apiError('Failed to refresh data', 503);
    }
    if (scan.status === 'stale') {
      // The forced fetch failed; the previous snapshot is still served
      return NextResponse.json(
        { ...scan.snapshot, warning: scan.warning },
        { headers: { [SCAN_CACHE_HEADER]: scan.status } }
      );
    }

    return NextResponse.json(scan.snapshot, {
      headers: { [SCAN_CACHE_HEADER]: scan.status },
    });
  } catch (error) {
    return apiErrorResponse(error, '/api/refresh');
  }
}
