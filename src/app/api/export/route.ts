import { NextRequest, NextResponse } from 'next/server';
import { apiError, apiErrorResponse } from '@/lib/apiError';
import { loadAnnotatedScan } from '@/lib/scanResponse';
import { getExportFilename, snapshotToCsv } from '@/scan/export';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET(request: NextRequest) {
  try {
    const scan = await loadAnnotatedScan();
    if (!scan.available) {
      return apiError('Failed to fetch data', 503);
    }

    const filter = request.nextUrl.searchParams.get('filter') ?? '';
    return new NextResponse(snapshotToCsv(scan.snapshot, filter), {
      headers: {
        'Content-Type': 'text/csv; charset=utf-8',
        'Content-Disposition': `attachment; filename="${getExportFilename()}"`,
      },
    });
  } catch (error) {
    return apiErrorResponse(error, '/api/export');
  }
}
