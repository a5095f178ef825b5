import { NextRequest, NextResponse } from 'next/server';
import { apiError } from '@/lib/apiError';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/** No market data provider is configured: empty for no tickers, otherwise 501. */
export async function GET(request: NextRequest) {
  const tickers = request.nextUrl.searchParams.get('tickers') ?? '';
  if (!tickers.trim()) {
    return NextResponse.json({});
  }
  return apiError('Market data API not configured', 501);
}
