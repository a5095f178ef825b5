import { NextResponse } from 'next/server';

export const runtime = 'nodejs';

const APP_NAME = 'canslim-dashboard';

export async function GET() {
  return NextResponse.json({ status: 'ok', app: APP_NAME });
}
