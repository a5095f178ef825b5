import { NextRequest } from 'next/server';
import { getDataPaths } from '@/core/paths';
import { getRoutineCalendar } from '@/data/routines';
import { apiError, apiErrorResponse, resultResponse } from '@/lib/apiError';
import { parseInteger } from '@/lib/inputValidation';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/** Month summary of filled-in routines; defaults to the current month. */
export async function GET(request: NextRequest) {
  try {
    const today = new Date();
    const searchParams = request.nextUrl.searchParams;
    const year = parseInteger(searchParams.get('year') ?? today.getFullYear());
    const month = parseInteger(searchParams.get('month') ?? today.getMonth() + 1);

    if (year === null || month === null) {
      return apiError('Invalid year or month', 400);
    }

    const result = await getRoutineCalendar(getDataPaths().routinesDir, year, month);
    return resultResponse(result, (calendar) => calendar);
  } catch (error) {
    return apiErrorResponse(error, '/api/routine');
  }
}
