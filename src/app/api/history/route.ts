import { getDataPaths } from '@/core/paths';
import { listHistory } from '@/data/history';
import { apiErrorResponse, resultResponse } from '@/lib/apiError';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    return resultResponse(await listHistory(getDataPaths().historyDir), (entries) => entries);
  } catch (error) {
    return apiErrorResponse(error, '/api/history');
  }
}
