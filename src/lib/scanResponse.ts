import type { ScanCacheResult } from '@/scan/cache';
import { annotatePositionSizing } from '@/scan/sizing';
import { getScanCache } from '@/scan/service';
import { getDataPaths } from '@/core/paths';
import { getSettings } from '@/data/settings';
import type { ScanSnapshot } from '@/types/scan';

export const SCAN_CACHE_HEADER = 'X-Scan-Cache';

export type AnnotatedScan =
  | { available: true; status: Exclude<ScanCacheResult['status'], 'unavailable'>; snapshot: ScanSnapshot; warning?: string }
  | { available: false; message: string };

/** Cached (or freshly fetched) snapshot with position sizing from the current settings. */
export async function loadAnnotatedScan(force = false): Promise<AnnotatedScan> {
  const result = await getScanCache().get(force);
  if (result.status === 'unavailable') {
    return { available: false, message: result.error.message };
  }

  const settings = await getSettings(getDataPaths().settings);
  return {
    available: true,
    status: result.status,
    snapshot: annotatePositionSizing(result.snapshot, settings),
    warning: result.status === 'stale' ? result.error.message : undefined,
  };
}
