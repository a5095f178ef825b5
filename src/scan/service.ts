/**
 * Process-wide scan cache wired from the environment. Route handlers and the
 * fetch CLI share this instance.
 */

import { getEnvConfig } from '@/core/env';
import { getDataPaths } from '@/core/paths';
import { createHistoryArchiver } from '@/data/history';
import { ScanCache } from './cache';
import { GogSheetSource } from './source';

let scanCache: ScanCache | null = null;

export function getScanCache(): ScanCache {
  if (!scanCache) {
    const env = getEnvConfig();
    scanCache = new ScanCache({
      source: new GogSheetSource({
        sheetId: env.sheetId,
        range: env.sheetRange,
        account: env.gogAccount,
      }),
      archiver: createHistoryArchiver(getDataPaths(env.dataDir).historyDir),
      cacheDurationSeconds: env.cacheDurationSeconds,
    });
  }
  return scanCache;
}

/** Replaces the shared cache; with no argument the next call rebuilds it from the environment. */
export function resetScanCache(cache: ScanCache | null = null): void {
  scanCache = cache;
}
