/**
 * Fetch Scan Script
 * Pulls the scan sheet once, archives it to history when it is a new scan,
 * and prints a short summary.
 *
 * Usage: npx tsx scripts/fetch_scan.ts [--json] [--no-archive]
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { getEnvConfig } from '../src/core/env';
import { getDataPaths } from '../src/core/paths';
import { createHistoryArchiver } from '../src/data/history';
import { getSettings } from '../src/data/settings';
import { ScanCache } from '../src/scan/cache';
import { annotatePositionSizing } from '../src/scan/sizing';
import { GogSheetSource } from '../src/scan/source';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('fetch_scan');

interface FetchScanCliArgs {
  json: boolean;
  archive: boolean;
}

function parseCliArgs(argv: string[]): FetchScanCliArgs {
  return {
    json: argv.includes('--json'),
    archive: !argv.includes('--no-archive'),
  };
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  const env = getEnvConfig();
  const paths = getDataPaths(env.dataDir);

  const cache = new ScanCache({
    source: new GogSheetSource({ sheetId: env.sheetId, range: env.sheetRange, account: env.gogAccount }),
    archiver: args.archive ? createHistoryArchiver(paths.historyDir) : undefined,
    cacheDurationSeconds: env.cacheDurationSeconds,
  });

  const result = await cache.get(true);
  if (result.status !== 'fresh') {
    const message = result.status === 'unavailable' || result.status === 'stale' ? result.error.message : 'no fetch';
    logger.error({ status: result.status, message }, 'Scan fetch failed');
    console.error(`Scan fetch failed: ${message}`);
    return 1;
  }

  const snapshot = annotatePositionSizing(result.snapshot, await getSettings(paths.settings));
  if (args.json) {
    console.log(JSON.stringify(snapshot, null, 2));
    return 0;
  }

  const sized = snapshot.stocks.filter((row) => row.Shares !== '').length;
  console.log('\n' + '='.repeat(50));
  console.log('SCAN FETCHED');
  console.log('='.repeat(50));
  console.log(`Scan Time:     ${snapshot.scan_time}`);
  console.log(`Regime:        ${snapshot.market.regime || '-'}`);
  console.log(`Buy OK:        ${snapshot.market.buy_ok || '-'}`);
  console.log(`Candidates:    ${snapshot.stocks.length} (${sized} sized)`);
  console.log(`Archived:      ${result.archived ? 'yes' : 'no'}`);
  console.log('='.repeat(50) + '\n');
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, 'Fetch scan crashed');
    process.exitCode = 1;
  });
