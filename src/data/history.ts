/**
 * Scan history: one immutable JSON file per archived snapshot.
 */

import { readdir } from 'fs/promises';
import { join } from 'path';
import { formatSnapshotStamp } from '@/core/time';
import { notFound, ok, persistenceError, type Result } from '@/core/result';
import { createChildLogger } from '@/utils/logger';
import { isErrnoException } from '@/utils/errors';
import { isScanSnapshot } from '@/validation/ajv_instance';
import { readJsonDocument, saveJsonFile } from './json_store';
import type { SnapshotArchiver } from '@/scan/cache';
import type { HistoryEntry, ScanSnapshot } from '@/types/scan';

const logger = createChildLogger('history');

export const HISTORY_FILENAME_PATTERN = /^scan_\d{4}-\d{2}-\d{2}_\d{4}(?:_\d+)?\.json$/;

async function listHistoryFilenames(historyDir: string): Promise<string[]> {
  try {
    const names = await readdir(historyDir);
    return names.filter((name) => HISTORY_FILENAME_PATTERN.test(name));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

/** First free name for the capture minute: `scan_<stamp>.json`, then `_2`, `_3`, ... */
function pickFilename(stamp: string, taken: Set<string>): string {
  const base = `scan_${stamp}`;
  if (!taken.has(`${base}.json`)) {
    return `${base}.json`;
  }
  let suffix = 2;
  while (taken.has(`${base}_${suffix}.json`)) {
    suffix += 1;
  }
  return `${base}_${suffix}.json`;
}

export async function archiveSnapshot(
  historyDir: string,
  snapshot: ScanSnapshot,
  capturedAt: Date
): Promise<Result<string>> {
  let existing: string[];
  try {
    existing = await listHistoryFilenames(historyDir);
  } catch (error) {
    logger.error({ err: error }, 'Failed to read history directory');
    return persistenceError('Failed to read scan history');
  }

  const filename = pickFilename(formatSnapshotStamp(capturedAt), new Set(existing));
  const saved = await saveJsonFile(join(historyDir, filename), snapshot);
  if (!saved) {
    return persistenceError('Failed to archive scan snapshot');
  }

  logger.info({ filename, scanTime: snapshot.scan_time }, 'Archived scan snapshot');
  return ok(filename);
}

export function createHistoryArchiver(historyDir: string): SnapshotArchiver {
  return async (snapshot, capturedAtMs) => {
    const result = await archiveSnapshot(historyDir, snapshot, new Date(capturedAtMs));
    return result.ok;
  };
}

async function readHistorySnapshot(historyDir: string, filename: string): Promise<ScanSnapshot | null> {
  const outcome = await readJsonDocument(join(historyDir, filename));
  if (outcome.status === 'error') {
    logger.warn({ filename, err: outcome.error }, 'Unreadable history file');
    return null;
  }
  if (outcome.status === 'missing') {
    return null;
  }
  if (!isScanSnapshot(outcome.value)) {
    logger.warn({ filename }, 'History file has an unexpected shape');
    return null;
  }
  return outcome.value;
}

/** Newest first; unreadable files are skipped. */
export async function listHistory(historyDir: string): Promise<Result<HistoryEntry[]>> {
  let filenames: string[];
  try {
    filenames = await listHistoryFilenames(historyDir);
  } catch (error) {
    logger.error({ err: error }, 'Failed to read history directory');
    return persistenceError('Failed to read scan history');
  }

  // The stamp sorts lexically; a same-minute suffix sorts after its base name
  filenames.sort((a, b) => compareHistoryNames(b, a));

  const entries: HistoryEntry[] = [];
  for (const filename of filenames) {
    const snapshot = await readHistorySnapshot(historyDir, filename);
    if (snapshot) {
      entries.push({ filename, scan_time: snapshot.scan_time, stock_count: snapshot.stocks.length });
    }
  }
  return ok(entries);
}

function historySortKey(filename: string): [string, number] {
  const match = /^scan_(\d{4}-\d{2}-\d{2}_\d{4})(?:_(\d+))?\.json$/.exec(filename);
  if (!match) return [filename, 0];
  return [match[1], match[2] ? Number.parseInt(match[2], 10) : 1];
}

function compareHistoryNames(a: string, b: string): number {
  const [stampA, seqA] = historySortKey(a);
  const [stampB, seqB] = historySortKey(b);
  if (stampA !== stampB) return stampA < stampB ? -1 : 1;
  return seqA - seqB;
}

export async function getHistorySnapshot(historyDir: string, filename: string): Promise<Result<ScanSnapshot>> {
  if (!HISTORY_FILENAME_PATTERN.test(filename)) {
    return notFound('History snapshot not found');
  }
  const snapshot = await readHistorySnapshot(historyDir, filename);
  if (!snapshot) {
    return notFound('History snapshot not found');
  }
  return ok(snapshot);
}
