/**
 * JSON document persistence
 *
 * Writes go to a sibling `.tmp` file which is fsynced and then renamed over
 * the target while holding `<file>.lock`, so readers see either the previous
 * complete document or the new one. Failures are logged and reported as
 * return values; nothing here throws.
 *
 * Read-modify-write callers go through `readJsonStore` or `readRecordList`:
 * a document that exists but cannot be used is a persistence failure, never
 * an empty fallback that the next save would write over the stored data.
 */

import { mkdir, open, readFile, rename } from 'fs/promises';
import { basename, dirname } from 'path';
import { ok, persistenceError, type Result } from '@/core/result';
import { createChildLogger } from '@/utils/logger';
import { isErrnoException } from '@/utils/errors';
import { withFileLock, type FileLockOptions } from './file_lock';

const logger = createChildLogger('json_store');

export type Guard<T> = (value: unknown) => value is T;

/** Returns the record in its stored form, coercing legacy encodings, or null when unusable. */
export type RecordNormalizer<T> = (value: unknown) => T | null;

export type ReadOutcome =
  | { status: 'ok'; value: unknown }
  | { status: 'missing' }
  | { status: 'error'; error: unknown };

export async function readJsonDocument(filePath: string): Promise<ReadOutcome> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return { status: 'missing' };
    }
    return { status: 'error', error };
  }

  try {
    const value: unknown = JSON.parse(raw);
    return { status: 'ok', value };
  } catch (error) {
    return { status: 'error', error };
  }
}

export async function loadJsonFile<T>(filePath: string, fallback: T, isValid: Guard<T>): Promise<T> {
  const outcome = await readJsonDocument(filePath);
  if (outcome.status === 'missing') {
    return fallback;
  }
  if (outcome.status === 'error') {
    logger.error({ filePath, err: outcome.error }, 'Failed to load JSON document');
    return fallback;
  }
  if (!isValid(outcome.value)) {
    logger.error({ filePath }, 'JSON document has an unexpected shape');
    return fallback;
  }
  return outcome.value;
}

export async function readJsonStore<T>(
  filePath: string,
  fallback: T,
  isValid: Guard<T>
): Promise<Result<T>> {
  const outcome = await readJsonDocument(filePath);
  if (outcome.status === 'missing') {
    return ok(fallback);
  }
  if (outcome.status === 'error') {
    logger.error({ filePath, err: outcome.error }, 'Failed to load JSON document');
    return persistenceError(`${basename(filePath)} could not be read`);
  }
  if (!isValid(outcome.value)) {
    logger.error({ filePath }, 'JSON document has an unexpected shape');
    return persistenceError(`${basename(filePath)} has an unexpected shape`);
  }
  return ok(outcome.value);
}

/** Lenient list read for display: unusable records are skipped and logged. */
export async function loadRecordList<T>(filePath: string, normalize: RecordNormalizer<T>): Promise<T[]> {
  const outcome = await readJsonDocument(filePath);
  if (outcome.status === 'missing') {
    return [];
  }
  if (outcome.status === 'error' || !Array.isArray(outcome.value)) {
    logger.error({ filePath }, 'JSON list could not be read');
    return [];
  }

  const records: T[] = [];
  let skipped = 0;
  for (const item of outcome.value) {
    const record = normalize(item);
    if (record) {
      records.push(record);
    } else {
      skipped += 1;
    }
  }
  if (skipped > 0) {
    logger.warn({ filePath, skipped }, 'Skipped records with an unexpected shape');
  }
  return records;
}

/** Strict list read for writers: every record must be usable. */
export async function readRecordList<T>(
  filePath: string,
  normalize: RecordNormalizer<T>
): Promise<Result<T[]>> {
  const outcome = await readJsonDocument(filePath);
  if (outcome.status === 'missing') {
    return ok([]);
  }
  if (outcome.status === 'error' || !Array.isArray(outcome.value)) {
    logger.error({ filePath }, 'JSON list could not be read');
    return persistenceError(`${basename(filePath)} could not be read`);
  }

  const records: T[] = [];
  for (const [index, item] of outcome.value.entries()) {
    const record = normalize(item);
    if (!record) {
      logger.error({ filePath, index }, 'Stored record has an unexpected shape');
      return persistenceError(`${basename(filePath)} has an unreadable record at index ${index}`);
    }
    records.push(record);
  }
  return ok(records);
}

export async function saveJsonFile(
  filePath: string,
  document: unknown,
  lockOptions?: FileLockOptions
): Promise<boolean> {
  const tmpPath = `${filePath}.tmp`;
  const lockPath = `${filePath}.lock`;

  try {
    const content = JSON.stringify(document, null, 2);
    if (content === undefined) {
      throw new Error('Document is not JSON-serializable');
    }

    await mkdir(dirname(filePath), { recursive: true });
    await withFileLock(
      lockPath,
      async () => {
        const handle = await open(tmpPath, 'w');
        try {
          await handle.writeFile(content, 'utf-8');
          await handle.sync();
        } finally {
          await handle.close();
        }
        await rename(tmpPath, filePath);
      },
      lockOptions
    );
    return true;
  } catch (error) {
    logger.error({ filePath, err: error }, 'Failed to save JSON document');
    return false;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isUnknownArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}
