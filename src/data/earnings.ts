import { ok, persistenceError, validationError, type Result } from '@/core/result';
import { validateTicker } from '@/lib/inputValidation';
import { isRecord, loadJsonFile, readJsonStore, saveJsonFile } from './json_store';
import type { EarningsMap } from '@/types/trackers';

function isEarningsMap(value: unknown): value is EarningsMap {
  return isRecord(value) && Object.values(value).every((date) => typeof date === 'string');
}

export async function listEarnings(filePath: string): Promise<EarningsMap> {
  return loadJsonFile(filePath, {}, isEarningsMap);
}

export interface EarningsEntry {
  ticker: string;
  date: string;
}

export async function setEarningsDate(
  filePath: string,
  rawTicker: unknown,
  rawDate: unknown
): Promise<Result<EarningsEntry>> {
  const ticker = validateTicker(rawTicker);
  const date = typeof rawDate === 'string' ? rawDate.trim() : '';
  if (!ticker.valid || !date) {
    return validationError('Invalid ticker or date');
  }

  const loaded = await readJsonStore<EarningsMap>(filePath, {}, isEarningsMap);
  if (!loaded.ok) return persistenceError(loaded.error.message);

  const earnings = loaded.value;
  earnings[ticker.value] = date;
  if (!(await saveJsonFile(filePath, earnings))) {
    return persistenceError('Failed to save earnings date');
  }
  return ok({ ticker: ticker.value, date });
}
