/**
 * Scanner settings
 *
 * Reads back-fill missing keys from the defaults; writes persist only what was
 * already stored plus the keys being updated, so defaults never leak to disk.
 */

import { ok, persistenceError, validationError, type Result } from '@/core/result';
import { validateNumberField, type FieldResult, type NumberRule } from '@/lib/inputValidation';
import { createChildLogger } from '@/utils/logger';
import { isRecord, loadJsonFile, readJsonStore, saveJsonFile } from './json_store';
import type { ScannerSettings, StoredSettings } from '@/types/trackers';

const logger = createChildLogger('settings');

export const DEFAULT_SETTINGS: ScannerSettings = {
  account_equity: 100_000,
  risk_pct: 0.01,
  max_positions: 6,
};

const SETTING_RULES: Record<keyof ScannerSettings, NumberRule> = {
  account_equity: {
    name: 'account_equity',
    rangeHint: 'must be positive',
    min: 0,
    max: Number.MAX_SAFE_INTEGER,
  },
  risk_pct: {
    name: 'risk_pct',
    rangeHint: 'must be greater than 0 and at most 1',
    min: 0,
    max: 1,
  },
  max_positions: {
    name: 'max_positions',
    rangeHint: 'must be at least 1',
    min: 1,
    max: 1000,
    allowMin: true,
    integer: true,
  },
};

const SETTING_KEYS: ReadonlyArray<keyof ScannerSettings> = ['account_equity', 'risk_pct', 'max_positions'];

function isStoredSettings(value: unknown): value is StoredSettings {
  return isRecord(value);
}

function storedNumber(stored: StoredSettings, key: keyof ScannerSettings): number {
  const value = stored[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : DEFAULT_SETTINGS[key];
}

function withDefaults(stored: StoredSettings): StoredSettings & ScannerSettings {
  return {
    ...stored,
    account_equity: storedNumber(stored, 'account_equity'),
    risk_pct: storedNumber(stored, 'risk_pct'),
    max_positions: storedNumber(stored, 'max_positions'),
  };
}

async function loadStoredSettings(filePath: string): Promise<StoredSettings> {
  return loadJsonFile<StoredSettings>(filePath, {}, isStoredSettings);
}

export async function getSettings(filePath: string): Promise<StoredSettings & ScannerSettings> {
  return withDefaults(await loadStoredSettings(filePath));
}

export async function updateSettings(
  filePath: string,
  input: Record<string, unknown>
): Promise<Result<StoredSettings & ScannerSettings>> {
  const updates: Partial<ScannerSettings> = {};
  for (const key of SETTING_KEYS) {
    if (!(key in input)) continue;
    const field: FieldResult<number> = validateNumberField(input[key], SETTING_RULES[key]);
    if (!field.valid) return validationError(field.error);
    updates[key] = field.value;
  }

  const loaded = await readJsonStore<StoredSettings>(filePath, {}, isStoredSettings);
  if (!loaded.ok) return persistenceError(loaded.error.message);

  const next: StoredSettings = { ...loaded.value, ...updates };
  if (!(await saveJsonFile(filePath, next))) {
    return persistenceError('Failed to save settings');
  }

  logger.info({ updated: Object.keys(updates) }, 'Settings updated');
  return ok(withDefaults(next));
}
