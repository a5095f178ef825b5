import { notFound, ok, persistenceError, validationError, type Result } from '@/core/result';
import { pickEnum, validateNumberField, validateTicker } from '@/lib/inputValidation';
import { createChildLogger } from '@/utils/logger';
import { isRecord, loadRecordList, readRecordList, saveJsonFile } from './json_store';
import { storedNumber, storedText } from './records';
import type { AlertCondition, PriceAlert, PriceAlertInput } from '@/types/trackers';

const logger = createChildLogger('alerts');

const ALERT_CONDITIONS: readonly AlertCondition[] = ['above', 'below'];

function toPriceAlert(value: unknown): PriceAlert | null {
  if (!isRecord(value)) return null;

  const price = storedNumber(value.price);
  const created = storedText(value.created);
  const condition = pickEnum(value.condition, ALERT_CONDITIONS);
  if (typeof value.ticker !== 'string' || price === undefined || created === undefined || condition === null) {
    return null;
  }
  return {
    ticker: value.ticker,
    condition,
    price,
    created,
    triggered: value.triggered === true,
  };
}

export async function listAlerts(filePath: string): Promise<PriceAlert[]> {
  return loadRecordList(filePath, toPriceAlert);
}

export async function addAlert(
  filePath: string,
  input: PriceAlertInput,
  now: Date = new Date()
): Promise<Result<PriceAlert>> {
  const ticker = validateTicker(input.ticker);
  if (!ticker.valid) return validationError(ticker.error);

  const condition = pickEnum(input.condition ?? 'above', ALERT_CONDITIONS);
  if (!condition) return validationError('Invalid condition (must be above or below)');

  const price = validateNumberField(input.price ?? 0, {
    name: 'price',
    rangeHint: 'must be positive, max $1M',
    min: 0,
    max: 1_000_000,
  });
  if (!price.valid) return validationError(price.error);

  const alert: PriceAlert = {
    ticker: ticker.value,
    condition,
    price: price.value,
    created: now.toISOString(),
    triggered: false,
  };

  const loaded = await readRecordList(filePath, toPriceAlert);
  if (!loaded.ok) return persistenceError(loaded.error.message);

  const alerts = loaded.value;
  alerts.push(alert);
  if (!(await saveJsonFile(filePath, alerts))) {
    return persistenceError('Failed to save alert');
  }

  logger.info({ ticker: alert.ticker, condition, price: alert.price }, 'Alert added');
  return ok(alert);
}

/** Removes by position; later alerts shift down one index. */
export async function removeAlert(filePath: string, index: number): Promise<Result<PriceAlert>> {
  const loaded = await readRecordList(filePath, toPriceAlert);
  if (!loaded.ok) return persistenceError(loaded.error.message);

  const alerts = loaded.value;
  if (!Number.isInteger(index) || index < 0 || index >= alerts.length) {
    return notFound('Invalid index');
  }

  const [deleted] = alerts.splice(index, 1);
  if (!(await saveJsonFile(filePath, alerts))) {
    return persistenceError('Failed to delete alert');
  }
  return ok(deleted);
}
