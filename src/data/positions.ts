import { formatDate } from '@/core/time';
import { notFound, ok, persistenceError, validationError, type Result } from '@/core/result';
import {
  optionalText,
  parseNumber,
  pickEnum,
  validateDateField,
  validateNumberField,
  validateTicker,
  type FieldResult,
} from '@/lib/inputValidation';
import { createChildLogger } from '@/utils/logger';
import { closePnl, costBasis, DEFAULT_ACCOUNT, summarizePositions } from '@/tracker/positions';
import { nextId } from './ids';
import { isRecord, loadRecordList, readRecordList, saveJsonFile } from './json_store';
import { storedNullableNumber, storedNullableString, storedNumber, storedText } from './records';
import type {
  PositionStatus,
  PositionSummary,
  StockPosition,
  StockPositionInput,
  StockPositionUpdate,
  TradeType,
} from '@/types/trades';

const logger = createChildLogger('positions');

const TRADE_TYPES: readonly TradeType[] = ['long', 'short'];

const POSITION_STATUSES: readonly PositionStatus[] = ['open', 'closed'];

function toStockPosition(value: unknown): StockPosition | null {
  if (!isRecord(value)) return null;

  const id = storedNumber(value.id);
  const entryPrice = storedNumber(value.entry_price);
  const shares = storedNumber(value.shares);
  const cost = storedNumber(value.cost_basis);
  const stopPrice = storedNullableNumber(value.stop_price);
  const targetPrice = storedNullableNumber(value.target_price);
  const closePrice = storedNullableNumber(value.close_price);
  const pnl = storedNullableNumber(value.pnl);
  const closeDate = storedNullableString(value.close_date);
  const account = storedText(value.account, DEFAULT_ACCOUNT);
  const setupType = storedText(value.setup_type);
  const notes = storedText(value.notes);
  const createdAt = storedText(value.created_at);
  const tradeType = pickEnum(value.trade_type, TRADE_TYPES);
  const status = pickEnum(value.status, POSITION_STATUSES);

  if (
    id === undefined ||
    !Number.isInteger(id) ||
    typeof value.ticker !== 'string' ||
    typeof value.entry_date !== 'string' ||
    entryPrice === undefined ||
    shares === undefined ||
    cost === undefined ||
    stopPrice === undefined ||
    targetPrice === undefined ||
    closePrice === undefined ||
    pnl === undefined ||
    closeDate === undefined ||
    account === undefined ||
    setupType === undefined ||
    notes === undefined ||
    createdAt === undefined ||
    tradeType === null ||
    status === null
  ) {
    return null;
  }

  return {
    id,
    ticker: value.ticker,
    account,
    trade_type: tradeType,
    entry_date: value.entry_date,
    entry_price: entryPrice,
    shares,
    cost_basis: cost,
    stop_price: stopPrice,
    target_price: targetPrice,
    setup_type: setupType,
    status,
    close_date: closeDate,
    close_price: closePrice,
    pnl,
    notes,
    created_at: createdAt,
  };
}

/** Empty, null or 0 mean "no price"; anything else must be a positive number. */
function optionalPrice(raw: unknown, name: string): FieldResult<number | null> {
  if (raw === undefined || raw === null || raw === '') {
    return { valid: true, value: null };
  }
  const value = parseNumber(raw);
  if (value === 0) {
    return { valid: true, value: null };
  }
  if (value === null || value < 0 || value > 100_000) {
    return { valid: false, error: `Invalid ${name} (must be positive, max $100k)` };
  }
  return { valid: true, value };
}

export async function listPositions(filePath: string): Promise<StockPosition[]> {
  return loadRecordList(filePath, toStockPosition);
}

export async function getPositionBook(
  filePath: string
): Promise<{ positions: StockPosition[]; summary: PositionSummary }> {
  const positions = await listPositions(filePath);
  return { positions, summary: summarizePositions(positions) };
}

export async function addPosition(
  filePath: string,
  input: StockPositionInput,
  now: Date = new Date()
): Promise<Result<StockPosition>> {
  const ticker = validateTicker(input.ticker);
  if (!ticker.valid) return validationError(ticker.error);

  const shares = validateNumberField(input.shares ?? 0, {
    name: 'shares',
    rangeHint: 'must be 1-1,000,000',
    min: 1,
    max: 1_000_000,
    allowMin: true,
    integer: true,
  });
  if (!shares.valid) return validationError(shares.error);

  const entryPrice = validateNumberField(input.entry_price ?? 0, {
    name: 'entry price',
    rangeHint: 'must be positive, max $100k',
    min: 0,
    max: 100_000,
  });
  if (!entryPrice.valid) return validationError(entryPrice.error);

  const stop = optionalPrice(input.stop_price, 'stop price');
  if (!stop.valid) return validationError(stop.error);

  const target = optionalPrice(input.target_price, 'target price');
  if (!target.valid) return validationError(target.error);

  const tradeType = pickEnum(input.trade_type ?? 'long', TRADE_TYPES);
  if (!tradeType) return validationError('Invalid trade_type (must be long or short)');

  const entryDate = validateDateField(input.entry_date, 'entry_date', formatDate(now));
  if (!entryDate.valid) return validationError(entryDate.error);

  const loaded = await readRecordList(filePath, toStockPosition);
  if (!loaded.ok) return persistenceError(loaded.error.message);

  const positions = loaded.value;
  const position: StockPosition = {
    id: nextId(positions),
    ticker: ticker.value,
    account: optionalText(input.account, DEFAULT_ACCOUNT).trim() || DEFAULT_ACCOUNT,
    trade_type: tradeType,
    entry_date: entryDate.value,
    entry_price: entryPrice.value,
    shares: shares.value,
    cost_basis: costBasis(shares.value, entryPrice.value),
    stop_price: stop.value,
    target_price: target.value,
    setup_type: optionalText(input.setup_type, ''),
    status: 'open',
    close_date: null,
    close_price: null,
    pnl: null,
    notes: optionalText(input.notes, ''),
    created_at: now.toISOString(),
  };

  positions.push(position);
  if (!(await saveJsonFile(filePath, positions))) {
    return persistenceError('Failed to save position');
  }

  logger.info({ id: position.id, ticker: position.ticker, account: position.account }, 'Position added');
  return ok(position);
}

/**
 * Applies a partial update: `stop_price` moves the stop, `close_price` closes
 * the position and fixes its P&L, `notes` replaces the notes.
 */
export async function updatePosition(
  filePath: string,
  id: number,
  input: StockPositionUpdate,
  now: Date = new Date()
): Promise<Result<StockPosition>> {
  const changes: Partial<StockPosition> = {};

  if ('stop_price' in input) {
    const stop = optionalPrice(input.stop_price, 'stop price');
    if (!stop.valid) return validationError(stop.error);
    changes.stop_price = stop.value;
  }

  let closePrice: number | null = null;
  if ('close_price' in input) {
    const close = validateNumberField(input.close_price, {
      name: 'close price',
      rangeHint: 'must be positive, max $100k',
      min: 0,
      max: 100_000,
    });
    if (!close.valid) return validationError(close.error);
    closePrice = close.value;

    const closeDate = validateDateField(input.close_date, 'close_date', formatDate(now));
    if (!closeDate.valid) return validationError(closeDate.error);
    changes.close_date = closeDate.value;
  }

  if ('notes' in input) {
    if (typeof input.notes !== 'string') return validationError('Invalid notes (must be text)');
    changes.notes = input.notes;
  }

  const loaded = await readRecordList(filePath, toStockPosition);
  if (!loaded.ok) return persistenceError(loaded.error.message);

  const positions = loaded.value;
  const index = positions.findIndex((p) => p.id === id);
  if (index === -1) {
    return notFound('Position not found');
  }

  const current = positions[index];
  const updated: StockPosition = { ...current, ...changes };
  if (closePrice !== null) {
    updated.status = 'closed';
    updated.close_price = closePrice;
    updated.pnl = closePnl(current, closePrice);
  }
  positions[index] = updated;

  if (!(await saveJsonFile(filePath, positions))) {
    return persistenceError('Failed to save position');
  }

  logger.info({ id, status: updated.status }, 'Position updated');
  return ok(updated);
}

export async function removePosition(filePath: string, id: number): Promise<Result<StockPosition>> {
  const loaded = await readRecordList(filePath, toStockPosition);
  if (!loaded.ok) return persistenceError(loaded.error.message);

  const positions = loaded.value;
  const index = positions.findIndex((p) => p.id === id);
  if (index === -1) {
    return notFound('Position not found');
  }

  const [deleted] = positions.splice(index, 1);
  if (!(await saveJsonFile(filePath, positions))) {
    return persistenceError('Failed to delete position');
  }
  return ok(deleted);
}
