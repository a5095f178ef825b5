/**
 * Covered-call trade log
 * Ids are `max(existing) + 1`, so ids below the current maximum are never handed out again.
 */

import { formatDate } from '@/core/time';
import { notFound, ok, persistenceError, validationError, type Result } from '@/core/result';
import {
  optionalText,
  parseNumber,
  pickEnum,
  validateDateField,
  validateNumberField,
  validateTicker,
} from '@/lib/inputValidation';
import { createChildLogger } from '@/utils/logger';
import { closeCoveredCall, DEFAULT_CALL_TICKER, premiumTotal, summarizeCoveredCalls } from '@/tracker/covered_calls';
import { nextId } from './ids';
import { isRecord, loadRecordList, readRecordList, saveJsonFile } from './json_store';
import { storedNullableNumber, storedNullableString, storedNumber, storedText } from './records';
import {
  COVERED_CALL_CLOSE_STATUSES,
  type CoveredCallCloseInput,
  type CoveredCallInput,
  type CoveredCallStatus,
  type CoveredCallSummary,
  type CoveredCallTrade,
} from '@/types/trades';

const logger = createChildLogger('covered_calls');

const DEFAULT_DELTA = 0.1;

const TRADE_STATUSES: readonly CoveredCallStatus[] = ['open', ...COVERED_CALL_CLOSE_STATUSES];

function toCoveredCallTrade(value: unknown): CoveredCallTrade | null {
  if (!isRecord(value)) return null;

  const id = storedNumber(value.id);
  const strike = storedNumber(value.strike);
  const contracts = storedNumber(value.contracts);
  const premiumPerContract = storedNumber(value.premium_per_contract);
  const total = storedNumber(value.premium_total);
  const delta = storedNumber(value.delta);
  const stockPrice = storedNumber(value.stock_price_at_sell);
  const closePrice = storedNullableNumber(value.close_price);
  const pnl = storedNullableNumber(value.pnl);
  const closeDate = storedNullableString(value.close_date);
  const expiry = storedText(value.expiry);
  const notes = storedText(value.notes);
  const createdAt = storedText(value.created_at);
  const status = pickEnum(value.status, TRADE_STATUSES);

  if (
    id === undefined ||
    !Number.isInteger(id) ||
    typeof value.ticker !== 'string' ||
    typeof value.sell_date !== 'string' ||
    strike === undefined ||
    contracts === undefined ||
    premiumPerContract === undefined ||
    total === undefined ||
    delta === undefined ||
    stockPrice === undefined ||
    closePrice === undefined ||
    pnl === undefined ||
    closeDate === undefined ||
    expiry === undefined ||
    notes === undefined ||
    createdAt === undefined ||
    status === null
  ) {
    return null;
  }

  return {
    id,
    ticker: value.ticker,
    sell_date: value.sell_date,
    expiry,
    strike,
    contracts,
    premium_per_contract: premiumPerContract,
    premium_total: total,
    delta,
    stock_price_at_sell: stockPrice,
    status,
    close_date: closeDate,
    close_price: closePrice,
    pnl,
    notes,
    created_at: createdAt,
  };
}

export async function listCoveredCalls(filePath: string): Promise<CoveredCallTrade[]> {
  return loadRecordList(filePath, toCoveredCallTrade);
}

export async function getCoveredCallBook(
  filePath: string
): Promise<{ trades: CoveredCallTrade[]; summary: CoveredCallSummary }> {
  const trades = await listCoveredCalls(filePath);
  return { trades, summary: summarizeCoveredCalls(trades) };
}

export async function addCoveredCall(
  filePath: string,
  input: CoveredCallInput,
  now: Date = new Date()
): Promise<Result<CoveredCallTrade>> {
  const ticker = validateTicker(input.ticker, DEFAULT_CALL_TICKER);
  if (!ticker.valid) return validationError(ticker.error);

  const contracts = validateNumberField(input.contracts ?? 1, {
    name: 'contracts',
    rangeHint: 'must be 1-10,000',
    min: 1,
    max: 10_000,
    allowMin: true,
    integer: true,
  });
  if (!contracts.valid) return validationError(contracts.error);

  const premium = validateNumberField(input.premium_per_contract ?? 0, {
    name: 'premium',
    rangeHint: 'must be 0-$10,000',
    min: 0,
    max: 10_000,
    allowMin: true,
  });
  if (!premium.valid) return validationError(premium.error);

  const strike = validateNumberField(input.strike ?? 0, {
    name: 'strike',
    rangeHint: 'must be positive, max $100k',
    min: 0,
    max: 100_000,
  });
  if (!strike.valid) return validationError(strike.error);

  const sellDate = validateDateField(input.sell_date, 'sell_date', formatDate(now));
  if (!sellDate.valid) return validationError(sellDate.error);

  const expiry = validateDateField(input.expiry, 'expiry', '');
  if (!expiry.valid) return validationError(expiry.error);

  const delta = input.delta === undefined ? DEFAULT_DELTA : parseNumber(input.delta);
  if (delta === null) return validationError('Invalid delta (must be a number)');

  const stockPrice = input.stock_price === undefined ? 0 : parseNumber(input.stock_price);
  if (stockPrice === null || stockPrice < 0) {
    return validationError('Invalid stock price (must be a non-negative number)');
  }

  const loaded = await readRecordList(filePath, toCoveredCallTrade);
  if (!loaded.ok) return persistenceError(loaded.error.message);

  const trades = loaded.value;
  const trade: CoveredCallTrade = {
    id: nextId(trades),
    ticker: ticker.value,
    sell_date: sellDate.value,
    expiry: expiry.value,
    strike: strike.value,
    contracts: contracts.value,
    premium_per_contract: premium.value,
    premium_total: premiumTotal(premium.value, contracts.value),
    delta,
    stock_price_at_sell: stockPrice,
    status: 'open',
    close_date: null,
    close_price: null,
    pnl: null,
    notes: optionalText(input.notes, ''),
    created_at: now.toISOString(),
  };

  trades.push(trade);
  if (!(await saveJsonFile(filePath, trades))) {
    return persistenceError('Failed to save trade');
  }

  logger.info({ id: trade.id, ticker: trade.ticker }, 'Covered call added');
  return ok(trade);
}

export async function closeCoveredCallTrade(
  filePath: string,
  id: number,
  input: CoveredCallCloseInput,
  now: Date = new Date()
): Promise<Result<CoveredCallTrade>> {
  const status = pickEnum(input.status ?? 'expired', COVERED_CALL_CLOSE_STATUSES);
  if (status === null || status === 'open') {
    return validationError('Invalid status (must be expired, called_away or closed_other)');
  }

  const closeDate = validateDateField(input.close_date, 'close_date', formatDate(now));
  if (!closeDate.valid) return validationError(closeDate.error);

  const buyback = validateNumberField(input.buyback_price ?? 0, {
    name: 'buyback price',
    rangeHint: 'must be 0 or more',
    min: 0,
    max: 100_000,
    allowMin: true,
  });
  if (!buyback.valid) return validationError(buyback.error);

  const loaded = await readRecordList(filePath, toCoveredCallTrade);
  if (!loaded.ok) return persistenceError(loaded.error.message);

  const trades = loaded.value;
  const index = trades.findIndex((t) => t.id === id);
  if (index === -1) {
    return notFound('Trade not found');
  }

  const current = trades[index];
  const close = closeCoveredCall(current, status, buyback.value);
  const updated: CoveredCallTrade = {
    ...current,
    status,
    close_date: closeDate.value,
    close_price: close.close_price,
    pnl: close.pnl,
    notes: optionalText(input.notes, current.notes),
  };
  trades[index] = updated;

  if (!(await saveJsonFile(filePath, trades))) {
    return persistenceError('Failed to save trade');
  }

  logger.info({ id, status, pnl: updated.pnl }, 'Covered call closed');
  return ok(updated);
}

export async function removeCoveredCall(filePath: string, id: number): Promise<Result<CoveredCallTrade>> {
  const loaded = await readRecordList(filePath, toCoveredCallTrade);
  if (!loaded.ok) return persistenceError(loaded.error.message);

  const trades = loaded.value;
  const index = trades.findIndex((t) => t.id === id);
  if (index === -1) {
    return notFound('Trade not found');
  }

  const [deleted] = trades.splice(index, 1);
  if (!(await saveJsonFile(filePath, trades))) {
    return persistenceError('Failed to delete trade');
  }
  return ok(deleted);
}
