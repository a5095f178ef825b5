/**
 * Position sizing for scan candidates: risk a fixed fraction of equity
 * between the pivot (entry) and the stop.
 */

import { parseNumber } from '@/lib/inputValidation';
import type { ScanSnapshot, StockRow } from '@/types/scan';
import type { ScannerSettings } from '@/types/trackers';

export interface PositionSize {
  shares: number;
  cost: number;
}

type SizingSettings = Pick<ScannerSettings, 'account_equity' | 'risk_pct'>;

const costFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function riskPerTrade(settings: SizingSettings): number {
  return settings.account_equity * settings.risk_pct;
}

/** Null when pivot/stop are unparseable, non-positive, or the stop is not below the pivot. */
export function computePositionSize(
  pivotRaw: string | undefined,
  stopRaw: string | undefined,
  riskAmount: number
): PositionSize | null {
  const pivot = parseNumber(pivotRaw);
  const stop = parseNumber(stopRaw);
  if (pivot === null || stop === null || pivot <= 0 || stop <= 0 || pivot <= stop) {
    return null;
  }

  const shares = Math.floor(riskAmount / (pivot - stop));
  return { shares, cost: shares * pivot };
}

export function formatCost(cost: number): string {
  return costFormatter.format(cost);
}

/**
 * Ensures `Shares` and `Cost` are columns, with `Cost` directly after `Shares`.
 * Idempotent.
 */
export function withSizingHeaders(headers: string[]): string[] {
  const next = [...headers];
  if (!next.includes('Shares')) {
    next.push('Shares');
  }
  if (!next.includes('Cost')) {
    next.splice(next.indexOf('Shares') + 1, 0, 'Cost');
  }
  return next;
}

function annotateRow(row: StockRow, riskAmount: number): StockRow {
  const size = computePositionSize(row.Pivot, row.Stop, riskAmount);
  return {
    ...row,
    Shares: size ? String(size.shares) : '',
    Cost: size ? formatCost(size.cost) : '',
  };
}

/** Returns an annotated copy; the input snapshot is left untouched. */
export function annotatePositionSizing(snapshot: ScanSnapshot, settings: SizingSettings): ScanSnapshot {
  const riskAmount = riskPerTrade(settings);
  return {
    ...snapshot,
    headers: withSizingHeaders(snapshot.headers),
    stocks: snapshot.stocks.map((row) => annotateRow(row, riskAmount)),
  };
}
