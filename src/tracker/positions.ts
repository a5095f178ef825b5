import { roundCents } from './covered_calls';
import type { PositionStats, PositionSummary, StockPosition, TradeType } from '@/types/trades';

export const DEFAULT_ACCOUNT = 'default';

export function costBasis(shares: number, entryPrice: number): number {
  return roundCents(shares * entryPrice);
}

function pnlPerShare(tradeType: TradeType, entryPrice: number, closePrice: number): number {
  return tradeType === 'long' ? closePrice - entryPrice : entryPrice - closePrice;
}

export function closePnl(
  position: Pick<StockPosition, 'trade_type' | 'entry_price' | 'shares'>,
  closePrice: number
): number {
  return roundCents(pnlPerShare(position.trade_type, position.entry_price, closePrice) * position.shares);
}

/** Null when the position has no usable stop (risk of zero). */
export function rMultiple(position: StockPosition): number | null {
  if (position.close_price === null) return null;
  const stop = position.stop_price !== null && position.stop_price > 0 ? position.stop_price : position.entry_price;
  const risk = Math.abs(position.entry_price - stop);
  if (risk <= 0) return null;
  return pnlPerShare(position.trade_type, position.entry_price, position.close_price) / risk;
}

function summarizeSubset(positions: StockPosition[]): PositionStats {
  const open = positions.filter((p) => p.status === 'open');
  const closed = positions.filter((p) => p.status === 'closed');

  const wins = closed.filter((p) => (p.pnl ?? 0) > 0).length;
  const rMultiples = closed.map(rMultiple).filter((r): r is number => r !== null);

  return {
    total_capital: open.reduce((sum, p) => sum + p.cost_basis, 0),
    total_pnl: closed.reduce((sum, p) => sum + (p.pnl ?? 0), 0),
    open_count: open.length,
    closed_count: closed.length,
    win_count: wins,
    loss_count: closed.length - wins,
    win_rate: closed.length > 0 ? (wins / closed.length) * 100 : 0,
    avg_r_multiple: rMultiples.length > 0 ? rMultiples.reduce((a, b) => a + b, 0) / rMultiples.length : 0,
  };
}

export function summarizePositions(positions: StockPosition[]): PositionSummary {
  const accounts = [...new Set(positions.map((p) => p.account || DEFAULT_ACCOUNT))].sort();
  const by_account: Record<string, PositionStats> = {};
  for (const account of accounts) {
    by_account[account] = summarizeSubset(positions.filter((p) => (p.account || DEFAULT_ACCOUNT) === account));
  }

  return {
    ...summarizeSubset(positions),
    accounts,
    by_account,
  };
}
