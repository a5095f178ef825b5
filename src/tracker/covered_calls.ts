/**
 * Covered-call P&L
 *
 * Close P&L is fixed when a trade is closed and stored on the trade; the
 * summary is recomputed from the stored trades on every read.
 */

import type {
  CoveredCallStats,
  CoveredCallStatus,
  CoveredCallSummary,
  CoveredCallTrade,
} from '@/types/trades';

export const DEFAULT_CAPITAL_BASE = 100_000;
export const DEFAULT_CALL_TICKER = 'SPY';

const SHARES_PER_CONTRACT = 100;

export function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

export function premiumTotal(premiumPerContract: number, contracts: number): number {
  return roundCents(premiumPerContract * contracts * SHARES_PER_CONTRACT);
}

export interface CoveredCallClose {
  pnl: number;
  close_price: number | null;
}

/**
 * expired: the premium is kept.
 * called_away: premium plus the move from the stock price at sale to the strike.
 * closed_other: premium minus the buyback cost.
 */
export function closeCoveredCall(
  trade: Pick<CoveredCallTrade, 'premium_total' | 'strike' | 'contracts' | 'stock_price_at_sell' | 'close_price'>,
  status: Exclude<CoveredCallStatus, 'open'>,
  buybackPrice: number
): CoveredCallClose {
  switch (status) {
    case 'expired':
      return { pnl: trade.premium_total, close_price: trade.close_price };
    case 'called_away': {
      const appreciation = (trade.strike - trade.stock_price_at_sell) * trade.contracts * SHARES_PER_CONTRACT;
      return { pnl: roundCents(trade.premium_total + appreciation), close_price: trade.close_price };
    }
    case 'closed_other': {
      const buyback = buybackPrice * trade.contracts * SHARES_PER_CONTRACT;
      return { pnl: roundCents(trade.premium_total - buyback), close_price: buybackPrice };
    }
  }
}

function emptyStats(): CoveredCallStats {
  return {
    total_premium: 0,
    total_pnl: 0,
    total_trades: 0,
    open: 0,
    expired: 0,
    called_away: 0,
    closed_other: 0,
    weekly_avg: 0,
    annualized_yield: 0,
  };
}

function summarizeSubset(trades: CoveredCallTrade[], capital: number): CoveredCallStats {
  if (trades.length === 0) {
    return emptyStats();
  }

  const stats = emptyStats();
  const sellMonths = new Set<string>();

  for (const trade of trades) {
    stats.total_premium += trade.premium_total;
    stats[trade.status] += 1;
    if (trade.status !== 'open') {
      stats.total_pnl += trade.pnl ?? trade.premium_total;
    }
    if (trade.sell_date) {
      sellMonths.add(trade.sell_date.slice(0, 7));
    }
  }

  const months = Math.max(sellMonths.size, 1);
  stats.total_trades = trades.length;
  stats.weekly_avg = stats.total_premium / trades.length;
  stats.annualized_yield = ((stats.total_premium / months) * 12) / Math.max(capital, 1) * 100;
  return stats;
}

export function summarizeCoveredCalls(
  trades: CoveredCallTrade[],
  capital: number = DEFAULT_CAPITAL_BASE
): CoveredCallSummary {
  const byTicker = new Map<string, CoveredCallTrade[]>();
  for (const trade of trades) {
    const ticker = trade.ticker || DEFAULT_CALL_TICKER;
    const bucket = byTicker.get(ticker) ?? [];
    bucket.push(trade);
    byTicker.set(ticker, bucket);
  }

  const tickers = [...byTicker.keys()].sort();
  const by_ticker: Record<string, CoveredCallStats> = {};
  for (const ticker of tickers) {
    by_ticker[ticker] = summarizeSubset(byTicker.get(ticker) ?? [], capital);
  }

  return {
    ...summarizeSubset(trades, capital),
    tickers,
    by_ticker,
  };
}
