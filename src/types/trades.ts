export type CoveredCallStatus = 'open' | 'expired' | 'called_away' | 'closed_other';

export const COVERED_CALL_CLOSE_STATUSES: readonly CoveredCallStatus[] = [
  'expired',
  'called_away',
  'closed_other',
];

export interface CoveredCallTrade {
  id: number;
  ticker: string;
  sell_date: string;
  expiry: string;
  strike: number;
  contracts: number;
  premium_per_contract: number;
  premium_total: number;
  delta: number;
  stock_price_at_sell: number;
  status: CoveredCallStatus;
  close_date: string | null;
  close_price: number | null;
  pnl: number | null;
  notes: string;
  created_at: string;
}

export interface CoveredCallInput {
  ticker?: unknown;
  sell_date?: unknown;
  expiry?: unknown;
  strike?: unknown;
  contracts?: unknown;
  premium_per_contract?: unknown;
  delta?: unknown;
  stock_price?: unknown;
  notes?: unknown;
}

export interface CoveredCallCloseInput {
  status?: unknown;
  close_date?: unknown;
  buyback_price?: unknown;
  notes?: unknown;
}

export interface CoveredCallStats {
  total_premium: number;
  total_pnl: number;
  total_trades: number;
  open: number;
  expired: number;
  called_away: number;
  closed_other: number;
  weekly_avg: number;
  annualized_yield: number;
}

export interface CoveredCallSummary extends CoveredCallStats {
  tickers: string[];
  by_ticker: Record<string, CoveredCallStats>;
}

export type TradeType = 'long' | 'short';
export type PositionStatus = 'open' | 'closed';

export interface StockPosition {
  id: number;
  ticker: string;
  account: string;
  trade_type: TradeType;
  entry_date: string;
  entry_price: number;
  shares: number;
  cost_basis: number;
  stop_price: number | null;
  target_price: number | null;
  setup_type: string;
  status: PositionStatus;
  close_date: string | null;
  close_price: number | null;
  pnl: number | null;
  notes: string;
  created_at: string;
}

export interface StockPositionInput {
  ticker?: unknown;
  account?: unknown;
  trade_type?: unknown;
  entry_date?: unknown;
  entry_price?: unknown;
  shares?: unknown;
  stop_price?: unknown;
  target_price?: unknown;
  setup_type?: unknown;
  notes?: unknown;
}

export interface StockPositionUpdate {
  stop_price?: unknown;
  close_price?: unknown;
  close_date?: unknown;
  notes?: unknown;
}

export interface PositionStats {
  total_capital: number;
  total_pnl: number;
  open_count: number;
  closed_count: number;
  win_count: number;
  loss_count: number;
  win_rate: number;
  avg_r_multiple: number;
}

export interface PositionSummary extends PositionStats {
  accounts: string[];
  by_account: Record<string, PositionStats>;
}
