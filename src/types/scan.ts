export type SheetValues = string[][];

/** One candidate row keyed by header name; column order lives in `ScanSnapshot.headers`. */
export type StockRow = Record<string, string>;

export interface MarketStatus {
  regime: string;
  dist_days: string;
  buy_ok: string;
}

export interface AccountStatus {
  balance: string;
  risk_per_trade: string;
  actionable: string;
}

export interface ScanSnapshot {
  scan_time: string;
  market: MarketStatus;
  account: AccountStatus;
  headers: string[];
  stocks: StockRow[];
  /** Fetch wall-clock time, epoch seconds */
  cache_time: number;
}

export interface HistoryEntry {
  filename: string;
  scan_time: string;
  stock_count: number;
}
