export type AlertCondition = 'above' | 'below';

export interface PriceAlert {
  ticker: string;
  condition: AlertCondition;
  price: number;
  created: string;
  triggered: boolean;
}

export interface PriceAlertInput {
  ticker?: unknown;
  condition?: unknown;
  price?: unknown;
}

export type EarningsMap = Record<string, string>;

export interface ScannerSettings {
  account_equity: number;
  risk_pct: number;
  max_positions: number;
}

export type StoredSettings = Partial<ScannerSettings> & Record<string, unknown>;

export type RoutinePhase = 'premarket' | 'postclose';

export const ROUTINE_PHASES: readonly RoutinePhase[] = ['premarket', 'postclose'];

export interface RoutineEntry {
  date: string;
  updated_at?: string;
  premarket?: Record<string, string>;
  postclose?: Record<string, string>;
}

export interface RoutineDayStatus {
  has_premarket: boolean;
  has_postclose: boolean;
}

export interface RoutineCalendarMonth {
  year: number;
  month: number;
  days_in_month: number;
  /** Keyed by day of month */
  days: Record<number, RoutineDayStatus>;
  prev: { year: number; month: number };
  next: { year: number; month: number };
}
