import type { ScanSnapshot, SheetValues, StockRow } from '@/types/scan';

export const MIN_SHEET_ROWS = 5;

const SCAN_TIME_ROW = 0;
const MARKET_ROW = 1;
const ACCOUNT_ROW = 2;
const HEADER_ROW = 4;
const FIRST_STOCK_ROW = 5;

function cell(row: string[] | undefined, index: number, fallback = ''): string {
  if (!row || row.length <= index) return fallback;
  return row[index];
}

function toStockRow(headers: string[], row: string[]): StockRow {
  const stock: StockRow = {};
  headers.forEach((header, index) => {
    stock[header] = index < row.length ? row[index] : '';
  });
  return stock;
}

/**
 * Parse the fixed-layout scan sheet.
 *
 * Row 0 carries the scan time in column 2, rows 1 and 2 the market and account
 * fields in columns 0/2/4, row 4 the headers and rows 5+ one candidate each.
 * Returns null when the sheet has fewer than five rows.
 */
export function parseSheetValues(values: SheetValues, cacheTime: number): ScanSnapshot | null {
  if (values.length < MIN_SHEET_ROWS) {
    return null;
  }

  const marketRow = values[MARKET_ROW];
  const accountRow = values[ACCOUNT_ROW];
  const headers = [...values[HEADER_ROW]];

  const stocks: StockRow[] = [];
  for (const row of values.slice(FIRST_STOCK_ROW)) {
    // Blank and single-cell rows are spacing, not candidates
    if (row.length > 1) {
      stocks.push(toStockRow(headers, row));
    }
  }

  return {
    scan_time: cell(values[SCAN_TIME_ROW], 2, 'Unknown'),
    market: {
      regime: cell(marketRow, 0),
      dist_days: cell(marketRow, 2),
      buy_ok: cell(marketRow, 4),
    },
    account: {
      balance: cell(accountRow, 0),
      risk_per_trade: cell(accountRow, 2),
      actionable: cell(accountRow, 4),
    },
    headers,
    stocks,
    cache_time: cacheTime,
  };
}
