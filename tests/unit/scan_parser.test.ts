import { describe, expect, it } from 'vitest';
import { parseSheetValues } from '@/scan/parser';
import type { SheetValues } from '@/types/scan';

const sheet: SheetValues = [
  ['CANSLIM Scan', '', '2026-03-02 09:35'],
  ['Confirmed Uptrend', '', '3', '', 'YES'],
  ['$100,000', '', '$1,000', '', '4'],
  [],
  ['Ticker', 'Pivot', 'Stop', 'RS'],
  ['NVDA', '120', '112', '95'],
  ['AAPL', '200'],
  ['NOTE'],
  [],
];

describe('parseSheetValues', () => {
  it('reads the status rows and maps candidates by header', () => {
    const snapshot = parseSheetValues(sheet, 1_772_443_700);

    expect(snapshot).toEqual({
      scan_time: '2026-03-02 09:35',
      market: { regime: 'Confirmed Uptrend', dist_days: '3', buy_ok: 'YES' },
      account: { balance: '$100,000', risk_per_trade: '$1,000', actionable: '4' },
      headers: ['Ticker', 'Pivot', 'Stop', 'RS'],
      stocks: [
        { Ticker: 'NVDA', Pivot: '120', Stop: '112', RS: '95' },
        { Ticker: 'AAPL', Pivot: '200', Stop: '', RS: '' },
      ],
      cache_time: 1_772_443_700,
    });
  });

  it('gives every row exactly the header keys', () => {
    const snapshot = parseSheetValues(sheet, 0);

    for (const row of snapshot?.stocks ?? []) {
      expect(Object.keys(row)).toEqual(snapshot?.headers);
    }
  });

  it('returns null for fewer than five rows', () => {
    expect(parseSheetValues(sheet.slice(0, 4), 0)).toBeNull();
    expect(parseSheetValues([], 0)).toBeNull();
  });

  it('falls back to Unknown and empty strings for short status rows', () => {
    const snapshot = parseSheetValues([['Title'], ['Uptrend'], [], [], ['Ticker', 'Pivot']], 0);

    expect(snapshot?.scan_time).toBe('Unknown');
    expect(snapshot?.market).toEqual({ regime: 'Uptrend', dist_days: '', buy_ok: '' });
    expect(snapshot?.account).toEqual({ balance: '', risk_per_trade: '', actionable: '' });
    expect(snapshot?.stocks).toEqual([]);
  });

  it('does not share the header array with the input', () => {
    const values: SheetValues = sheet.map((row) => [...row]);
    const snapshot = parseSheetValues(values, 0);

    values[4].push('Extra');
    expect(snapshot?.headers).toEqual(['Ticker', 'Pivot', 'Stop', 'RS']);
  });
});
