import { describe, expect, it } from 'vitest';
import { escapeCsv, getExportFilename, snapshotToCsv } from '@/scan/export';
import type { ScanSnapshot } from '@/types/scan';

const snapshot: ScanSnapshot = {
  scan_time: '2026-03-02 09:35',
  market: { regime: '', dist_days: '', buy_ok: '' },
  account: { balance: '', risk_per_trade: '', actionable: '' },
  headers: ['Ticker', 'Name', 'Cost'],
  stocks: [
    { Ticker: 'NVDA', Name: 'NVIDIA', Cost: '$15,000' },
    { Ticker: 'AMD', Name: 'Advanced "Micro"', Cost: '' },
    { Ticker: 'NVO', Name: 'Novo', Cost: '$900' },
  ],
  cache_time: 0,
};

describe('CSV export', () => {
  it('quotes only cells that need it', () => {
    expect(escapeCsv('plain')).toBe('plain');
    expect(escapeCsv('$15,000')).toBe('"$15,000"');
    expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsv('two\nlines')).toBe('"two\nlines"');
    expect(escapeCsv(undefined)).toBe('');
  });

  it('writes headers then rows in header order', () => {
    expect(snapshotToCsv(snapshot)).toBe(
      'Ticker,Name,Cost\r\n' +
        'NVDA,NVIDIA,"$15,000"\r\n' +
        'AMD,"Advanced ""Micro""",\r\n' +
        'NVO,Novo,$900\r\n'
    );
  });

  it('filters rows by ticker substring, ignoring case', () => {
    expect(snapshotToCsv(snapshot, 'nv')).toBe('Ticker,Name,Cost\r\nNVDA,NVIDIA,"$15,000"\r\nNVO,Novo,$900\r\n');
    expect(snapshotToCsv(snapshot, 'zzz')).toBe('Ticker,Name,Cost\r\n');
  });

  it('names the file after the export time', () => {
    expect(getExportFilename(new Date(2026, 2, 2, 9, 5, 7))).toBe('canslim_export_20260302_090507.csv');
  });
});
