import { format } from 'date-fns';
import type { ScanSnapshot } from '@/types/scan';

const LINE_END = '\r\n';

export function escapeCsv(value: string | undefined): string {
  if (value === undefined) return '';
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Keeps rows whose `Ticker` contains `filter`, case-insensitively. An empty filter keeps every row. */
export function filterByTicker(snapshot: ScanSnapshot, filter: string): ScanSnapshot['stocks'] {
  const needle = filter.trim().toLowerCase();
  if (!needle) return snapshot.stocks;
  return snapshot.stocks.filter((row) => (row.Ticker ?? '').toLowerCase().includes(needle));
}

export function snapshotToCsv(snapshot: ScanSnapshot, filter = ''): string {
  const lines = [snapshot.headers.map(escapeCsv).join(',')];
  for (const row of filterByTicker(snapshot, filter)) {
    lines.push(snapshot.headers.map((header) => escapeCsv(row[header])).join(','));
  }
  return lines.map((line) => line + LINE_END).join('');
}

export function getExportFilename(now: Date = new Date()): string {
  return `canslim_export_${format(now, 'yyyyMMdd_HHmmss')}.csv`;
}
