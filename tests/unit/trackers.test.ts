import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { addAlert, listAlerts, removeAlert } from '@/data/alerts';
import { listEarnings, setEarningsDate } from '@/data/earnings';
import { DEFAULT_SETTINGS, getSettings, updateSettings } from '@/data/settings';

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'trackers-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('alerts', () => {
  const created = new Date('2026-03-02T14:30:00.000Z');

  it('adds a normalized alert', async () => {
    const filePath = join(tempDir, 'alerts.json');

    const result = await addAlert(filePath, { ticker: 'brk.b', condition: 'below', price: '412.5' }, created);

    expect(result).toEqual({
      ok: true,
      value: { ticker: 'BRK.B', condition: 'below', price: 412.5, created: '2026-03-02T14:30:00.000Z', triggered: false },
    });
    expect(await listAlerts(filePath)).toHaveLength(1);
  });

  it('rejects bad tickers, conditions and prices', async () => {
    const filePath = join(tempDir, 'alerts.json');

    const results = await Promise.all([
      addAlert(filePath, { ticker: '', price: 10 }),
      addAlert(filePath, { ticker: 'A B', price: 10 }),
      addAlert(filePath, { ticker: 'NVDA', condition: 'sideways', price: 10 }),
      addAlert(filePath, { ticker: 'NVDA', price: 0 }),
      addAlert(filePath, { ticker: 'NVDA', price: 1_000_001 }),
      addAlert(filePath, { ticker: 'NVDA', price: 'ten' }),
    ]);

    expect(results.map((r) => (r.ok ? 'ok' : r.error.message))).toEqual([
      'Invalid ticker (max 10 alphanumeric chars)',
      'Invalid ticker (max 10 alphanumeric chars)',
      'Invalid condition (must be above or below)',
      'Invalid price (must be positive, max $1M)',
      'Invalid price (must be positive, max $1M)',
      'Invalid price (must be a number)',
    ]);
    expect(await listAlerts(filePath)).toEqual([]);
  });

  it('deletes by index and shifts later alerts down', async () => {
    const filePath = join(tempDir, 'alerts.json');
    await addAlert(filePath, { ticker: 'AAA', price: 1 }, created);
    await addAlert(filePath, { ticker: 'BBB', price: 2 }, created);
    await addAlert(filePath, { ticker: 'CCC', price: 3 }, created);

    const removed = await removeAlert(filePath, 1);

    expect(removed.ok && removed.value.ticker).toBe('BBB');
    expect((await listAlerts(filePath)).map((a) => a.ticker)).toEqual(['AAA', 'CCC']);
    const outOfRange = await removeAlert(filePath, 2);
    expect(outOfRange.ok || outOfRange.error).toEqual({ kind: 'not_found', message: 'Invalid index' });
  });

  it('skips unreadable alerts on read but never writes over them', async () => {
    const filePath = join(tempDir, 'alerts.json');
    const original = JSON.stringify([
      { ticker: 'NVDA', condition: 'above', price: '412.5', created: '2026-03-01T00:00:00.000Z', triggered: false },
      { ticker: 'AMD', condition: 'sideways', price: 1, created: '2026-03-01T00:00:00.000Z', triggered: false },
    ]);
    writeFileSync(filePath, original);

    expect(await listAlerts(filePath)).toEqual([
      { ticker: 'NVDA', condition: 'above', price: 412.5, created: '2026-03-01T00:00:00.000Z', triggered: false },
    ]);

    const added = await addAlert(filePath, { ticker: 'MSFT', price: 400 }, created);
    const removed = await removeAlert(filePath, 0);

    expect(added.ok || added.error).toEqual({
      kind: 'persistence',
      message: 'alerts.json has an unreadable record at index 1',
    });
    expect(removed.ok || removed.error.kind).toBe('persistence');
    expect(readFileSync(filePath, 'utf-8')).toBe(original);
  });
});

describe('earnings', () => {
  it('stores one date per ticker, last write wins', async () => {
    const filePath = join(tempDir, 'earnings.json');

    await setEarningsDate(filePath, 'nvda', '2026-05-20');
    const second = await setEarningsDate(filePath, 'NVDA', '2026-05-27');

    expect(second).toEqual({ ok: true, value: { ticker: 'NVDA', date: '2026-05-27' } });
    expect(await listEarnings(filePath)).toEqual({ NVDA: '2026-05-27' });
  });

  it('requires a ticker and a date', async () => {
    const filePath = join(tempDir, 'earnings.json');

    const noDate = await setEarningsDate(filePath, 'NVDA', '');
    const noTicker = await setEarningsDate(filePath, undefined, '2026-05-20');

    expect(noDate.ok || noDate.error.message).toBe('Invalid ticker or date');
    expect(noTicker.ok || noTicker.error.kind).toBe('validation');
  });

  it('does not replace a file that is not a ticker-to-date map', async () => {
    const filePath = join(tempDir, 'earnings.json');
    const original = JSON.stringify({ NVDA: 20260520 });
    writeFileSync(filePath, original);

    const result = await setEarningsDate(filePath, 'AMD', '2026-05-01');

    expect(result).toEqual({
      ok: false,
      error: { kind: 'persistence', message: 'earnings.json has an unexpected shape' },
    });
    expect(readFileSync(filePath, 'utf-8')).toBe(original);
  });
});

describe('settings', () => {
  it('returns defaults when nothing is stored', async () => {
    expect(await getSettings(join(tempDir, 'settings.json'))).toEqual(DEFAULT_SETTINGS);
  });

  it('back-fills on read without writing defaults back', async () => {
    const filePath = join(tempDir, 'settings.json');
    writeFileSync(filePath, JSON.stringify({ account_equity: 50_000 }));

    expect(await getSettings(filePath)).toEqual({ account_equity: 50_000, risk_pct: 0.01, max_positions: 6 });

    const updated = await updateSettings(filePath, { risk_pct: '0.005' });

    expect(updated.ok && updated.value).toEqual({ account_equity: 50_000, risk_pct: 0.005, max_positions: 6 });
    expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual({ account_equity: 50_000, risk_pct: 0.005 });
  });

  it('rejects out-of-range values and leaves the file alone', async () => {
    const filePath = join(tempDir, 'settings.json');
    writeFileSync(filePath, JSON.stringify({ max_positions: 4 }));

    const results = await Promise.all([
      updateSettings(filePath, { account_equity: 0 }),
      updateSettings(filePath, { risk_pct: 1.5 }),
      updateSettings(filePath, { max_positions: 2.5 }),
      updateSettings(filePath, { max_positions: 0 }),
    ]);

    expect(results.every((r) => !r.ok && r.error.kind === 'validation')).toBe(true);
    expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual({ max_positions: 4 });
  });

  it('reads defaults from a broken file but refuses to overwrite it', async () => {
    const filePath = join(tempDir, 'settings.json');
    writeFileSync(filePath, '{ "risk_pct": ');

    expect(await getSettings(filePath)).toEqual(DEFAULT_SETTINGS);

    const updated = await updateSettings(filePath, { risk_pct: 0.02 });

    expect(updated.ok || updated.error.message).toBe('settings.json could not be read');
    expect(readFileSync(filePath, 'utf-8')).toBe('{ "risk_pct": ');
  });
});
