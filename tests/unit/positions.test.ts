import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { addPosition, getPositionBook, listPositions, removePosition, updatePosition } from '@/data/positions';
import { closePnl, rMultiple, summarizePositions } from '@/tracker/positions';
import type { StockPosition } from '@/types/trades';

function makePosition(overrides: Partial<StockPosition>): StockPosition {
  return {
    id: 1,
    ticker: 'NVDA',
    account: 'default',
    trade_type: 'long',
    entry_date: '2026-01-05',
    entry_price: 50,
    shares: 100,
    cost_basis: 5000,
    stop_price: 45,
    target_price: null,
    setup_type: 'cup-with-handle',
    status: 'open',
    close_date: null,
    close_price: null,
    pnl: null,
    notes: '',
    created_at: '2026-01-05T14:00:00.000Z',
    ...overrides,
  };
}

describe('position P&L', () => {
  it('computes close P&L for long and short trades', () => {
    expect(closePnl({ trade_type: 'long', entry_price: 50, shares: 100 }, 60)).toBe(1000);
    expect(closePnl({ trade_type: 'short', entry_price: 50, shares: 100 }, 45)).toBe(500);
    expect(closePnl({ trade_type: 'long', entry_price: 10.1, shares: 3 }, 10.2)).toBe(0.3);
  });

  it('measures the R-multiple against the stop distance', () => {
    expect(rMultiple(makePosition({ status: 'closed', close_price: 60 }))).toBe(2);
    expect(rMultiple(makePosition({ status: 'closed', close_price: 60, stop_price: null }))).toBeNull();
    expect(rMultiple(makePosition({ status: 'closed', close_price: 60, stop_price: 50 }))).toBeNull();
  });
});

describe('summarizePositions', () => {
  it('returns zeros for no positions', () => {
    expect(summarizePositions([])).toEqual({
      total_capital: 0,
      total_pnl: 0,
      open_count: 0,
      closed_count: 0,
      win_count: 0,
      loss_count: 0,
      win_rate: 0,
      avg_r_multiple: 0,
      accounts: [],
      by_account: {},
    });
  });

  it('aggregates overall and per account', () => {
    const positions = [
      makePosition({ id: 1, account: 'ira', status: 'closed', close_price: 60, pnl: 1000 }),
      makePosition({
        id: 2,
        account: 'ira',
        trade_type: 'short',
        entry_price: 100,
        shares: 10,
        cost_basis: 1000,
        stop_price: 110,
        status: 'closed',
        close_price: 110,
        pnl: -100,
      }),
      makePosition({ id: 3, account: 'taxable', cost_basis: 2500 }),
      makePosition({ id: 4, account: 'taxable', stop_price: null, status: 'closed', close_price: 50, pnl: 0 }),
    ];

    const summary = summarizePositions(positions);

    expect(summary.total_capital).toBe(2500);
    expect(summary.total_pnl).toBe(900);
    expect(summary.open_count).toBe(1);
    expect(summary.closed_count).toBe(3);
    expect(summary.win_count).toBe(1);
    // A flat close counts as a loss
    expect(summary.loss_count).toBe(2);
    expect(summary.win_rate).toBeCloseTo(33.3333, 3);
    expect(summary.avg_r_multiple).toBe(0.5);
    expect(summary.accounts).toEqual(['ira', 'taxable']);
    expect(summary.by_account.ira).toMatchObject({ total_pnl: 900, win_rate: 50, avg_r_multiple: 0.5 });
    expect(summary.by_account.taxable).toMatchObject({ total_capital: 2500, open_count: 1, win_rate: 0 });
  });
});

describe('position log', () => {
  let tempDir: string;
  let filePath: string;
  const now = new Date(2026, 0, 5, 10, 0, 0);

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'positions-'));
    filePath = join(tempDir, 'positions.json');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('adds an open position with a computed cost basis', async () => {
    const result = await addPosition(
      filePath,
      { ticker: ' nvda ', entry_price: '50.25', shares: 40, stop_price: '', target_price: 60 },
      now
    );

    expect(result.ok && result.value).toMatchObject({
      id: 1,
      ticker: 'NVDA',
      account: 'default',
      trade_type: 'long',
      entry_date: '2026-01-05',
      cost_basis: 2010,
      stop_price: null,
      target_price: 60,
      status: 'open',
    });
  });

  it('rejects bad trade types and share counts', async () => {
    const badType = await addPosition(filePath, { ticker: 'NVDA', entry_price: 50, shares: 10, trade_type: 'option' }, now);
    const badShares = await addPosition(filePath, { ticker: 'NVDA', entry_price: 50, shares: 0 }, now);

    expect(badType.ok || badType.error.message).toBe('Invalid trade_type (must be long or short)');
    expect(badShares.ok || badShares.error.message).toBe('Invalid shares (must be 1-1,000,000)');
    expect((await getPositionBook(filePath)).positions).toEqual([]);
  });

  it('moves the stop, then closes with P&L', async () => {
    await addPosition(filePath, { ticker: 'NVDA', entry_price: 50, shares: 100, stop_price: 45 }, now);

    const moved = await updatePosition(filePath, 1, { stop_price: 48, notes: 'raised stop' }, now);
    expect(moved.ok && moved.value).toMatchObject({ stop_price: 48, notes: 'raised stop', status: 'open' });

    const closed = await updatePosition(filePath, 1, { close_price: 56, close_date: '2026-01-20' }, now);
    expect(closed.ok && closed.value).toMatchObject({
      status: 'closed',
      close_price: 56,
      close_date: '2026-01-20',
      pnl: 600,
    });

    const book = await getPositionBook(filePath);
    expect(book.summary.avg_r_multiple).toBe(3);
  });

  it('validates updates and reports unknown ids', async () => {
    await addPosition(filePath, { ticker: 'NVDA', entry_price: 50, shares: 100 }, now);

    const zeroClose = await updatePosition(filePath, 1, { close_price: 0 }, now);
    const missing = await updatePosition(filePath, 7, { notes: 'x' }, now);
    const removed = await removePosition(filePath, 7);

    expect(zeroClose.ok || zeroClose.error.kind).toBe('validation');
    expect(missing.ok || missing.error.kind).toBe('not_found');
    expect(removed.ok || removed.error.kind).toBe('not_found');
  });
});

describe('position log stored by older or damaged writers', () => {
  let tempDir: string;
  let filePath: string;
  const now = new Date(2026, 0, 5, 10, 0, 0);

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'positions-'));
    filePath = join(tempDir, 'positions.json');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('reads prices stored as text and keeps every record on the next add', async () => {
    writeFileSync(
      filePath,
      JSON.stringify([
        makePosition({ id: 1 }),
        { ...makePosition({ id: 2, ticker: 'AMD' }), stop_price: '92' },
        makePosition({ id: 3, ticker: 'MELI' }),
      ])
    );

    const book = await getPositionBook(filePath);
    expect(book.positions.map((p) => p.stop_price)).toEqual([45, 92, 45]);

    const added = await addPosition(filePath, { ticker: 'MSFT', entry_price: 400, shares: 5 }, now);

    expect(added.ok && added.value.id).toBe(4);
    expect((await listPositions(filePath)).map((p) => p.ticker)).toEqual(['NVDA', 'AMD', 'MELI', 'MSFT']);
  });

  it('refuses to write over a record it cannot read', async () => {
    const original = JSON.stringify([makePosition({ id: 1 }), { ...makePosition({ id: 2 }), trade_type: 'option' }]);
    writeFileSync(filePath, original);

    const added = await addPosition(filePath, { ticker: 'MSFT', entry_price: 400, shares: 5 }, now);
    const updated = await updatePosition(filePath, 1, { notes: 'x' }, now);
    const removed = await removePosition(filePath, 1);

    expect(added).toEqual({
      ok: false,
      error: { kind: 'persistence', message: 'positions.json has an unreadable record at index 1' },
    });
    expect(updated.ok || updated.error.kind).toBe('persistence');
    expect(removed.ok || removed.error.kind).toBe('persistence');
    expect(readFileSync(filePath, 'utf-8')).toBe(original);
    expect((await listPositions(filePath)).map((p) => p.id)).toEqual([1]);
  });

  it('refuses to write when the file is not valid JSON', async () => {
    writeFileSync(filePath, '[{ "id": 1,');

    const added = await addPosition(filePath, { ticker: 'MSFT', entry_price: 400, shares: 5 }, now);

    expect(added.ok || added.error.message).toBe('positions.json could not be read');
    expect(readFileSync(filePath, 'utf-8')).toBe('[{ "id": 1,');
  });
});
