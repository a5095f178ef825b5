import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { getRoutine, getRoutineCalendar, saveRoutine } from '@/data/routines';

let routinesDir: string;
let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'routines-'));
  routinesDir = join(tempDir, 'routines');
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('routine journal', () => {
  const savedAt = new Date('2026-03-02T13:00:00.000Z');

  it('reads an unknown date as an empty entry', async () => {
    expect(await getRoutine(routinesDir, '2026-03-02')).toEqual({ ok: true, value: { date: '2026-03-02' } });
  });

  it('saves one phase at a time and keeps the other', async () => {
    await saveRoutine(routinesDir, '2026-03-02', 'premarket', { plan: 'watch NVDA pivot' }, savedAt);
    const result = await saveRoutine(routinesDir, '2026-03-02', 'postclose', { review: 'no trades' }, savedAt);

    expect(result).toEqual({
      ok: true,
      value: {
        date: '2026-03-02',
        updated_at: '2026-03-02T13:00:00.000Z',
        premarket: { plan: 'watch NVDA pivot' },
        postclose: { review: 'no trades' },
      },
    });
    const stored = await getRoutine(routinesDir, '2026-03-02');
    expect(stored.ok && stored.value.premarket).toEqual({ plan: 'watch NVDA pivot' });
  });

  it('rejects impossible dates and non-string fields', async () => {
    const badDate = await saveRoutine(routinesDir, '2026-02-30', 'premarket', {}, savedAt);
    const badPath = await getRoutine(routinesDir, '../settings');
    const badFields = await saveRoutine(routinesDir, '2026-03-02', 'premarket', { plan: 3 }, savedAt);

    expect(badDate.ok || badDate.error.message).toBe('Invalid date (expected YYYY-MM-DD)');
    expect(badPath.ok || badPath.error.kind).toBe('validation');
    expect(badFields.ok || badFields.error.message).toBe('Invalid routine data (values must be strings)');
  });
});

describe('routine calendar', () => {
  it('summarizes which phases were filled in per day', async () => {
    const savedAt = new Date('2026-03-02T13:00:00.000Z');
    await saveRoutine(routinesDir, '2026-03-02', 'premarket', { plan: 'x' }, savedAt);
    await saveRoutine(routinesDir, '2026-03-02', 'postclose', { review: 'y' }, savedAt);
    await saveRoutine(routinesDir, '2026-03-09', 'premarket', {}, savedAt);
    await saveRoutine(routinesDir, '2026-04-01', 'premarket', { plan: 'z' }, savedAt);
    writeFileSync(join(routinesDir, '2026-03-10.json'), '{ broken');

    const result = await getRoutineCalendar(routinesDir, 2026, 3);

    expect(result).toEqual({
      ok: true,
      value: {
        year: 2026,
        month: 3,
        days_in_month: 31,
        days: {
          2: { has_premarket: true, has_postclose: true },
          9: { has_premarket: false, has_postclose: false },
        },
        prev: { year: 2026, month: 2 },
        next: { year: 2026, month: 4 },
      },
    });
  });

  it('wraps the year at January and December', async () => {
    mkdirSync(routinesDir, { recursive: true });

    const january = await getRoutineCalendar(routinesDir, 2026, 1);
    const december = await getRoutineCalendar(routinesDir, 2026, 12);

    expect(january.ok && january.value.prev).toEqual({ year: 2025, month: 12 });
    expect(december.ok && december.value.next).toEqual({ year: 2027, month: 1 });
    expect(december.ok && december.value.days).toEqual({});
  });

  it('knows leap-year February and rejects a bad month', async () => {
    const leap = await getRoutineCalendar(routinesDir, 2028, 2);
    const bad = await getRoutineCalendar(routinesDir, 2026, 13);

    expect(leap.ok && leap.value.days_in_month).toBe(29);
    expect(bad.ok || bad.error.kind).toBe('validation');
  });
});
