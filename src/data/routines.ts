/**
 * Daily routine journal, one file per calendar date under the routines
 * directory. A date without a file reads as `{ date }`.
 */

import { readdir } from 'fs/promises';
import { join } from 'path';
import { getDaysInMonth } from 'date-fns';
import { isCalendarDate } from '@/core/time';
import { ok, persistenceError, validationError, type Result } from '@/core/result';
import { createChildLogger } from '@/utils/logger';
import { isErrnoException } from '@/utils/errors';
import { isRoutineEntry } from '@/validation/ajv_instance';
import { isRecord, readJsonDocument, saveJsonFile } from './json_store';
import type {
  RoutineCalendarMonth,
  RoutineDayStatus,
  RoutineEntry,
  RoutinePhase,
} from '@/types/trackers';

const logger = createChildLogger('routines');

const ROUTINE_FILE_PATTERN = /^(\d{4}-\d{2}-\d{2})\.json$/;

function routinePath(routinesDir: string, date: string): string {
  return join(routinesDir, `${date}.json`);
}

async function readEntry(routinesDir: string, date: string): Promise<RoutineEntry | null> {
  const outcome = await readJsonDocument(routinePath(routinesDir, date));
  if (outcome.status === 'missing') {
    return { date };
  }
  if (outcome.status === 'error') {
    logger.warn({ date, err: outcome.error }, 'Unreadable routine file');
    return null;
  }
  if (!isRoutineEntry(outcome.value)) {
    logger.warn({ date }, 'Routine file has an unexpected shape');
    return null;
  }
  return outcome.value;
}

export async function getRoutine(routinesDir: string, date: string): Promise<Result<RoutineEntry>> {
  if (!isCalendarDate(date)) {
    return validationError('Invalid date (expected YYYY-MM-DD)');
  }
  return ok((await readEntry(routinesDir, date)) ?? { date });
}

function toFieldMap(raw: unknown): Record<string, string> | null {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) return null;

  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== 'string') return null;
    fields[key] = value;
  }
  return fields;
}

/** Replaces one phase of the entry; the other phase is kept as stored. */
export async function saveRoutine(
  routinesDir: string,
  date: string,
  phase: RoutinePhase,
  rawFields: unknown,
  now: Date = new Date()
): Promise<Result<RoutineEntry>> {
  if (!isCalendarDate(date)) {
    return validationError('Invalid date (expected YYYY-MM-DD)');
  }
  const fields = toFieldMap(rawFields);
  if (!fields) {
    return validationError('Invalid routine data (values must be strings)');
  }

  const existing = await readEntry(routinesDir, date);
  if (!existing) {
    return persistenceError('Existing routine entry could not be read');
  }

  const entry: RoutineEntry = { ...existing, date, updated_at: now.toISOString() };
  entry[phase] = fields;

  if (!(await saveJsonFile(routinePath(routinesDir, date), entry))) {
    return persistenceError('Failed to save routine');
  }
  return ok(entry);
}

function hasFields(fields: Record<string, string> | undefined): boolean {
  return fields !== undefined && Object.keys(fields).length > 0;
}

function shiftMonth(year: number, month: number, delta: 1 | -1): { year: number; month: number } {
  if (delta === -1) {
    return month === 1 ? { year: year - 1, month: 12 } : { year, month: month - 1 };
  }
  return month === 12 ? { year: year + 1, month: 1 } : { year, month: month + 1 };
}

export async function getRoutineCalendar(
  routinesDir: string,
  year: number,
  month: number
): Promise<Result<RoutineCalendarMonth>> {
  if (!Number.isInteger(year) || year < 1970 || year > 9999) {
    return validationError('Invalid year');
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    return validationError('Invalid month (must be 1-12)');
  }

  let filenames: string[];
  try {
    filenames = await readdir(routinesDir);
  } catch (error) {
    if (!(isErrnoException(error) && error.code === 'ENOENT')) {
      logger.error({ err: error }, 'Failed to read routines directory');
      return persistenceError('Failed to read routines');
    }
    filenames = [];
  }

  const prefix = `${year}-${String(month).padStart(2, '0')}-`;
  const days: Record<number, RoutineDayStatus> = {};

  for (const filename of filenames) {
    const match = ROUTINE_FILE_PATTERN.exec(filename);
    if (!match || !match[1].startsWith(prefix)) continue;

    const entry = await readEntry(routinesDir, match[1]);
    if (!entry) continue;

    days[Number.parseInt(match[1].slice(prefix.length), 10)] = {
      has_premarket: hasFields(entry.premarket),
      has_postclose: hasFields(entry.postclose),
    };
  }

  return ok({
    year,
    month,
    days_in_month: getDaysInMonth(new Date(year, month - 1, 1)),
    days,
    prev: shiftMonth(year, month, -1),
    next: shiftMonth(year, month, 1),
  });
}
