import { isCalendarDate } from '@/core/time';

export type FieldResult<T> = { valid: true; value: T } | { valid: false; error: string };

const TICKER_PATTERN = /^[A-Z0-9.-]+$/;
const TICKER_HAS_ALNUM = /[A-Z0-9]/;
const MAX_TICKER_LENGTH = 10;
// Plain decimal notation only; Number() alone would also take 0x20, 0b11 and 0o7
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export function validateTicker(raw: unknown, fallback = ''): FieldResult<string> {
  const value = raw === undefined || raw === null ? fallback : raw;
  const error = 'Invalid ticker (max 10 alphanumeric chars)';
  if (typeof value !== 'string') return { valid: false, error };

  const ticker = value.trim().toUpperCase();
  if (
    !ticker ||
    ticker.length > MAX_TICKER_LENGTH ||
    !TICKER_PATTERN.test(ticker) ||
    !TICKER_HAS_ALNUM.test(ticker)
  ) {
    return { valid: false, error };
  }
  return { valid: true, value: ticker };
}

/** Accepts finite numbers and decimal numeric strings; anything else is null. */
export function parseNumber(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw === 'string' && DECIMAL_PATTERN.test(raw.trim())) {
    const value = Number(raw.trim());
    return Number.isFinite(value) ? value : null;
  }
  return null;
}

export function parseInteger(raw: unknown): number | null {
  const value = parseNumber(raw);
  return value !== null && Number.isInteger(value) ? value : null;
}

export interface NumberRule {
  name: string;
  /** Shown in the error message, e.g. "must be positive, max $100k" */
  rangeHint: string;
  min: number;
  max: number;
  /** When true `min` itself is allowed */
  allowMin?: boolean;
  integer?: boolean;
}

export function validateNumberField(raw: unknown, rule: NumberRule): FieldResult<number> {
  const value = rule.integer ? parseInteger(raw) : parseNumber(raw);
  if (value === null) {
    return {
      valid: false,
      error: `Invalid ${rule.name} (must be ${rule.integer ? 'an integer' : 'a number'})`,
    };
  }

  const belowMin = rule.allowMin ? value < rule.min : value <= rule.min;
  if (belowMin || value > rule.max) {
    return { valid: false, error: `Invalid ${rule.name} (${rule.rangeHint})` };
  }
  return { valid: true, value };
}

export function validateDateField(raw: unknown, name: string, fallback: string): FieldResult<string> {
  if (raw === undefined || raw === null || raw === '') {
    return { valid: true, value: fallback };
  }
  if (typeof raw !== 'string' || !isCalendarDate(raw.trim())) {
    return { valid: false, error: `Invalid ${name} (expected YYYY-MM-DD)` };
  }
  return { valid: true, value: raw.trim() };
}

export function optionalText(raw: unknown, fallback: string): string {
  return typeof raw === 'string' ? raw : fallback;
}

export function pickEnum<T extends string>(raw: unknown, allowed: readonly T[]): T | null {
  return allowed.find((candidate) => candidate === raw) ?? null;
}
