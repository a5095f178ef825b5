/**
 * Time utilities for consistent date handling
 */

import { format, isValid, parse } from 'date-fns';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function formatSnapshotStamp(date: Date): string {
  return format(date, 'yyyy-MM-dd_HHmm');
}

/**
 * Strict YYYY-MM-DD check: rejects impossible dates such as 2025-02-30.
 */
export function isCalendarDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) return false;
  const parsed = parse(value, 'yyyy-MM-dd', new Date(0));
  return isValid(parsed) && formatDate(parsed) === value;
}

export function toEpochSeconds(ms: number): number {
  return ms / 1000;
}

export function isCacheExpired(cachedAtMs: number, ttlSeconds: number, nowMs: number): boolean {
  return nowMs - cachedAtMs > ttlSeconds * 1000;
}
