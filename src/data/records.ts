/**
 * Field readers for stored tracker records. Older files may hold numbers as
 * decimal strings (e.g. a stop saved straight from a form); those are read
 * back as numbers. `undefined` means the field is unusable.
 */

import { parseNumber } from '@/lib/inputValidation';

export function storedNumber(value: unknown): number | undefined {
  return parseNumber(value) ?? undefined;
}

/** `null`, a missing key and `''` all read as null. */
export function storedNullableNumber(value: unknown): number | null | undefined {
  if (value === null || value === undefined || value === '') return null;
  return storedNumber(value);
}

export function storedNullableString(value: unknown): string | null | undefined {
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? value : undefined;
}

export function storedText(value: unknown, fallback = ''): string | undefined {
  if (value === undefined || value === null) return fallback;
  return typeof value === 'string' ? value : undefined;
}
