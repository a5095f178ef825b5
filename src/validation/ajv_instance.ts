/**
 * Ajv validation instance with schema validators for documents that arrive
 * from outside the process: the sheet CLI output and files read back from disk.
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { ScanSnapshot } from '@/types/scan';
import type { RoutineEntry } from '@/types/trackers';

export interface SheetResponse {
  range?: string;
  values?: Array<Array<string | number | boolean>>;
}

const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

addFormats(ajv);

let sheetResponseValidator: ValidateFunction<SheetResponse> | null = null;
let scanSnapshotValidator: ValidateFunction<ScanSnapshot> | null = null;
let routineEntryValidator: ValidateFunction<RoutineEntry> | null = null;

export function getSheetResponseValidator(): ValidateFunction<SheetResponse> {
  if (!sheetResponseValidator) {
    sheetResponseValidator = ajv.compile<SheetResponse>(loadSchema('sheet_values.v1'));
  }
  return sheetResponseValidator;
}

export function getScanSnapshotValidator(): ValidateFunction<ScanSnapshot> {
  if (!scanSnapshotValidator) {
    scanSnapshotValidator = ajv.compile<ScanSnapshot>(loadSchema('scan_snapshot.v1'));
  }
  return scanSnapshotValidator;
}

export function getRoutineEntryValidator(): ValidateFunction<RoutineEntry> {
  if (!routineEntryValidator) {
    routineEntryValidator = ajv.compile<RoutineEntry>(loadSchema('routine_entry.v1'));
  }
  return routineEntryValidator;
}

export function isScanSnapshot(value: unknown): value is ScanSnapshot {
  return getScanSnapshotValidator()(value);
}

export function isRoutineEntry(value: unknown): value is RoutineEntry {
  return getRoutineEntryValidator()(value);
}

export function formatValidationErrors(validate: ValidateFunction): string[] {
  return (
    validate.errors?.map((e) => `${e.instancePath || 'root'}: ${e.message}`) ?? [
      'Unknown validation error',
    ]
  );
}
