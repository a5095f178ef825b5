/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { AnySchemaObject } from 'ajv';

export type SchemaName = 'sheet_values.v1' | 'scan_snapshot.v1' | 'routine_entry.v1';

const schemaCache = new Map<SchemaName, AnySchemaObject>();

export function loadSchema(schemaName: SchemaName): AnySchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = join(process.cwd(), 'schemas', `${schemaName}.schema.json`);
  const schema: AnySchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));

  schemaCache.set(schemaName, schema);
  return schema;
}
