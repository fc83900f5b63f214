/**
 * Column kinds and their BigQuery representations.
 */

import type { ColumnMode, ScalarKind, TargetColumn } from '@catalogsync/core';

/** Field types as written to table metadata */
const FIELD_TYPES: { [K in ScalarKind]: string } = {
  STRING: 'STRING',
  INT64: 'INTEGER',
  FLOAT64: 'FLOAT',
  BOOL: 'BOOLEAN',
  TIMESTAMP: 'TIMESTAMP',
  DATE: 'DATE',
  JSON_STRING: 'STRING',
};

/** Standard SQL type names, for DDL */
const SQL_TYPES: { [K in ScalarKind]: string } = {
  STRING: 'STRING',
  INT64: 'INT64',
  FLOAT64: 'FLOAT64',
  BOOL: 'BOOL',
  TIMESTAMP: 'TIMESTAMP',
  DATE: 'DATE',
  JSON_STRING: 'STRING',
};

/** Field types as BigQuery reports them back */
const KINDS_BY_FIELD_TYPE = new Map<string, ScalarKind>([
  ['STRING', 'STRING'],
  ['BYTES', 'STRING'],
  ['INTEGER', 'INT64'],
  ['INT64', 'INT64'],
  ['FLOAT', 'FLOAT64'],
  ['FLOAT64', 'FLOAT64'],
  ['NUMERIC', 'FLOAT64'],
  ['BIGNUMERIC', 'FLOAT64'],
  ['BOOLEAN', 'BOOL'],
  ['BOOL', 'BOOL'],
  ['TIMESTAMP', 'TIMESTAMP'],
  ['DATETIME', 'TIMESTAMP'],
  ['DATE', 'DATE'],
  ['JSON', 'JSON_STRING'],
  ['RECORD', 'JSON_STRING'],
  ['STRUCT', 'JSON_STRING'],
]);

export interface BigQueryField {
  name: string;
  type: string;
  mode: 'NULLABLE' | 'REPEATED';
  description?: string;
}

export function toBigQueryField(column: TargetColumn): BigQueryField {
  const field: BigQueryField = { name: column.name, type: FIELD_TYPES[column.kind], mode: column.mode };
  if (column.description) field.description = column.description;
  return field;
}

export function toSqlType(column: TargetColumn): string {
  const type = SQL_TYPES[column.kind];
  return column.mode === 'REPEATED' ? `ARRAY<${type}>` : type;
}

/**
 * Read a persisted field back as a column. REQUIRED columns are treated
 * as NULLABLE; unknown types as STRING.
 */
export function fromBigQueryField(field: {
  name: string;
  type?: string;
  mode?: string;
  description?: string;
}): TargetColumn {
  const kind = KINDS_BY_FIELD_TYPE.get((field.type ?? 'STRING').toUpperCase()) ?? 'STRING';
  const mode: ColumnMode = field.mode?.toUpperCase() === 'REPEATED' ? 'REPEATED' : 'NULLABLE';
  const column: TargetColumn = { name: field.name, kind, mode };
  if (field.description) column.description = field.description;
  return column;
}
