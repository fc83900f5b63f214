/**
 * SQL for schema changes and deduplication.
 *
 * Identifiers cannot be bound as query parameters, so every name that ends
 * up in SQL text is validated first.
 */

import type { TargetColumn } from '@catalogsync/core';
import { SYNCED_AT_COLUMN, SYNC_ID_COLUMN, WarehouseError } from '@catalogsync/core';
import { toSqlType } from './field-types.js';

/** Table and column names: letters, digits and underscores, not starting with a digit */
const VALID_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]{0,299}$/;
/** Dataset ids: letters, digits and underscores */
const VALID_DATASET = /^[A-Za-z0-9_]{1,1024}$/;
/** Project ids, optionally domain-scoped (example.com:project) */
const VALID_PROJECT = /^(?:[a-z0-9.-]+:)?[a-z][a-z0-9-]{4,28}[a-z0-9]$/;

export interface TableRef {
  projectId: string;
  datasetId: string;
  table: string;
}

function invalid(kind: string, name: string): WarehouseError {
  return new WarehouseError({
    operation: 'validate',
    message: `Invalid ${kind} name: "${name}". Must be alphanumeric with underscores, starting with a letter or underscore.`,
  });
}

/**
 * Validate that a string is a safe table or column name
 */
export function validateIdentifier(name: string, kind = 'column'): string {
  if (!VALID_IDENTIFIER.test(name)) {
    throw invalid(kind, name);
  }
  return name;
}

export function validateDataset(projectId: string, datasetId: string): void {
  if (!VALID_PROJECT.test(projectId)) throw invalid('project', projectId);
  if (!VALID_DATASET.test(datasetId)) throw invalid('dataset', datasetId);
}

export function qualifiedTableName(ref: TableRef): string {
  validateDataset(ref.projectId, ref.datasetId);
  validateIdentifier(ref.table, 'table');
  return `\`${ref.projectId}.${ref.datasetId}.${ref.table}\``;
}

function quote(name: string): string {
  return `\`${validateIdentifier(name)}\``;
}

/** Double-quoted string literal */
function stringLiteral(value: string): string {
  return JSON.stringify(value);
}

function columnDefinition(column: TargetColumn): string {
  const options = column.description ? ` OPTIONS(description=${stringLiteral(column.description)})` : '';
  return `${quote(column.name)} ${toSqlType(column)}${options}`;
}

/**
 * One ALTER TABLE statement for all additions and drops
 */
export function buildAlterTableQuery(
  ref: TableRef,
  add: readonly TargetColumn[],
  drop: readonly string[]
): string | undefined {
  const clauses = [
    ...add.map((column) => `ADD COLUMN IF NOT EXISTS ${columnDefinition(column)}`),
    ...drop.map((name) => `DROP COLUMN IF EXISTS ${quote(name)}`),
  ];
  if (clauses.length === 0) return undefined;
  return `ALTER TABLE ${qualifiedTableName(ref)}\n  ${clauses.join(',\n  ')}`;
}

/**
 * Collapse every key with more than one row to its newest row. Newest means
 * the latest `_synced_at`, then the greatest `_sync_id` (NULLs sort last
 * under DESC). Exact copies left by a retried streaming insert collapse to
 * one row. The script ends with `SELECT removed`.
 */
export function buildDeduplicateQuery(ref: TableRef, keyColumn: string): string {
  const table = qualifiedTableName(ref);
  const key = quote(keyColumn);
  const syncedAt = quote(SYNCED_AT_COLUMN);
  const syncId = quote(SYNC_ID_COLUMN);

  return [
    'DECLARE removed INT64 DEFAULT 0;',
    'BEGIN TRANSACTION;',
    'CREATE TEMP TABLE newest_rows AS',
    'SELECT newest.* FROM (',
    `  SELECT ARRAY_AGG(candidate ORDER BY candidate.${syncedAt} DESC, candidate.${syncId} DESC LIMIT 1)[OFFSET(0)] AS newest`,
    `  FROM ${table} AS candidate`,
    `  WHERE candidate.${key} IS NOT NULL`,
    `  GROUP BY candidate.${key}`,
    '  HAVING COUNT(*) > 1',
    ');',
    `DELETE FROM ${table} WHERE ${key} IN (SELECT ${key} FROM newest_rows);`,
    'SET removed = @@row_count;',
    `INSERT INTO ${table} SELECT * FROM newest_rows;`,
    'SET removed = removed - @@row_count;',
    'COMMIT TRANSACTION;',
    'SELECT removed;',
  ].join('\n');
}
