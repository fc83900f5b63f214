/**
 * Warehouse-side schema types
 */

export type ScalarKind =
  | 'STRING'
  | 'INT64'
  | 'FLOAT64'
  | 'BOOL'
  | 'TIMESTAMP'
  | 'DATE'
  /** Serialized JSON text in a string column */
  | 'JSON_STRING';

export type ColumnMode = 'NULLABLE' | 'REPEATED';

export interface TargetColumn {
  /** Warehouse-legal column name */
  name: string;
  kind: ScalarKind;
  mode: ColumnMode;
  description?: string;
}

/** Desired columns for one sync run, in order */
export type TargetSchema = readonly TargetColumn[];

/** Columns currently materialized in the warehouse (empty if the table is absent) */
export type PersistedSchema = readonly TargetColumn[];
