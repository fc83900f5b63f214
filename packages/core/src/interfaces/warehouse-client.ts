/**
 * Warehouse client interface
 *
 * The target side of a sync: one table per blueprint.
 */

import type {
  DeduplicationResult,
  InsertResult,
  PersistedSchema,
  Row,
  TargetColumn,
  TargetSchema,
} from '../types/index.js';

export interface WarehouseCapabilities {
  /** Whether array columns (REPEATED mode) are supported */
  repeatedColumns: boolean;
}

export interface IWarehouseClient {
  readonly capabilities: WarehouseCapabilities;

  tableExists(table: string): Promise<boolean>;

  /** Columns of an existing table; empty if the table does not exist */
  getSchema(table: string): Promise<PersistedSchema>;

  /**
   * @throws TransientAlterError when the operation may succeed on retry
   */
  createTable(table: string, schema: TargetSchema): Promise<void>;

  /**
   * Add and drop columns of an existing table
   * @throws TransientAlterError when the operation may succeed on retry
   */
  alterTable(
    table: string,
    add: readonly TargetColumn[],
    drop: readonly string[]
  ): Promise<void>;

  /**
   * Stream rows into the table. Rows rejected individually are reported in
   * the result; failures of the whole request are thrown.
   * @throws TransientWriteError when the batch may succeed on retry
   */
  insertRows(table: string, rows: readonly Row[]): Promise<InsertResult>;

  /**
   * Remove all but the most recently synced row per key
   * @throws BufferNotFlushedError while recent rows are still buffered
   */
  deduplicate(table: string, keyColumn: string): Promise<DeduplicationResult>;
}
