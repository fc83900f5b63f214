/**
 * BigQuery Warehouse
 *
 * Implements IWarehouseClient on a BigQuery dataset: tables via metadata,
 * rows via streaming inserts, schema changes and deduplication via SQL
 * scripts.
 */

import { randomUUID } from 'node:crypto';
import { BigQuery } from '@google-cloud/bigquery';
import { z } from 'zod';
import type {
  DeduplicationResult,
  InsertResult,
  IWarehouseClient,
  PersistedSchema,
  Row,
  RowError,
  TargetColumn,
  TargetSchema,
  WarehouseCapabilities,
} from '@catalogsync/core';
import { Logger, SYNC_ID_COLUMN, silentLogger } from '@catalogsync/core';
import { classifyBigQueryError, type WarehouseOperation } from './errors.js';
import { fromBigQueryField, toBigQueryField } from './field-types.js';
import {
  buildAlterTableQuery,
  buildDeduplicateQuery,
  validateDataset,
  validateIdentifier,
  type TableRef,
} from './queries.js';

export interface ServiceAccountCredentials {
  client_email: string;
  private_key: string;
}

export interface BigQueryWarehouseConfig {
  projectId: string;
  datasetId: string;
  /** Job and dataset location, e.g. `EU` */
  location?: string;
  /** Service-account key; Application Default Credentials when omitted */
  credentials?: ServiceAccountCredentials;
  /** Path to a service-account key file */
  keyFilename?: string;
  logger?: Logger;
}

const tableMetadataSchema = z
  .object({
    schema: z
      .object({
        fields: z
          .array(
            z
              .object({
                name: z.string(),
                type: z.string().optional(),
                mode: z.string().optional(),
                description: z.string().optional(),
              })
              .passthrough()
          )
          .default([]),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const partialFailureSchema = z.object({
  name: z.literal('PartialFailureError'),
  errors: z.array(
    z.object({
      row: z.object({ insertId: z.string().optional() }).passthrough().optional(),
      errors: z
        .array(z.object({ reason: z.string().optional(), message: z.string().optional() }).passthrough())
        .default([]),
    })
  ),
});

const dedupResultSchema = z.array(z.object({ removed: z.coerce.number() }).passthrough());

export class BigQueryWarehouse implements IWarehouseClient {
  readonly capabilities: WarehouseCapabilities = { repeatedColumns: true };

  private readonly config: BigQueryWarehouseConfig;
  private readonly bigquery: BigQuery;
  private readonly logger: Logger;

  constructor(config: BigQueryWarehouseConfig) {
    validateDataset(config.projectId, config.datasetId);
    this.config = config;
    this.logger = config.logger ?? silentLogger;
    this.bigquery = new BigQuery({
      projectId: config.projectId,
      location: config.location,
      credentials: config.credentials,
      keyFilename: config.keyFilename,
    });
  }

  async tableExists(table: string): Promise<boolean> {
    return this.call('tableExists', table, async () => {
      const [exists] = await this.table(table).exists();
      return exists;
    });
  }

  async getSchema(table: string): Promise<PersistedSchema> {
    return this.call('getSchema', table, async () => {
      const [metadata] = await this.table(table).getMetadata();
      const parsed = tableMetadataSchema.parse(metadata);
      return (parsed.schema?.fields ?? []).map(fromBigQueryField);
    });
  }

  async createTable(table: string, schema: TargetSchema): Promise<void> {
    validateIdentifier(table, 'table');
    schema.forEach((column) => validateIdentifier(column.name));

    await this.call('createTable', table, async () => {
      try {
        await this.bigquery
          .dataset(this.config.datasetId)
          .createTable(table, { schema: { fields: schema.map(toBigQueryField) } });
      } catch (error) {
        // Created concurrently by another run
        if (isAlreadyExists(error)) {
          this.logger.debug('Table already exists', { table });
          return;
        }
        throw error;
      }
    });
  }

  async alterTable(
    table: string,
    add: readonly TargetColumn[],
    drop: readonly string[]
  ): Promise<void> {
    const query = buildAlterTableQuery(this.ref(table), add, drop);
    if (!query) return;

    await this.call('alterTable', table, () => this.runQuery(query));
  }

  /**
   * Stream rows with `_sync_id` as insert id. Invalid rows are skipped
   * and reported; the rest of the batch is stored.
   */
  async insertRows(table: string, rows: readonly Row[]): Promise<InsertResult> {
    if (rows.length === 0) return { inserted: 0, errors: [] };

    const indexById = new Map<string, number>();
    const raw = rows.map((row, index) => {
      const id = row[SYNC_ID_COLUMN];
      const insertId = typeof id === 'string' && id ? id : randomUUID();
      indexById.set(insertId, index);
      return { insertId, json: row };
    });

    return this.call('insertRows', table, async () => {
      try {
        await this.table(table).insert(raw, { raw: true, skipInvalidRows: true });
        return { inserted: rows.length, errors: [] };
      } catch (error) {
        const partial = partialFailureSchema.safeParse(error);
        if (!partial.success) throw error;

        const errors: RowError[] = partial.data.errors.map((failure) => ({
          index: indexById.get(failure.row?.insertId ?? '') ?? -1,
          message:
            failure.errors
              .map((item) => item.message ?? item.reason)
              .filter((message) => message !== undefined)
              .join('; ') || 'row rejected',
        }));
        return { inserted: rows.length - errors.length, errors };
      }
    });
  }

  async deduplicate(table: string, keyColumn: string): Promise<DeduplicationResult> {
    const query = buildDeduplicateQuery(this.ref(table), keyColumn);

    return this.call('deduplicate', table, async () => {
      const parsed = dedupResultSchema.safeParse(await this.runQuery(query));
      return { removed: parsed.success ? (parsed.data[0]?.removed ?? 0) : 0 };
    });
  }

  /**
   * Run a statement or script to completion; resolves to the rows of its
   * last SELECT
   */
  private async runQuery(query: string): Promise<unknown> {
    this.logger.debug('Running query', { query });
    const [job] = await this.bigquery.createQueryJob({ query, location: this.config.location });
    const [rows] = await job.getQueryResults();
    return rows;
  }

  private table(table: string) {
    return this.bigquery.dataset(this.config.datasetId).table(validateIdentifier(table, 'table'));
  }

  private ref(table: string): TableRef {
    return { projectId: this.config.projectId, datasetId: this.config.datasetId, table };
  }

  private async call<T>(operation: WarehouseOperation, table: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw classifyBigQueryError(error, operation, table);
    }
  }
}

function isAlreadyExists(error: unknown): boolean {
  const parsed = z.object({ code: z.literal(409), message: z.string() }).safeParse(error);
  return parsed.success && /already exists/i.test(parsed.data.message);
}

/**
 * Factory function for creating a BigQuery warehouse
 */
export function createBigQueryWarehouse(config: BigQueryWarehouseConfig): BigQueryWarehouse {
  return new BigQueryWarehouse(config);
}
