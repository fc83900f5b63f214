/**
 * Sync Orchestrator
 *
 * Drives one export run: for each blueprint, fetch the schema, reconcile the
 * table, page through entities into batched inserts, then deduplicate.
 *
 *   FETCH_SCHEMA -> RECONCILE -> APPLY_PLAN -> PAGE_ENTITIES
 *     -> FLUSH_DEDUPLICATION -> DONE
 *
 * FAILED is reachable from every state; CANCELLED once the run's signal
 * fires. Blueprints are isolated from each other.
 */

import { randomUUID } from 'node:crypto';
import type {
  BlueprintResult,
  BlueprintState,
  BlueprintSyncConfig,
  ICatalogClient,
  IWarehouseClient,
  MigrationMode,
  MigrationPlan,
  Row,
  RetryPolicy,
  SyncProgress,
  SyncRunResult,
  TargetSchema,
} from '@catalogsync/core';
import {
  BufferNotFlushedError,
  IDENTIFIER_COLUMN,
  Logger,
  SYNCED_AT_COLUMN,
  SYNC_ID_COLUMN,
  Semaphore,
  TransientAlterError,
  TransientWriteError,
  ValueCoercionError,
  createEntityMatcher,
  errorMessage,
  wrapError,
  isFatalError,
  silentLogger,
  withRetries,
} from '@catalogsync/core';
import { translateSchema } from '../mapping/index.js';
import { isEmptyPlan, planMigration } from '../reconciliation/index.js';
import { coerceEntity } from '../coercion/index.js';
import { resolveTableName } from './table-names.js';

export const DEFAULT_BATCH_SIZE = 500;

/** Insert and schema changes: 1s, 2s, 4s */
export const DEFAULT_WRITE_RETRY: RetryPolicy = {
  retries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 4_000,
};

/** Deduplication waits for the streaming buffer: 30s doubling up to 5min */
export const DEFAULT_DEDUP_RETRY: RetryPolicy = {
  retries: 5,
  baseDelayMs: 30_000,
  maxDelayMs: 300_000,
};

/** Row errors logged individually per batch */
const MAX_LOGGED_ROW_ERRORS = 5;

export interface SyncOrchestratorOptions {
  catalog: ICatalogClient;
  warehouse: IWarehouseClient;
  mode: MigrationMode;
  logger?: Logger;
  /** Maximum rows per insert (default: 500) */
  batchSize?: number;
  /** Blueprints synced at the same time (default: 1) */
  concurrency?: number;
  /** Prefix for derived table names */
  tablePrefix?: string;
  writeRetry?: RetryPolicy;
  dedupRetry?: RetryPolicy;
  /** Stops new page fetches, writes and deduplication */
  signal?: AbortSignal;
  /** Called after every batch */
  onProgress?: (progress: SyncProgress) => void;
  /** Source of `_synced_at` values */
  clock?: () => Date;
  /** Source of `_sync_id` values */
  createSyncId?: () => string;
}

interface BlueprintRun {
  blueprintId: string;
  state: BlueprintState;
  processed: number;
  written: number;
  failed: number;
  skipped: number;
  warnings: string[];
}

class Cancelled extends Error {
  constructor() {
    super('Sync cancelled');
    this.name = 'Cancelled';
  }
}

export function exitCodeFor(results: readonly BlueprintResult[], cancelled: boolean): number {
  if (results.some((result) => result.finalState === 'FAILED')) return 1;
  return cancelled ? 130 : 0;
}

export class SyncOrchestrator {
  private readonly catalog: ICatalogClient;
  private readonly warehouse: IWarehouseClient;
  private readonly mode: MigrationMode;
  private readonly logger: Logger;
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly tablePrefix: string;
  private readonly writeRetry: RetryPolicy;
  private readonly dedupRetry: RetryPolicy;
  private readonly signal?: AbortSignal;
  private readonly onProgress?: (progress: SyncProgress) => void;
  private readonly clock: () => Date;
  private readonly createSyncId: () => string;

  constructor(options: SyncOrchestratorOptions) {
    this.catalog = options.catalog;
    this.warehouse = options.warehouse;
    this.mode = options.mode;
    this.logger = options.logger ?? silentLogger;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.tablePrefix = options.tablePrefix ?? '';
    this.writeRetry = options.writeRetry ?? DEFAULT_WRITE_RETRY;
    this.dedupRetry = options.dedupRetry ?? DEFAULT_DEDUP_RETRY;
    this.signal = options.signal;
    this.onProgress = options.onProgress;
    this.clock = options.clock ?? (() => new Date());
    this.createSyncId = options.createSyncId ?? randomUUID;
  }

  /**
   * Sync every blueprint; results keep the configured order.
   */
  async run(blueprints: readonly BlueprintSyncConfig[]): Promise<SyncRunResult> {
    const semaphore = new Semaphore(this.concurrency);
    this.logger.info('Starting export', {
      mode: this.mode,
      blueprints: blueprints.length,
      concurrency: this.concurrency,
    });

    const results = await Promise.all(
      blueprints.map((config) => semaphore.run(() => this.syncBlueprint(config)))
    );

    const cancelled = this.signal?.aborted ?? false;
    return { results, cancelled, exitCode: exitCodeFor(results, cancelled) };
  }

  /**
   * Sync one blueprint. Never throws: failures end up in the result.
   */
  async syncBlueprint(config: BlueprintSyncConfig): Promise<BlueprintResult> {
    const startedAt = Date.now();
    const table = resolveTableName(config, this.tablePrefix);
    const log = this.logger.child({ blueprint: config.blueprintId, table });
    const run: BlueprintRun = {
      blueprintId: config.blueprintId,
      state: 'FETCH_SCHEMA',
      processed: 0,
      written: 0,
      failed: 0,
      skipped: 0,
      warnings: [],
    };

    const result = (extra: Partial<BlueprintResult> = {}): BlueprintResult => ({
      blueprintId: config.blueprintId,
      table,
      rowsWritten: run.written,
      rowsFailed: run.failed,
      rowsSkipped: run.skipped,
      finalState: run.state,
      warnings: run.warnings,
      durationMs: Date.now() - startedAt,
      ...extra,
    });

    try {
      this.throwIfCancelled();
      log.info('Exporting blueprint');
      const source = await this.catalog.getSchema(config.blueprintId);

      this.enter(run, 'RECONCILE', log);
      const desired = translateSchema(source, {
        repeatedColumns: this.warehouse.capabilities.repeatedColumns,
      });
      const exists = await this.warehouse.tableExists(table);
      const current = exists ? await this.warehouse.getSchema(table) : [];
      const plan = planMigration(current, desired, this.mode);
      for (const conflict of plan.kindConflicts) {
        const persisted = `${conflict.persisted.kind}/${conflict.persisted.mode}`;
        const desiredKind = `${conflict.desired.kind}/${conflict.desired.mode}`;
        run.warnings.push(
          `Column ${conflict.name} is ${persisted} in the table but ${desiredKind} in the blueprint; keeping ${persisted}`
        );
        log.warn('Column kind differs from the blueprint; keeping the existing column', {
          column: conflict.name,
          persisted,
          desired: desiredKind,
        });
      }

      this.enter(run, 'APPLY_PLAN', log);
      this.throwIfCancelled();
      await this.applyPlan(table, exists, plan, log);

      this.enter(run, 'PAGE_ENTITIES', log);
      await this.pageEntities(config, table, plan.finalSchema, run, log);

      this.enter(run, 'FLUSH_DEDUPLICATION', log);
      this.throwIfCancelled();
      await this.flushDeduplication(table, plan.finalSchema, run, log);

      this.enter(run, 'DONE', log);
      log.info('Completed export', {
        written: run.written,
        failed: run.failed,
        skipped: run.skipped,
      });
      return result();
    } catch (error) {
      if (error instanceof Cancelled) {
        log.warn('Export cancelled', { state: run.state, written: run.written });
        return result({ finalState: 'CANCELLED' });
      }

      const failure = wrapError(error);
      log.error('Export failed', { state: run.state, error: failure });
      return result({
        finalState: 'FAILED',
        failedState: run.state,
        error: failure.message,
        errorCode: failure.code,
        suggestion: failure.suggestion,
      });
    }
  }

  private enter(run: BlueprintRun, state: BlueprintState, log: Logger): void {
    log.debug('State transition', { from: run.state, to: state });
    run.state = state;
  }

  private throwIfCancelled(): void {
    if (this.signal?.aborted) {
      throw new Cancelled();
    }
  }

  private async applyPlan(
    table: string,
    exists: boolean,
    plan: MigrationPlan,
    log: Logger
  ): Promise<void> {
    const onRetry = (error: unknown, info: { attempt: number; delayMs: number }) =>
      log.warn('Schema change failed; retrying', { ...info, error });
    const retryable = (error: unknown) => error instanceof TransientAlterError;
    const change = async (fn: () => Promise<void>) => {
      try {
        await withRetries(fn, this.writeRetry, retryable, { onRetry, signal: this.signal });
      } catch (error) {
        // Retries stop early once cancelled
        if (retryable(error)) this.throwIfCancelled();
        throw error;
      }
    };

    if (!exists) {
      await change(() => this.warehouse.createTable(table, plan.finalSchema));
      log.info('Created table', { columns: plan.finalSchema.length });
      return;
    }

    if (isEmptyPlan(plan)) {
      log.info('Table schema is up to date', { mode: this.mode });
      return;
    }

    await change(() => this.warehouse.alterTable(table, plan.columnsToAdd, plan.columnsToDrop));
    log.info('Updated table schema', {
      added: plan.columnsToAdd.map((column) => column.name),
      dropped: plan.columnsToDrop,
    });
  }

  private async pageEntities(
    config: BlueprintSyncConfig,
    table: string,
    schema: TargetSchema,
    run: BlueprintRun,
    log: Logger
  ): Promise<void> {
    const matches = createEntityMatcher({
      include: config.includeEntities,
      exclude: config.excludeEntities,
    });
    const pending: Row[] = [];
    let cursor: string | undefined;

    do {
      this.throwIfCancelled();
      const page = await this.catalog.searchEntities(config.blueprintId, config.searchQuery, cursor);
      log.debug('Fetched page', { entities: page.entities.length });

      for (const entity of page.entities) {
        run.processed++;
        if (!matches(entity.identifier)) {
          run.skipped++;
          continue;
        }

        try {
          pending.push(
            coerceEntity(entity, schema, {
              syncedAt: this.clock(),
              syncId: this.createSyncId(),
            })
          );
        } catch (error) {
          if (!(error instanceof ValueCoercionError)) throw error;
          run.failed++;
          log.warn('Skipping entity', { entity: entity.identifier, error });
          continue;
        }

        if (pending.length >= this.batchSize) {
          await this.writeBatch(table, pending.splice(0, pending.length), run, log);
        }
      }

      cursor = page.nextCursor;
    } while (cursor);

    if (pending.length > 0) {
      await this.writeBatch(table, pending.splice(0, pending.length), run, log);
    }

    if (run.processed === 0) {
      log.info('No entities found');
    }
  }

  /**
   * Insert one batch. A batch that still fails after retries is counted as
   * failed and the export moves on; only fatal errors propagate.
   */
  private async writeBatch(
    table: string,
    rows: Row[],
    run: BlueprintRun,
    log: Logger
  ): Promise<void> {
    this.throwIfCancelled();

    try {
      const outcome = await withRetries(
        () => this.warehouse.insertRows(table, rows),
        this.writeRetry,
        (error) => error instanceof TransientWriteError,
        {
          onRetry: (error, info) => log.warn('Batch insert failed; retrying', { ...info, error }),
        }
      );

      run.written += outcome.inserted;
      run.failed += outcome.errors.length;
      for (const rowError of outcome.errors.slice(0, MAX_LOGGED_ROW_ERRORS)) {
        const identifier = rows[rowError.index]?.[IDENTIFIER_COLUMN];
        log.warn('Row rejected', { entity: identifier, error: rowError.message });
      }
    } catch (error) {
      if (isFatalError(error)) throw error;
      run.failed += rows.length;
      log.error('Batch insert failed; skipping batch', { rows: rows.length, error });
    }

    const progress: SyncProgress = {
      blueprintId: run.blueprintId,
      table,
      processed: run.processed,
      written: run.written,
      failed: run.failed,
      skipped: run.skipped,
    };
    log.info('Exported entities so far', {
      processed: progress.processed,
      written: progress.written,
      failed: progress.failed,
    });
    this.onProgress?.(progress);
  }

  /**
   * Remove rows superseded by a later insert of the same entity.
   * Only balanced and hard runs rewrite rows, so weak runs skip it.
   */
  private async flushDeduplication(
    table: string,
    schema: TargetSchema,
    run: BlueprintRun,
    log: Logger
  ): Promise<void> {
    if (this.mode === 'weak') {
      log.debug('Skipping deduplication in weak mode');
      return;
    }

    const columns = new Set(schema.map((column) => column.name));
    if (![IDENTIFIER_COLUMN, SYNCED_AT_COLUMN, SYNC_ID_COLUMN].every((name) => columns.has(name))) {
      const warning = `Deduplication skipped: ${table} lacks the ${SYNCED_AT_COLUMN}/${SYNC_ID_COLUMN} columns`;
      run.warnings.push(warning);
      log.warn(warning);
      return;
    }

    try {
      const outcome = await withRetries(
        () => this.warehouse.deduplicate(table, IDENTIFIER_COLUMN),
        this.dedupRetry,
        (error) => error instanceof BufferNotFlushedError,
        {
          signal: this.signal,
          onRetry: (_error, info) =>
            log.info('Streaming buffer not flushed yet; waiting to deduplicate', info),
        }
      );
      log.info('Removed duplicate rows', { removed: outcome.removed });
    } catch (error) {
      if (isFatalError(error)) throw error;
      if (error instanceof BufferNotFlushedError) this.throwIfCancelled();
      const warning =
        error instanceof BufferNotFlushedError
          ? 'Deduplication postponed: recent rows are still in the streaming buffer; duplicates may remain until the next run'
          : `Deduplication failed: ${errorMessage(error)}`;
      run.warnings.push(warning);
      log.warn(warning);
    }
  }
}
