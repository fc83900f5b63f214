/**
 * Wires settings to the Port catalog, the BigQuery warehouse and the
 * orchestrator, and reports the outcome.
 */

import type { ICatalogClient, IWarehouseClient, SyncProgress, SyncRunResult } from '@catalogsync/core';
import { Logger, silentLogger } from '@catalogsync/core';
import { SyncOrchestrator, formatRunSummary } from '@catalogsync/sync-core';
import { createPortCatalog } from '@catalogsync/connector-port';
import { createBigQueryWarehouse } from '@catalogsync/connector-bigquery';
import type { Settings } from './config.js';

export interface ExportOptions {
  logger?: Logger;
  signal?: AbortSignal;
  /** Defaults to the Port catalog from settings */
  catalog?: ICatalogClient;
  /** Defaults to the BigQuery dataset from settings */
  warehouse?: IWarehouseClient;
  onProgress?: (progress: SyncProgress) => void;
  /** Receives the run summary (default: stderr) */
  write?: (text: string) => void;
}

export async function runExport(settings: Settings, options: ExportOptions = {}): Promise<SyncRunResult> {
  const logger = options.logger ?? silentLogger;

  const catalog =
    options.catalog ??
    createPortCatalog({
      clientId: settings.port.clientId,
      clientSecret: settings.port.clientSecret,
      baseUrl: settings.port.baseUrl,
      logger: logger.child({ component: 'port' }),
    });

  const warehouse =
    options.warehouse ??
    createBigQueryWarehouse({
      ...settings.bigquery,
      logger: logger.child({ component: 'bigquery' }),
    });

  const orchestrator = new SyncOrchestrator({
    catalog,
    warehouse,
    mode: settings.mode,
    logger,
    batchSize: settings.batchSize,
    concurrency: settings.concurrency,
    tablePrefix: settings.tablePrefix,
    writeRetry: settings.writeRetry,
    dedupRetry: settings.dedupRetry,
    signal: options.signal,
    onProgress: options.onProgress,
  });

  const result = await orchestrator.run(settings.blueprints);

  const write = options.write ?? ((text: string) => process.stderr.write(text));
  write(`${formatRunSummary(result.results)}\n`);

  logger.info('Export finished', { exitCode: result.exitCode, cancelled: result.cancelled });
  return result;
}
