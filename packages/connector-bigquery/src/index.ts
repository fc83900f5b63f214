/**
 * @catalogsync/connector-bigquery
 *
 * BigQuery warehouse client
 */

export { BigQueryWarehouse, createBigQueryWarehouse } from './warehouse.js';
export type { BigQueryWarehouseConfig, ServiceAccountCredentials } from './warehouse.js';

export { classifyBigQueryError } from './errors.js';
export type { WarehouseOperation } from './errors.js';

export { toBigQueryField, toSqlType, fromBigQueryField } from './field-types.js';
export type { BigQueryField } from './field-types.js';

export {
  buildAlterTableQuery,
  buildDeduplicateQuery,
  qualifiedTableName,
  validateDataset,
  validateIdentifier,
} from './queries.js';
export type { TableRef } from './queries.js';
