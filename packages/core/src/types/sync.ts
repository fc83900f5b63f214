/**
 * Sync run configuration and outcome types
 */

import type { SyncErrorCode } from '../errors/sync-error.js';
import type { SearchQuery } from './entity.js';

export interface BlueprintSyncConfig {
  blueprintId: string;
  searchQuery: SearchQuery;
  /** Only these entity identifiers are exported (when non-empty) */
  includeEntities?: string[];
  /** These entity identifiers are never exported */
  excludeEntities?: string[];
  /** Target table name; derived from the blueprint id when omitted */
  table?: string;
}

export type BlueprintState =
  | 'FETCH_SCHEMA'
  | 'RECONCILE'
  | 'APPLY_PLAN'
  | 'PAGE_ENTITIES'
  | 'FLUSH_DEDUPLICATION'
  | 'DONE'
  | 'FAILED'
  | 'CANCELLED';

export interface BlueprintResult {
  blueprintId: string;
  table: string;
  rowsWritten: number;
  rowsFailed: number;
  /** Entities removed by include/exclude filters */
  rowsSkipped: number;
  finalState: BlueprintState;
  /** State the blueprint was in when it failed */
  failedState?: BlueprintState;
  error?: string;
  errorCode?: SyncErrorCode;
  /** Suggested action for the failure, when one is known */
  suggestion?: string;
  warnings: string[];
  durationMs: number;
}

export interface SyncProgress {
  blueprintId: string;
  table: string;
  processed: number;
  written: number;
  failed: number;
  skipped: number;
}

export interface SyncRunResult {
  results: BlueprintResult[];
  cancelled: boolean;
  exitCode: number;
}

export interface RowError {
  /** Index of the row in the submitted batch */
  index: number;
  message: string;
}

export interface InsertResult {
  inserted: number;
  errors: RowError[];
}

export interface DeduplicationResult {
  removed: number;
}
