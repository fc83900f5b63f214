/**
 * Error types for the sync engine and its collaborators
 */

export type SyncErrorCode =
  | 'SCHEMA_CONFLICT'
  | 'VALUE_COERCION'
  | 'TRANSIENT_WRITE'
  | 'TRANSIENT_ALTER'
  | 'BUFFER_NOT_FLUSHED'
  | 'AUTHENTICATION_FAILED'
  | 'NETWORK_ERROR'
  | 'CATALOG_REQUEST_FAILED'
  | 'WAREHOUSE_ERROR'
  | 'UNKNOWN';

export interface SyncErrorDetails {
  /** Error code for programmatic handling */
  code: SyncErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: SyncErrorDetails) {
    super(details.message);
    this.name = 'SyncError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace?.(this, new.target);
  }
}

/**
 * Two source fields sanitize to the same column name.
 */
export class SchemaConflictError extends SyncError {
  readonly column: string;
  readonly fields: readonly [string, string];

  constructor(details: { column: string; first: string; second: string; blueprintId?: string }) {
    super({
      code: 'SCHEMA_CONFLICT',
      message: `Source fields "${details.first}" and "${details.second}" both map to column "${details.column}"`,
      suggestion: 'Rename one of the fields in the blueprint so their column names differ.',
      context: { blueprintId: details.blueprintId, column: details.column },
    });
    this.name = 'SchemaConflictError';
    this.column = details.column;
    this.fields = [details.first, details.second];
  }
}

/**
 * A single entity value cannot be converted to its column kind.
 */
export class ValueCoercionError extends SyncError {
  readonly entityId: string;
  readonly field: string;

  constructor(details: { entityId: string; field: string; reason: string }) {
    super({
      code: 'VALUE_COERCION',
      message: `Entity "${details.entityId}", field "${details.field}": ${details.reason}`,
      context: { entityId: details.entityId, field: details.field },
    });
    this.name = 'ValueCoercionError';
    this.entityId = details.entityId;
    this.field = details.field;
  }
}

export class TransientWriteError extends SyncError {
  constructor(details: { table: string; message: string; cause?: Error }) {
    super({
      code: 'TRANSIENT_WRITE',
      message: `Insert into ${details.table} failed: ${details.message}`,
      cause: details.cause,
      context: { table: details.table },
    });
    this.name = 'TransientWriteError';
  }
}

export class TransientAlterError extends SyncError {
  constructor(details: { table: string; message: string; cause?: Error }) {
    super({
      code: 'TRANSIENT_ALTER',
      message: `Schema change on ${details.table} failed: ${details.message}`,
      suggestion: 'Another job may be altering the table; retry the export later.',
      cause: details.cause,
      context: { table: details.table },
    });
    this.name = 'TransientAlterError';
  }
}

/**
 * Rows are still in the warehouse's streaming buffer and cannot be
 * updated or deleted yet.
 */
export class BufferNotFlushedError extends SyncError {
  constructor(details: { table: string; message: string; cause?: Error }) {
    super({
      code: 'BUFFER_NOT_FLUSHED',
      message: `Streaming buffer of ${details.table} not flushed: ${details.message}`,
      suggestion: 'Recently streamed rows become mutable after the buffer flushes (up to 90 minutes).',
      cause: details.cause,
      context: { table: details.table },
    });
    this.name = 'BufferNotFlushedError';
  }
}

export class AuthError extends SyncError {
  constructor(details: { service: string; message: string; cause?: Error }) {
    super({
      code: 'AUTHENTICATION_FAILED',
      message: `${details.service} authentication failed: ${details.message}`,
      suggestion: `Check the ${details.service} credentials and their permissions.`,
      cause: details.cause,
      context: { service: details.service },
    });
    this.name = 'AuthError';
  }
}

export class NetworkError extends SyncError {
  constructor(details: { service: string; message: string; cause?: Error }) {
    super({
      code: 'NETWORK_ERROR',
      message: `Cannot reach ${details.service}: ${details.message}`,
      suggestion: 'Check network connectivity and the configured API URL.',
      cause: details.cause,
      context: { service: details.service },
    });
    this.name = 'NetworkError';
  }
}

export class CatalogRequestError extends SyncError {
  readonly status?: number;

  constructor(details: { message: string; status?: number; cause?: Error }) {
    super({
      code: 'CATALOG_REQUEST_FAILED',
      message: details.message,
      cause: details.cause,
      context: { status: details.status },
    });
    this.name = 'CatalogRequestError';
    this.status = details.status;
  }
}

export class WarehouseError extends SyncError {
  constructor(details: { operation: string; table?: string; message: string; cause?: Error }) {
    super({
      code: 'WAREHOUSE_ERROR',
      message: details.table
        ? `Warehouse ${details.operation} on ${details.table} failed: ${details.message}`
        : `Warehouse ${details.operation} failed: ${details.message}`,
      cause: details.cause,
      context: { operation: details.operation, table: details.table },
    });
    this.name = 'WarehouseError';
  }
}

/**
 * Errors that end a blueprint immediately and are never retried
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof AuthError || error instanceof NetworkError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Helper to wrap unknown errors as SyncError
 */
export function wrapError(error: unknown, defaultCode: SyncErrorCode = 'UNKNOWN'): SyncError {
  if (error instanceof SyncError) {
    return error;
  }

  return new SyncError({
    code: defaultCode,
    message: errorMessage(error),
    cause: error instanceof Error ? error : undefined,
  });
}
