/**
 * Maps BigQuery client failures onto sync errors.
 */

import { z } from 'zod';
import {
  AuthError,
  BufferNotFlushedError,
  NetworkError,
  SyncError,
  TransientAlterError,
  TransientWriteError,
  WarehouseError,
  errorMessage,
} from '@catalogsync/core';

export type WarehouseOperation =
  | 'tableExists'
  | 'getSchema'
  | 'createTable'
  | 'alterTable'
  | 'insertRows'
  | 'deduplicate';

const apiErrorSchema = z
  .object({
    code: z.union([z.number(), z.string()]).optional(),
    errors: z
      .array(z.object({ reason: z.string().optional(), message: z.string().optional() }).passthrough())
      .optional(),
  })
  .passthrough();

const TRANSIENT_STATUS = new Set([409, 412, 429, 500, 502, 503, 504]);
const TRANSIENT_REASONS = new Set([
  'rateLimitExceeded',
  'quotaExceeded',
  'backendError',
  'internalError',
]);
const TRANSIENT_NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE']);
const UNREACHABLE_CODES = new Set(['ENOTFOUND', 'ECONNREFUSED']);

function details(error: unknown): { status?: number; code?: string; reasons: string[] } {
  const parsed = apiErrorSchema.safeParse(error);
  if (!parsed.success) return { reasons: [] };

  const { code, errors = [] } = parsed.data;
  return {
    status: typeof code === 'number' ? code : undefined,
    code: typeof code === 'string' ? code : undefined,
    reasons: errors.flatMap((item) => (item.reason ? [item.reason] : [])),
  };
}

export function classifyBigQueryError(
  error: unknown,
  operation: WarehouseOperation,
  table?: string
): SyncError {
  if (error instanceof SyncError) return error;

  const message = errorMessage(error);
  const cause = error instanceof Error ? error : undefined;
  const { status, code, reasons } = details(error);
  const transientReason = reasons.some((reason) => TRANSIENT_REASONS.has(reason));

  if ((status === 401 || status === 403) && !transientReason) {
    return new AuthError({ service: 'BigQuery', message, cause });
  }

  if (code && UNREACHABLE_CODES.has(code)) {
    return new NetworkError({ service: 'BigQuery', message, cause });
  }

  if (/streaming buffer/i.test(message)) {
    return new BufferNotFlushedError({ table: table ?? 'table', message, cause });
  }

  const transient =
    transientReason ||
    (status !== undefined && (TRANSIENT_STATUS.has(status) || status >= 500)) ||
    (code !== undefined && TRANSIENT_NETWORK_CODES.has(code));

  if (transient && table) {
    if (operation === 'insertRows') {
      return new TransientWriteError({ table, message, cause });
    }
    if (operation === 'createTable' || operation === 'alterTable') {
      return new TransientAlterError({ table, message, cause });
    }
  }

  return new WarehouseError({ operation, table, message, cause });
}
