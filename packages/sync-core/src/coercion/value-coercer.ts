/**
 * Entity Value Coercer
 *
 * Converts one entity into a warehouse row that fits the given schema.
 */

import type {
  Entity,
  Row,
  RowValue,
  ScalarKind,
  ScalarValue,
  TargetColumn,
  TargetSchema,
} from '@catalogsync/core';
import {
  IDENTIFIER_COLUMN,
  SYNCED_AT_COLUMN,
  SYNC_ID_COLUMN,
  ValueCoercionError,
  sanitizeIdentifier,
  toCanonicalJson,
} from '@catalogsync/core';

export interface CoercionContext {
  /** Value of the `_synced_at` column */
  syncedAt?: Date;
  /** Value of the `_sync_id` column */
  syncId?: string;
}

class CastFailure extends Error {}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_TIME =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?$/i;

function preview(value: unknown): string {
  return typeof value === 'string' ? JSON.stringify(value) : toCanonicalJson(value);
}

/** Whether `YYYY-MM-DD` names a real day; Date rolls 02-30 over to 03-01 */
function isCalendarDate(date: string): boolean {
  const [year, month, day] = date.split('-').map(Number);
  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  return utc.getUTCFullYear() === year && utc.getUTCMonth() === month - 1 && utc.getUTCDate() === day;
}

function normalizeZone(zone: string | undefined): string {
  if (!zone || zone.toUpperCase() === 'Z') return 'Z';
  return zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
}

function parseTimestamp(value: unknown): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new CastFailure('invalid date');
    return value;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    let normalized: string | undefined;

    if (ISO_DATE.test(trimmed)) {
      if (isCalendarDate(trimmed)) normalized = `${trimmed}T00:00:00Z`;
    } else {
      const match = ISO_DATE_TIME.exec(trimmed);
      if (match && isCalendarDate(match[1])) {
        normalized = `${match[1]}T${match[2]}${normalizeZone(match[3])}`;
      }
    }

    if (normalized) {
      const parsed = new Date(normalized);
      if (!Number.isNaN(parsed.getTime())) return parsed;
    }
  }

  throw new CastFailure(`not an ISO-8601 timestamp: ${preview(value)}`);
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function castScalar(value: unknown, kind: ScalarKind): ScalarValue {
  switch (kind) {
    case 'STRING':
      if (typeof value === 'string') return value;
      if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
        return String(value);
      }
      if (value instanceof Date) return parseTimestamp(value).toISOString();
      if (typeof value === 'object') return toCanonicalJson(value);
      throw new CastFailure(`cannot store ${typeof value} as text`);

    case 'JSON_STRING':
      return toCanonicalJson(value);

    case 'FLOAT64': {
      const parsed = toNumber(value);
      if (parsed === undefined) throw new CastFailure(`not a number: ${preview(value)}`);
      return parsed;
    }

    case 'INT64': {
      const parsed = toNumber(value);
      if (parsed === undefined || !Number.isSafeInteger(parsed)) {
        throw new CastFailure(`not an integer: ${preview(value)}`);
      }
      return parsed;
    }

    case 'BOOL':
      if (typeof value === 'boolean') return value;
      if (value === 1 || value === 0) return value === 1;
      if (typeof value === 'string') {
        const normalized = value.trim().toLowerCase();
        if (normalized === 'true') return true;
        if (normalized === 'false') return false;
      }
      throw new CastFailure(`not a boolean: ${preview(value)}`);

    case 'TIMESTAMP':
      return parseTimestamp(value).toISOString();

    case 'DATE':
      return parseTimestamp(value).toISOString().slice(0, 10);

    default: {
      const exhaustive: never = kind;
      throw new CastFailure(`unsupported column kind ${String(exhaustive)}`);
    }
  }
}

function coerceColumn(raw: unknown, column: TargetColumn): RowValue {
  if (column.mode === 'REPEATED') {
    // Booleans are never null, not even as a list
    if (raw === null || raw === undefined) return column.kind === 'BOOL' ? [] : null;
    const items: unknown[] = Array.isArray(raw) ? raw : [raw];
    return items
      .filter((item) => item !== null && item !== undefined)
      .map((item) => castScalar(item, column.kind));
  }

  if (raw === null || raw === undefined) {
    // Booleans without a value are stored as false, never as null
    return column.kind === 'BOOL' ? false : null;
  }

  return castScalar(raw, column.kind);
}

/**
 * Raw values keyed by column name. System values take precedence over
 * properties, and properties over relations.
 */
function collectRawValues(entity: Entity, context: CoercionContext): Map<string, unknown> {
  const values = new Map<string, unknown>();
  const put = (name: string, value: unknown) => {
    const key = sanitizeIdentifier(name);
    if (values.get(key) === undefined) {
      values.set(key, value);
    }
  };

  put(IDENTIFIER_COLUMN, entity.identifier);
  put('title', entity.title);
  put('icon', entity.icon);
  put('team', entity.team);
  put('created_at', entity.createdAt);
  put('created_by', entity.createdBy);
  put('updated_at', entity.updatedAt);
  put('updated_by', entity.updatedBy);
  put(SYNCED_AT_COLUMN, context.syncedAt);
  put(SYNC_ID_COLUMN, context.syncId);

  for (const [name, value] of Object.entries(entity.properties)) put(name, value);
  for (const [name, value] of Object.entries(entity.relations)) put(name, value);

  return values;
}

/**
 * Build the row for `entity` with exactly the columns of `schema`.
 * @throws ValueCoercionError when a value cannot be stored in its column
 */
export function coerceEntity(
  entity: Entity,
  schema: TargetSchema,
  context: CoercionContext = {}
): Row {
  const values = collectRawValues(entity, context);
  const row: Row = {};

  for (const column of schema) {
    try {
      row[column.name] = coerceColumn(values.get(column.name), column);
    } catch (err) {
      if (err instanceof CastFailure) {
        throw new ValueCoercionError({
          entityId: entity.identifier,
          field: column.name,
          reason: err.message,
        });
      }
      throw err;
    }
  }

  return row;
}
