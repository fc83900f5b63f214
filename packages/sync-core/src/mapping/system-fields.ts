import type { SourceField } from '@catalogsync/core';
import { IDENTIFIER_COLUMN, SYNCED_AT_COLUMN, SYNC_ID_COLUMN } from '@catalogsync/core';

/**
 * Fields every synced table carries, whatever the blueprint declares.
 * They always come first, in this order.
 */
export const SYSTEM_FIELDS: readonly SourceField[] = [
  { name: IDENTIFIER_COLUMN, type: 'string', origin: 'system', description: 'Entity identifier' },
  { name: 'title', type: 'string', origin: 'system' },
  { name: 'icon', type: 'string', origin: 'system' },
  { name: 'team', type: 'array', itemsType: 'string', origin: 'system' },
  { name: 'created_at', type: 'string', format: 'date-time', origin: 'system' },
  { name: 'created_by', type: 'string', origin: 'system' },
  { name: 'updated_at', type: 'string', format: 'date-time', origin: 'system' },
  { name: 'updated_by', type: 'string', origin: 'system' },
  {
    name: SYNCED_AT_COLUMN,
    type: 'string',
    format: 'date-time',
    origin: 'system',
    description: 'Time the row was exported',
  },
  {
    name: SYNC_ID_COLUMN,
    type: 'string',
    origin: 'system',
    description: 'Unique id of the exported row',
  },
];
