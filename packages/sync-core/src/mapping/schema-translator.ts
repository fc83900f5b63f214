/**
 * Schema Translator
 *
 * Turns a blueprint's source schema into the desired warehouse schema.
 */

import type { SourceField, SourceSchema, TargetColumn, TargetSchema } from '@catalogsync/core';
import { SchemaConflictError } from '@catalogsync/core';
import { SYSTEM_FIELDS } from './system-fields.js';
import { mapType, type TypeMappingOptions } from './type-mapper.js';

export type TranslateOptions = TypeMappingOptions;

function describeField(field: SourceField): string {
  return field.origin === 'property' ? field.name : `${field.name} (${field.origin})`;
}

/**
 * System fields first, then declared fields in declaration order.
 * @throws SchemaConflictError when two fields map to the same column name
 */
export function translateSchema(schema: SourceSchema, options: TranslateOptions = {}): TargetSchema {
  const columns: TargetColumn[] = [];
  const owners = new Map<string, SourceField>();

  for (const field of [...SYSTEM_FIELDS, ...schema.fields]) {
    const column = mapType(field, options);
    const owner = owners.get(column.name);

    if (owner) {
      throw new SchemaConflictError({
        column: column.name,
        first: describeField(owner),
        second: describeField(field),
        blueprintId: schema.blueprintId,
      });
    }

    owners.set(column.name, field);
    columns.push(column);
  }

  return columns;
}
