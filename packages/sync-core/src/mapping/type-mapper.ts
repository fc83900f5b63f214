/**
 * Type Mapper
 *
 * Maps one source field to one warehouse column. Total over every input:
 * anything unrecognized becomes a STRING column.
 */

import type { ScalarKind, SourceField, SourceFieldType, TargetColumn } from '@catalogsync/core';
import { sanitizeIdentifier } from '@catalogsync/core';

export interface TypeMappingOptions {
  /**
   * Whether the target supports REPEATED columns (default: true).
   * Without them, arrays of scalars are stored as JSON text.
   */
  repeatedColumns?: boolean;
}

const ARRAY_ITEM_KINDS: Partial<Record<SourceFieldType, ScalarKind>> = {
  string: 'STRING',
  number: 'FLOAT64',
  boolean: 'BOOL',
};

function stringKind(format: string | undefined): ScalarKind {
  switch (format?.toLowerCase()) {
    case 'date-time':
      return 'TIMESTAMP';
    case 'date':
      return 'DATE';
    default:
      return 'STRING';
  }
}

export function mapType(field: SourceField, options: TypeMappingOptions = {}): TargetColumn {
  const column = (kind: ScalarKind, mode: TargetColumn['mode'] = 'NULLABLE'): TargetColumn =>
    field.description
      ? { name: sanitizeIdentifier(field.name), kind, mode, description: field.description }
      : { name: sanitizeIdentifier(field.name), kind, mode };

  switch (field.type) {
    case 'string':
      return column(stringKind(field.format));

    case 'number':
      // The catalog does not distinguish integers
      return column('FLOAT64');

    case 'boolean':
      return column('BOOL');

    case 'array': {
      const itemKind = field.itemsType ? ARRAY_ITEM_KINDS[field.itemsType] : undefined;
      if (itemKind && options.repeatedColumns !== false) {
        return column(itemKind, 'REPEATED');
      }
      return column('JSON_STRING');
    }

    case 'object':
      return column('JSON_STRING');

    default:
      return column('STRING');
  }
}
