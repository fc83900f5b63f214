/**
 * Source-side schema types, as described by the catalog
 */

export type SourceFieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export const SOURCE_FIELD_TYPES: readonly SourceFieldType[] = [
  'string',
  'number',
  'boolean',
  'array',
  'object',
];

/** Which part of a blueprint declared the field */
export type FieldOrigin =
  | 'system'
  | 'property'
  | 'relation'
  | 'calculation'
  | 'aggregation'
  | 'mirror';

export interface SourceField {
  name: string;
  type: SourceFieldType;
  /** Type refinement, e.g. `date-time` or `date` for strings */
  format?: string;
  /** For array types: the type of array elements */
  itemsType?: SourceFieldType;
  origin: FieldOrigin;
  description?: string;
}

export interface SourceSchema {
  /** Blueprint the schema was read from */
  blueprintId: string;
  title?: string;
  /** Declared fields in declaration order (system fields are implied) */
  fields: SourceField[];
}

export function isSourceFieldType(value: unknown): value is SourceFieldType {
  return typeof value === 'string' && SOURCE_FIELD_TYPES.some((type) => type === value);
}
