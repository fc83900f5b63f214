/**
 * Entity and row types
 */

export interface Entity {
  identifier: string;
  title?: string | null;
  icon?: string | null;
  team?: string[];
  /** Property values, including calculation, aggregation and mirror properties */
  properties: Record<string, unknown>;
  /** Relation targets: an identifier, a list of identifiers, or null */
  relations: Record<string, unknown>;
  createdAt?: string | null;
  createdBy?: string | null;
  updatedAt?: string | null;
  updatedBy?: string | null;
}

export type ScalarValue = string | number | boolean;

export type RowValue = ScalarValue | ScalarValue[] | null;

/** One warehouse row, keyed by column name */
export type Row = Record<string, RowValue>;

export interface SearchQuery {
  combinator: 'and' | 'or';
  rules: unknown[];
}

export interface EntityPage {
  entities: Entity[];
  /** Cursor for the next page; absent on the last page */
  nextCursor?: string;
}
