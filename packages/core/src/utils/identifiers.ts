/** Key column of every synced table */
export const IDENTIFIER_COLUMN = 'identifier';

/** Time the row was produced by the exporter */
export const SYNCED_AT_COLUMN = '_synced_at';

/** Unique id of one inserted row; doubles as the streaming insert id */
export const SYNC_ID_COLUMN = '_sync_id';

/**
 * Turn an arbitrary name into a warehouse-legal identifier:
 * lower-case, every non-alphanumeric character replaced by `_`,
 * and a leading digit prefixed with `_`.
 */
export function sanitizeIdentifier(name: string): string {
  const replaced = name.toLowerCase().replace(/[^a-z0-9]/g, '_');
  if (replaced.length === 0) {
    return '_';
  }
  return /^[0-9]/.test(replaced) ? `_${replaced}` : replaced;
}
