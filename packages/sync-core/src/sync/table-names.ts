import type { BlueprintSyncConfig } from '@catalogsync/core';
import { sanitizeIdentifier } from '@catalogsync/core';

/**
 * Target table of a blueprint: the configured table, or the prefixed,
 * sanitized blueprint identifier.
 */
export function resolveTableName(config: BlueprintSyncConfig, prefix = ''): string {
  return config.table ?? `${prefix}${sanitizeIdentifier(config.blueprintId)}`;
}
