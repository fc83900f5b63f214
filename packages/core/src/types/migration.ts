/**
 * Schema migration types
 */

import type { TargetColumn } from './target.js';

/**
 * - weak: create missing tables, never alter existing ones
 * - balanced: add new columns, keep historical ones
 * - hard: add new columns, drop columns no longer declared
 */
export type MigrationMode = 'weak' | 'balanced' | 'hard';

/** A column declared with a different kind than the one persisted */
export interface KindConflict {
  name: string;
  persisted: TargetColumn;
  desired: TargetColumn;
}

export interface MigrationPlan {
  columnsToAdd: TargetColumn[];
  columnsToDrop: string[];
  finalSchema: TargetColumn[];
  /** Persisted columns kept as-is although the desired kind differs */
  kindConflicts: KindConflict[];
}
