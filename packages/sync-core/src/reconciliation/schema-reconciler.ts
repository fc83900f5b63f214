/**
 * Schema Reconciler
 *
 * Diffs the persisted table schema against the desired one and decides
 * what to add and drop under the active migration mode.
 * Pure: it never talks to the warehouse.
 */

import type {
  KindConflict,
  MigrationMode,
  MigrationPlan,
  PersistedSchema,
  TargetColumn,
  TargetSchema,
} from '@catalogsync/core';

/** JSON text lives in ordinary string columns */
function storageKind(kind: TargetColumn['kind']): TargetColumn['kind'] {
  return kind === 'JSON_STRING' ? 'STRING' : kind;
}

function sameStorage(a: TargetColumn, b: TargetColumn): boolean {
  return a.mode === b.mode && storageKind(a.kind) === storageKind(b.kind);
}

function findKindConflicts(
  currentByName: Map<string, TargetColumn>,
  desired: TargetSchema
): KindConflict[] {
  const conflicts: KindConflict[] = [];
  for (const column of desired) {
    const persisted = currentByName.get(column.name);
    if (persisted && !sameStorage(persisted, column)) {
      conflicts.push({ name: column.name, persisted, desired: column });
    }
  }
  return conflicts;
}

/**
 * The column rows are coerced against: the desired definition when it is
 * stored the same way, the persisted one otherwise.
 */
function resolveColumn(persisted: TargetColumn, desired: TargetColumn | undefined): TargetColumn {
  return desired && sameStorage(persisted, desired) ? desired : persisted;
}

/**
 * Columns are compared by name. A column present on both sides with a
 * different kind or mode keeps its persisted definition in every mode;
 * type changes are never applied.
 */
export function planMigration(
  current: PersistedSchema,
  desired: TargetSchema,
  mode: MigrationMode
): MigrationPlan {
  if (current.length === 0) {
    return {
      columnsToAdd: [...desired],
      columnsToDrop: [],
      finalSchema: [...desired],
      kindConflicts: [],
    };
  }

  const currentByName = new Map(current.map((column) => [column.name, column]));
  const desiredByName = new Map(desired.map((column) => [column.name, column]));
  const kindConflicts = findKindConflicts(currentByName, desired);
  const missing = desired.filter((column) => !currentByName.has(column.name));

  switch (mode) {
    case 'weak':
      return {
        columnsToAdd: [],
        columnsToDrop: [],
        finalSchema: current.map((column) => resolveColumn(column, desiredByName.get(column.name))),
        kindConflicts,
      };

    case 'balanced':
      return {
        columnsToAdd: missing,
        columnsToDrop: [],
        finalSchema: [
          ...current.map((column) => resolveColumn(column, desiredByName.get(column.name))),
          ...missing,
        ],
        kindConflicts,
      };

    case 'hard':
      return {
        columnsToAdd: missing,
        columnsToDrop: current
          .filter((column) => !desiredByName.has(column.name))
          .map((column) => column.name),
        finalSchema: desired.map((column) => {
          const persisted = currentByName.get(column.name);
          return persisted ? resolveColumn(persisted, column) : column;
        }),
        kindConflicts,
      };

    default: {
      const exhaustive: never = mode;
      throw new Error(`Unsupported migration mode: ${String(exhaustive)}`);
    }
  }
}

export function isEmptyPlan(plan: MigrationPlan): boolean {
  return plan.columnsToAdd.length === 0 && plan.columnsToDrop.length === 0;
}
