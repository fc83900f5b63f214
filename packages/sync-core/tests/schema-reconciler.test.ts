import { describe, expect, it } from 'vitest';
import type { TargetColumn } from '@catalogsync/core';
import { isEmptyPlan, planMigration } from '../src/reconciliation/schema-reconciler.js';

const col = (name: string, kind: TargetColumn['kind'] = 'STRING'): TargetColumn => ({
  name,
  kind,
  mode: 'NULLABLE',
});

const names = (columns: readonly TargetColumn[]) => columns.map((column) => column.name);

describe('planMigration', () => {
  const current = [col('a'), col('b')];
  const desired = [col('b'), col('c')];

  it('weak: changes nothing', () => {
    const plan = planMigration(current, desired, 'weak');

    expect(plan.columnsToAdd).toEqual([]);
    expect(plan.columnsToDrop).toEqual([]);
    expect(names(plan.finalSchema)).toEqual(['a', 'b']);
    expect(isEmptyPlan(plan)).toBe(true);
  });

  it('balanced: adds missing columns and keeps extra ones', () => {
    const plan = planMigration(current, desired, 'balanced');

    expect(names(plan.columnsToAdd)).toEqual(['c']);
    expect(plan.columnsToDrop).toEqual([]);
    expect(names(plan.finalSchema)).toEqual(['a', 'b', 'c']);
  });

  it('hard: adds missing columns and drops extra ones', () => {
    const plan = planMigration(current, desired, 'hard');

    expect(names(plan.columnsToAdd)).toEqual(['c']);
    expect(plan.columnsToDrop).toEqual(['a']);
    expect(names(plan.finalSchema)).toEqual(['b', 'c']);
  });

  it('creates every desired column for a missing table', () => {
    for (const mode of ['weak', 'balanced', 'hard'] as const) {
      const plan = planMigration([], desired, mode);
      expect(names(plan.columnsToAdd)).toEqual(['b', 'c']);
      expect(names(plan.finalSchema)).toEqual(['b', 'c']);
    }
  });

  it('keeps the persisted column when kinds differ and reports it', () => {
    const plan = planMigration([col('a'), col('b', 'STRING')], [col('b', 'FLOAT64')], 'hard');

    expect(plan.finalSchema).toEqual([col('b', 'STRING')]);
    expect(plan.kindConflicts).toEqual([
      { name: 'b', persisted: col('b', 'STRING'), desired: col('b', 'FLOAT64') },
    ]);
  });

  it('treats JSON text columns stored as strings as unchanged', () => {
    const json = col('metadata', 'JSON_STRING');
    const plan = planMigration([col('a'), col('metadata', 'STRING')], [col('a'), json], 'balanced');

    expect(plan.kindConflicts).toEqual([]);
    expect(plan.finalSchema).toEqual([col('a'), json]);
    expect(isEmptyPlan(plan)).toBe(true);
  });

  it('is empty when schemas already match', () => {
    expect(isEmptyPlan(planMigration(desired, desired, 'hard'))).toBe(true);
  });
});
