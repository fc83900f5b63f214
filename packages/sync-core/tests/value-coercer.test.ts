import { describe, expect, it } from 'vitest';
import type { Entity, TargetSchema } from '@catalogsync/core';
import { ValueCoercionError } from '@catalogsync/core';
import { coerceEntity } from '../src/coercion/value-coercer.js';

function entity(overrides: Partial<Entity> = {}): Entity {
  return { identifier: 'svc-1', properties: {}, relations: {}, ...overrides };
}

describe('coerceEntity', () => {
  it('stores a missing boolean as false', () => {
    const schema: TargetSchema = [{ name: 'enabled', kind: 'BOOL', mode: 'NULLABLE' }];

    expect(coerceEntity(entity(), schema)).toEqual({ enabled: false });
  });

  it('stores a missing repeated boolean as an empty list', () => {
    const schema: TargetSchema = [{ name: 'checks', kind: 'BOOL', mode: 'REPEATED' }];

    expect(coerceEntity(entity(), schema)).toEqual({ checks: [] });
  });

  it('stores other missing values as null', () => {
    const schema: TargetSchema = [
      { name: 'language', kind: 'STRING', mode: 'NULLABLE' },
      { name: 'tags', kind: 'STRING', mode: 'REPEATED' },
    ];

    expect(coerceEntity(entity({ properties: { language: null } }), schema)).toEqual({
      language: null,
      tags: null,
    });
  });

  it('writes objects as canonical JSON that parses back to the same value', () => {
    const metadata = { owner: { name: 'payments', tier: 1 }, flags: [true, false], note: null };
    const schema: TargetSchema = [{ name: 'metadata', kind: 'JSON_STRING', mode: 'NULLABLE' }];

    const row = coerceEntity(entity({ properties: { metadata } }), schema);

    expect(row.metadata).toBe(
      '{"flags":[true,false],"note":null,"owner":{"name":"payments","tier":1}}'
    );
    expect(typeof row.metadata === 'string' && JSON.parse(row.metadata)).toEqual(metadata);
  });

  it('normalizes timestamps and dates', () => {
    const schema: TargetSchema = [
      { name: 'deployed_at', kind: 'TIMESTAMP', mode: 'NULLABLE' },
      { name: 'released', kind: 'TIMESTAMP', mode: 'NULLABLE' },
      { name: 'due', kind: 'DATE', mode: 'NULLABLE' },
    ];

    const row = coerceEntity(
      entity({
        properties: {
          deployed_at: '2024-03-01T10:15:00+0200',
          released: '2024-03-01',
          due: '2024-05-20T23:00:00Z',
        },
      }),
      schema
    );

    expect(row).toEqual({
      deployed_at: '2024-03-01T08:15:00.000Z',
      released: '2024-03-01T00:00:00.000Z',
      due: '2024-05-20',
    });
  });

  it('rejects a malformed timestamp with the entity and field', () => {
    const schema: TargetSchema = [{ name: 'deployed_at', kind: 'TIMESTAMP', mode: 'NULLABLE' }];

    expect(() =>
      coerceEntity(entity({ properties: { deployed_at: 'yesterday' } }), schema)
    ).toThrow(ValueCoercionError);
    expect(() =>
      coerceEntity(entity({ properties: { deployed_at: 'yesterday' } }), schema)
    ).toThrow('Entity "svc-1", field "deployed_at": not an ISO-8601 timestamp: "yesterday"');
  });

  it('casts scalars to the column kind', () => {
    const schema: TargetSchema = [
      { name: 'replicas', kind: 'FLOAT64', mode: 'NULLABLE' },
      { name: 'port', kind: 'INT64', mode: 'NULLABLE' },
      { name: 'public', kind: 'BOOL', mode: 'NULLABLE' },
      { name: 'version', kind: 'STRING', mode: 'NULLABLE' },
    ];

    expect(
      coerceEntity(
        entity({ properties: { replicas: '3', port: 8080, public: 'TRUE', version: 2 } }),
        schema
      )
    ).toEqual({ replicas: 3, port: 8080, public: true, version: '2' });
  });

  it('rejects a non-integer value for an INT64 column', () => {
    const schema: TargetSchema = [{ name: 'port', kind: 'INT64', mode: 'NULLABLE' }];

    expect(() => coerceEntity(entity({ properties: { port: 80.5 } }), schema)).toThrow(
      'not an integer: 80.5'
    );
  });

  it('rejects dates that do not exist in the calendar', () => {
    const dateSchema: TargetSchema = [{ name: 'due', kind: 'DATE', mode: 'NULLABLE' }];
    const timestampSchema: TargetSchema = [{ name: 'at', kind: 'TIMESTAMP', mode: 'NULLABLE' }];

    expect(() => coerceEntity(entity({ properties: { due: '2024-02-30' } }), dateSchema)).toThrow(
      'Entity "svc-1", field "due": not an ISO-8601 timestamp: "2024-02-30"'
    );
    expect(() =>
      coerceEntity(entity({ properties: { at: '2024-02-31T10:00:00Z' } }), timestampSchema)
    ).toThrow(ValueCoercionError);
    expect(coerceEntity(entity({ properties: { due: '2024-02-29' } }), dateSchema)).toEqual({
      due: '2024-02-29',
    });
  });

  it('fills repeated columns from arrays and single values', () => {
    const schema: TargetSchema = [
      { name: 'team', kind: 'STRING', mode: 'REPEATED' },
      { name: 'dependencies', kind: 'STRING', mode: 'REPEATED' },
    ];

    expect(
      coerceEntity(
        entity({ team: ['payments', 'platform'], relations: { dependencies: 'svc-2' } }),
        schema
      )
    ).toEqual({ team: ['payments', 'platform'], dependencies: ['svc-2'] });
  });

  it('fills system and sync columns', () => {
    const schema: TargetSchema = [
      { name: 'identifier', kind: 'STRING', mode: 'NULLABLE' },
      { name: 'title', kind: 'STRING', mode: 'NULLABLE' },
      { name: 'updated_at', kind: 'TIMESTAMP', mode: 'NULLABLE' },
      { name: '_synced_at', kind: 'TIMESTAMP', mode: 'NULLABLE' },
      { name: '_sync_id', kind: 'STRING', mode: 'NULLABLE' },
    ];

    const row = coerceEntity(
      entity({ title: 'Checkout', updatedAt: '2024-01-02T03:04:05.000Z' }),
      schema,
      { syncedAt: new Date('2024-06-01T00:00:00.000Z'), syncId: 'sync-1' }
    );

    expect(row).toEqual({
      identifier: 'svc-1',
      title: 'Checkout',
      updated_at: '2024-01-02T03:04:05.000Z',
      _synced_at: '2024-06-01T00:00:00.000Z',
      _sync_id: 'sync-1',
    });
  });

  it('emits exactly the schema columns', () => {
    const schema: TargetSchema = [{ name: 'language', kind: 'STRING', mode: 'NULLABLE' }];

    expect(
      Object.keys(coerceEntity(entity({ properties: { language: 'go', extra: 1 } }), schema))
    ).toEqual(['language']);
  });
});
