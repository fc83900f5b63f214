import { describe, expect, it } from 'vitest';
import type { SourceSchema } from '@catalogsync/core';
import { SchemaConflictError } from '@catalogsync/core';
import { mapType } from '../src/mapping/type-mapper.js';
import { translateSchema } from '../src/mapping/schema-translator.js';
import { SYSTEM_FIELDS } from '../src/mapping/system-fields.js';

const service: SourceSchema = {
  blueprintId: 'service',
  fields: [
    { name: 'language', type: 'string', origin: 'property' },
    { name: 'deployedAt', type: 'string', format: 'date-time', origin: 'property' },
    { name: 'tags', type: 'array', itemsType: 'string', origin: 'property' },
    { name: 'replicas', type: 'number', origin: 'property' },
    { name: 'on-call', type: 'boolean', origin: 'property' },
    { name: 'metadata', type: 'object', origin: 'property' },
    { name: 'domain', type: 'string', origin: 'relation' },
  ],
};

describe('mapType', () => {
  it('maps strings by format', () => {
    expect(mapType({ name: 'a', type: 'string', origin: 'property' }).kind).toBe('STRING');
    expect(mapType({ name: 'a', type: 'string', format: 'date-time', origin: 'property' }).kind).toBe(
      'TIMESTAMP'
    );
    expect(mapType({ name: 'a', type: 'string', format: 'date', origin: 'property' }).kind).toBe('DATE');
    expect(mapType({ name: 'a', type: 'string', format: 'url', origin: 'property' }).kind).toBe('STRING');
  });

  it('maps array<string> to a REPEATED STRING column', () => {
    expect(mapType({ name: 'tags', type: 'array', itemsType: 'string', origin: 'property' })).toEqual({
      name: 'tags',
      kind: 'STRING',
      mode: 'REPEATED',
    });
  });

  it('stores arrays as JSON text without repeated column support', () => {
    expect(
      mapType(
        { name: 'tags', type: 'array', itemsType: 'string', origin: 'property' },
        { repeatedColumns: false }
      )
    ).toEqual({ name: 'tags', kind: 'JSON_STRING', mode: 'NULLABLE' });
  });

  it('stores arrays of objects and objects as JSON text', () => {
    expect(mapType({ name: 'a', type: 'array', itemsType: 'object', origin: 'property' }).kind).toBe(
      'JSON_STRING'
    );
    expect(mapType({ name: 'a', type: 'array', origin: 'property' }).kind).toBe('JSON_STRING');
    expect(mapType({ name: 'a', type: 'object', origin: 'property' }).kind).toBe('JSON_STRING');
  });

  it('sanitizes names and keeps descriptions', () => {
    expect(
      mapType({ name: 'On-Call', type: 'boolean', origin: 'property', description: 'Pager duty' })
    ).toEqual({ name: 'on_call', kind: 'BOOL', mode: 'NULLABLE', description: 'Pager duty' });
  });
});

describe('translateSchema', () => {
  it('puts system columns first, then declared fields in order', () => {
    const names = translateSchema(service).map((column) => column.name);

    expect(names.slice(0, SYSTEM_FIELDS.length)).toEqual(SYSTEM_FIELDS.map((field) => field.name));
    expect(names.slice(SYSTEM_FIELDS.length)).toEqual([
      'language',
      'deployedat',
      'tags',
      'replicas',
      'on_call',
      'metadata',
      'domain',
    ]);
  });

  it('is deterministic', () => {
    expect(translateSchema(service)).toEqual(translateSchema(service));
  });

  it('rejects two fields that map to the same column', () => {
    const schema: SourceSchema = {
      blueprintId: 'service',
      fields: [
        { name: 'owner-team', type: 'string', origin: 'property' },
        { name: 'owner_team', type: 'string', origin: 'relation' },
      ],
    };

    expect(() => translateSchema(schema)).toThrow(SchemaConflictError);
    try {
      translateSchema(schema);
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaConflictError);
      if (err instanceof SchemaConflictError) {
        expect(err.column).toBe('owner_team');
        expect(err.fields).toEqual(['owner-team', 'owner_team (relation)']);
      }
    }
  });

  it('rejects a field that collides with a system column', () => {
    const schema: SourceSchema = {
      blueprintId: 'service',
      fields: [{ name: 'Title', type: 'string', origin: 'property' }],
    };

    expect(() => translateSchema(schema)).toThrow(/column "title"/);
  });
});
