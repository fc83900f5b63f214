/**
 * Converts Port blueprints and entities into catalog-neutral types.
 */

import type { Entity, SourceField, SourceFieldType, SourceSchema } from '@catalogsync/core';
import { isSourceFieldType } from '@catalogsync/core';
import type { PortBlueprint, PortEntity } from './client.js';

interface PortFieldDefinition {
  type?: string;
  format?: string;
  description?: string;
  items?: { type?: string };
}

/** Port types outside the JSON-schema core */
const TYPE_ALIASES = new Map<string, { type: SourceFieldType; format?: string }>([
  ['datetime', { type: 'string', format: 'date-time' }],
  ['date-time', { type: 'string', format: 'date-time' }],
  ['integer', { type: 'number' }],
]);

function normalizeType(type: string | undefined): { type: SourceFieldType; format?: string } {
  if (isSourceFieldType(type)) return { type };
  return (type ? TYPE_ALIASES.get(type) : undefined) ?? { type: 'string' };
}

function toField(
  name: string,
  definition: PortFieldDefinition,
  origin: SourceField['origin']
): SourceField {
  const normalized = normalizeType(definition.type);
  const field: SourceField = { name, type: normalized.type, origin };

  const format = definition.format ?? normalized.format;
  if (format) field.format = format;
  // Without a declared item type the array is stored as JSON text
  if (normalized.type === 'array' && definition.items?.type) {
    field.itemsType = normalizeType(definition.items.type).type;
  }
  if (definition.description) field.description = definition.description;

  return field;
}

/**
 * Declared fields in blueprint order: properties, relations, calculation,
 * aggregation and mirror properties.
 */
export function toSourceSchema(blueprint: PortBlueprint): SourceSchema {
  const fields: SourceField[] = [];

  for (const [name, definition] of Object.entries(blueprint.schema.properties)) {
    fields.push(toField(name, definition, 'property'));
  }

  for (const [name, relation] of Object.entries(blueprint.relations)) {
    const description = relation.description ?? (relation.target ? `Relation to ${relation.target}` : undefined);
    fields.push(
      relation.many
        ? toField(name, { type: 'array', items: { type: 'string' }, description }, 'relation')
        : toField(name, { type: 'string', description }, 'relation')
    );
  }

  for (const [name, definition] of Object.entries(blueprint.calculationProperties)) {
    fields.push(toField(name, definition, 'calculation'));
  }

  for (const [name, definition] of Object.entries(blueprint.aggregationProperties)) {
    fields.push(toField(name, definition, 'aggregation'));
  }

  for (const [name, mirror] of Object.entries(blueprint.mirrorProperties)) {
    fields.push(
      toField(
        name,
        { type: 'string', description: mirror.path ? `Mirror of ${mirror.path}` : undefined },
        'mirror'
      )
    );
  }

  return { blueprintId: blueprint.identifier, title: blueprint.title, fields };
}

/**
 * Calculation, aggregation and mirror values are folded into properties.
 */
export function toEntity(raw: PortEntity): Entity {
  const team = typeof raw.team === 'string' ? [raw.team] : (raw.team ?? undefined);

  return {
    identifier: raw.identifier,
    title: raw.title,
    icon: raw.icon,
    team,
    properties: {
      ...raw.properties,
      ...raw.calculationProperties,
      ...raw.aggregationProperties,
      ...raw.mirrorProperties,
    },
    relations: raw.relations,
    createdAt: raw.createdAt,
    createdBy: raw.createdBy,
    updatedAt: raw.updatedAt,
    updatedBy: raw.updatedBy,
  };
}
