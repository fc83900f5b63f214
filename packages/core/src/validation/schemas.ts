/**
 * Zod schemas for validating sync configuration
 */

import { z } from 'zod';
import type { BlueprintSyncConfig } from '../types/index.js';

/** Migration mode, accepted in any letter case */
export const migrationModeSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['weak', 'balanced', 'hard']));

/** Catalog search query; rules are passed to the catalog untouched */
export const searchQuerySchema = z.object({
  combinator: z.enum(['and', 'or']).default('and'),
  rules: z.array(z.unknown()).default([]),
});

const entityIdListSchema = z.array(z.string().min(1));

/**
 * One blueprint entry of the entities configuration file
 * (snake_case on disk, camelCase once parsed)
 */
export const blueprintEntrySchema = z
  .object({
    identifier: z.string().min(1),
    search_query: searchQuerySchema.default({}),
    include_entities: entityIdListSchema.optional(),
    exclude_entities: entityIdListSchema.optional(),
    table: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Table names may contain letters, digits and underscores only')
      .optional(),
  })
  .strict()
  .transform(
    (entry): BlueprintSyncConfig => ({
      blueprintId: entry.identifier,
      searchQuery: entry.search_query,
      includeEntities: entry.include_entities,
      excludeEntities: entry.exclude_entities,
      table: entry.table,
    })
  );

export const entitiesConfigSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    blueprints: z.array(blueprintEntrySchema).min(1),
  })
  .strict()
  .superRefine((value, ctx) => {
    const ids = new Set<string>();
    value.blueprints.forEach((blueprint, i) => {
      if (ids.has(blueprint.blueprintId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate blueprint identifier: ${blueprint.blueprintId}`,
          path: ['blueprints', i, 'identifier'],
        });
      }
      ids.add(blueprint.blueprintId);
    });
  });

export type EntitiesConfig = z.infer<typeof entitiesConfigSchema>;

export function formatZodIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}
