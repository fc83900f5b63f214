/**
 * Identifier filters applied to entities before export
 */

export interface EntityFilter {
  /** When non-empty, only these identifiers pass */
  include?: readonly string[];
  /** These identifiers never pass */
  exclude?: readonly string[];
}

/**
 * Build a predicate over entity identifiers.
 * Include narrows the candidate set first; exclude removes from what remains.
 */
export function createEntityMatcher(filter: EntityFilter = {}): (identifier: string) => boolean {
  const include = filter.include?.length ? new Set(filter.include) : undefined;
  const exclude = new Set(filter.exclude ?? []);

  return (identifier) => {
    if (include && !include.has(identifier)) {
      return false;
    }
    return !exclude.has(identifier);
  };
}

/**
 * Apply an identifier filter to a list of entities
 */
export function filterEntities<T extends { identifier: string }>(
  entities: readonly T[],
  filter?: EntityFilter
): { kept: T[]; skipped: number } {
  const matches = createEntityMatcher(filter);
  const kept = entities.filter((entity) => matches(entity.identifier));
  return { kept, skipped: entities.length - kept.length };
}
