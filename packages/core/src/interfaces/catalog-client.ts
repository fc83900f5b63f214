/**
 * Catalog client interface
 *
 * The source side of a sync: blueprint schemas and paginated entities.
 */

import type { EntityPage, SearchQuery, SourceSchema } from '../types/index.js';

export interface ICatalogClient {
  /**
   * Read the declared schema of a blueprint
   * @throws AuthError | NetworkError | CatalogRequestError
   */
  getSchema(blueprintId: string): Promise<SourceSchema>;

  /**
   * Fetch one page of entities matching the query.
   * Pages must be requested in order: pass the previous page's `nextCursor`.
   */
  searchEntities(blueprintId: string, query: SearchQuery, cursor?: string): Promise<EntityPage>;
}
