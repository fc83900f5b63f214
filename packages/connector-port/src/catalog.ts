/**
 * Port Catalog
 *
 * Implements ICatalogClient on top of the Port REST API.
 */

import type { EntityPage, ICatalogClient, SearchQuery, SourceSchema } from '@catalogsync/core';
import { PortClient, type PortClientConfig } from './client.js';
import { toEntity, toSourceSchema } from './blueprint-schema.js';

export type PortCatalogConfig = PortClientConfig;

export class PortCatalog implements ICatalogClient {
  private readonly client: PortClient;

  constructor(client: PortClient) {
    this.client = client;
  }

  async getSchema(blueprintId: string): Promise<SourceSchema> {
    return toSourceSchema(await this.client.getBlueprint(blueprintId));
  }

  async searchEntities(blueprintId: string, query: SearchQuery, cursor?: string): Promise<EntityPage> {
    const page = await this.client.searchEntities(
      blueprintId,
      { combinator: query.combinator, rules: query.rules },
      cursor
    );
    return { entities: page.entities.map(toEntity), nextCursor: page.next };
  }
}

/**
 * Factory function for creating a Port catalog
 */
export function createPortCatalog(config: PortCatalogConfig): PortCatalog {
  return new PortCatalog(new PortClient(config));
}
