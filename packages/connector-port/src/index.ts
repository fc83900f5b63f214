/**
 * @catalogsync/connector-port
 *
 * Catalog client for Port blueprints and entities
 */

export { PortClient, DEFAULT_PORT_API_URL, portBlueprintSchema, portEntitySchema } from './client.js';
export type { PortClientConfig, PortBlueprint, PortEntity, PortSearchPage } from './client.js';

export { toSourceSchema, toEntity } from './blueprint-schema.js';

export { PortCatalog, createPortCatalog } from './catalog.js';
export type { PortCatalogConfig } from './catalog.js';
