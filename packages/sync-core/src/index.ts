/**
 * @catalogsync/sync-core
 *
 * Schema translation, reconciliation, value coercion and the sync
 * orchestrator that mirrors catalog blueprints into warehouse tables.
 */

// Type mapping and schema translation
export * from './mapping/index.js';

// Schema reconciliation
export * from './reconciliation/index.js';

// Entity value coercion
export * from './coercion/index.js';

// Orchestration
export * from './sync/index.js';

// Formatters
export * from './formatters/index.js';
