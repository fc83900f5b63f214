/**
 * @catalogsync/core
 *
 * Shared types, collaborator interfaces, errors and utilities
 * for mirroring catalog entities into a warehouse.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
