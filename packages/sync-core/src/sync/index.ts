export * from './sync-orchestrator.js';
export * from './table-names.js';
