export * from './source.js';
export * from './target.js';
export * from './entity.js';
export * from './migration.js';
export * from './sync.js';
