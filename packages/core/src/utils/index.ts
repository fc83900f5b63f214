export * from './canonical-json.js';
export * from './filter.js';
export * from './identifiers.js';
export * from './logger.js';
export * from './retry.js';
export * from './semaphore.js';
