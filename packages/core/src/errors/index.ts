export * from './sync-error.js';
