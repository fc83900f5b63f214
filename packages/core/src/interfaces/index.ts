export * from './catalog-client.js';
export * from './warehouse-client.js';
