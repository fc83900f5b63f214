export * from './summary-formatter.js';
