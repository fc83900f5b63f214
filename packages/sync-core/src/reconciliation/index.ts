export { planMigration, isEmptyPlan } from './schema-reconciler.js';
