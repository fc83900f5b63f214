export { coerceEntity } from './value-coercer.js';
export type { CoercionContext } from './value-coercer.js';
