export { SYSTEM_FIELDS } from './system-fields.js';
export { mapType } from './type-mapper.js';
export type { TypeMappingOptions } from './type-mapper.js';
export { translateSchema } from './schema-translator.js';
export type { TranslateOptions } from './schema-translator.js';
