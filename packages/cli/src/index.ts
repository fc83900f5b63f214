/**
 * @catalogsync/cli
 *
 * Settings loading and the export entry point
 */

export {
  ConfigError,
  envSchema,
  expandEnvVars,
  loadSettings,
  parseEntitiesConfig,
  parseServiceAccount,
} from './config.js';
export type { Env, LoadSettingsOptions, Settings } from './config.js';

export { parseCliArgs, USAGE } from './args.js';
export type { CliArgs } from './args.js';

export { runExport } from './export.js';
export type { ExportOptions } from './export.js';
