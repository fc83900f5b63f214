/**
 * Settings: environment variables validated with zod, plus the entities
 * configuration (inline JSON or a file).
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import type {
  BlueprintSyncConfig,
  LogFormat,
  LogLevel,
  MigrationMode,
  RetryPolicy,
} from '@catalogsync/core';
import { entitiesConfigSchema, formatZodIssues, migrationModeSchema } from '@catalogsync/core';
import { resolveTableName } from '@catalogsync/sync-core';
import { DEFAULT_PORT_API_URL } from '@catalogsync/connector-port';
import type { ServiceAccountCredentials } from '@catalogsync/connector-bigquery';

export type Env = Record<string, string | undefined>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function expandEnvInString(input: string, env: Env): string {
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${VAR}` and `${VAR:-default}` in every string of a JSON value
 */
export function expandEnvVars(value: unknown, env: Env = process.env): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, env);
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandEnvVars(item, env));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = expandEnvVars(item, env);
    }
    return out;
  }
  return value;
}

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const requiredText = z.preprocess(blankToUndefined, z.string().trim().min(1));
const optionalText = z.preprocess(blankToUndefined, z.string().trim().min(1).optional());
const count = (fallback: number, min = 0) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

export const envSchema = z.object({
  PORT_CLIENT_ID: requiredText,
  PORT_CLIENT_SECRET: requiredText,
  PORT_API_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_PORT_API_URL)),
  ENTITIES_CONFIG_JSON: optionalText,
  ENTITIES_CONFIG: optionalText,
  BIGQUERY_PROJECT_ID: requiredText,
  BIGQUERY_DATASET_ID: requiredText,
  BIGQUERY_LOCATION: optionalText,
  AUTO_MIGRATE: z.preprocess(blankToUndefined, migrationModeSchema.default('weak')),
  GOOGLE_APPLICATION_CREDENTIALS_JSON: optionalText,
  GOOGLE_APPLICATION_CREDENTIALS: optionalText,
  TABLE_PREFIX: z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Table prefixes may contain letters, digits and underscores only')
      .optional()
  ),
  SYNC_BATCH_SIZE: count(500, 1).pipe(z.number().max(50_000)),
  SYNC_CONCURRENCY: count(1, 1),
  WRITE_RETRIES: count(3),
  WRITE_RETRY_BASE_DELAY_MS: count(1_000),
  DEDUP_RETRIES: count(5),
  DEDUP_RETRY_BASE_DELAY_MS: count(30_000),
  DEDUP_RETRY_MAX_DELAY_MS: count(300_000),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['debug', 'info', 'warn', 'error']).default('info')),
  LOG_FORMAT: z.preprocess(blankToUndefined, z.enum(['text', 'json']).default('text')),
});

const serviceAccountSchema = z
  .object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
  })
  .passthrough();

export interface Settings {
  port: { clientId: string; clientSecret: string; baseUrl: string };
  bigquery: {
    projectId: string;
    datasetId: string;
    location?: string;
    credentials?: ServiceAccountCredentials;
    keyFilename?: string;
  };
  mode: MigrationMode;
  blueprints: BlueprintSyncConfig[];
  tablePrefix: string;
  batchSize: number;
  concurrency: number;
  writeRetry: RetryPolicy;
  dedupRetry: RetryPolicy;
  logging: { level: LogLevel; format: LogFormat };
}

export interface LoadSettingsOptions {
  env?: Env;
  /** Entities configuration file; overrides ENTITIES_CONFIG_JSON and ENTITIES_CONFIG */
  configPath?: string;
  /** Overrides AUTO_MIGRATE */
  mode?: string;
  /** Only sync these blueprints */
  blueprints?: string[];
  /** Base directory for relative paths (default: cwd) */
  cwd?: string;
}

function normalizePem(value: string): string {
  // Common pattern when embedding PEMs in env vars.
  return value.includes('\\n') ? value.replace(/\\n/g, '\n') : value;
}

function parseJson(text: string, label: string): unknown {
  try {
    // Handle UTF-8 BOM (common on Windows)
    return JSON.parse(text.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new ConfigError(`${label} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function parseEntitiesConfig(text: string, label: string, env: Env = process.env): BlueprintSyncConfig[] {
  const expanded = expandEnvVars(parseJson(text, label), env);
  const result = entitiesConfigSchema.safeParse(expanded);
  if (!result.success) {
    throw new ConfigError(formatZodIssues(`Invalid ${label}`, result.error));
  }
  return result.data.blueprints;
}

export function parseServiceAccount(text: string): ServiceAccountCredentials {
  const result = serviceAccountSchema.safeParse(parseJson(text, 'GOOGLE_APPLICATION_CREDENTIALS_JSON'));
  if (!result.success) {
    throw new ConfigError(formatZodIssues('Invalid GOOGLE_APPLICATION_CREDENTIALS_JSON', result.error));
  }
  return {
    client_email: result.data.client_email,
    private_key: normalizePem(result.data.private_key),
  };
}

function selectBlueprints(all: BlueprintSyncConfig[], wanted: string[] | undefined): BlueprintSyncConfig[] {
  if (!wanted?.length) return all;

  const known = new Map(all.map((blueprint) => [blueprint.blueprintId, blueprint]));
  return [...new Set(wanted)].map((id) => {
    const blueprint = known.get(id);
    if (!blueprint) {
      throw new ConfigError(
        `Unknown blueprint: ${id}. Configured blueprints: ${[...known.keys()].join(', ')}`
      );
    }
    return blueprint;
  });
}

function assertDistinctTables(blueprints: BlueprintSyncConfig[], prefix: string): void {
  const owners = new Map<string, string>();
  for (const blueprint of blueprints) {
    const table = resolveTableName(blueprint, prefix);
    const owner = owners.get(table);
    if (owner) {
      throw new ConfigError(
        `Blueprints "${owner}" and "${blueprint.blueprintId}" both write to table "${table}"`
      );
    }
    owners.set(table, blueprint.blueprintId);
  }
}

async function loadBlueprints(
  env: z.infer<typeof envSchema>,
  options: LoadSettingsOptions
): Promise<BlueprintSyncConfig[]> {
  const cwd = options.cwd ?? process.cwd();
  const source = options.env ?? process.env;
  const path = options.configPath ?? (env.ENTITIES_CONFIG_JSON ? undefined : env.ENTITIES_CONFIG);

  if (path) {
    const absolutePath = resolve(cwd, path);
    let content: string;
    try {
      content = await readFile(absolutePath, 'utf-8');
    } catch (err) {
      throw new ConfigError(
        `Cannot read entities config ${absolutePath}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
    return parseEntitiesConfig(content, `entities config ${path}`, source);
  }

  if (env.ENTITIES_CONFIG_JSON) {
    return parseEntitiesConfig(env.ENTITIES_CONFIG_JSON, 'ENTITIES_CONFIG_JSON', source);
  }

  throw new ConfigError('Either ENTITIES_CONFIG_JSON or ENTITIES_CONFIG must be set');
}

export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  const parsed = envSchema.safeParse(options.env ?? process.env);
  if (!parsed.success) {
    throw new ConfigError(formatZodIssues('Invalid environment', parsed.error));
  }
  const env = parsed.data;

  let mode = env.AUTO_MIGRATE;
  if (options.mode !== undefined) {
    const result = migrationModeSchema.safeParse(options.mode);
    if (!result.success) {
      throw new ConfigError(`Invalid --mode "${options.mode}": expected weak, balanced or hard`);
    }
    mode = result.data;
  }

  const blueprints = selectBlueprints(await loadBlueprints(env, options), options.blueprints);
  const tablePrefix = env.TABLE_PREFIX ?? '';
  assertDistinctTables(blueprints, tablePrefix);

  const credentials = env.GOOGLE_APPLICATION_CREDENTIALS_JSON
    ? parseServiceAccount(env.GOOGLE_APPLICATION_CREDENTIALS_JSON)
    : undefined;
  const keyFilename =
    !credentials && env.GOOGLE_APPLICATION_CREDENTIALS
      ? resolve(options.cwd ?? process.cwd(), env.GOOGLE_APPLICATION_CREDENTIALS)
      : undefined;

  return {
    port: {
      clientId: env.PORT_CLIENT_ID,
      clientSecret: env.PORT_CLIENT_SECRET,
      baseUrl: env.PORT_API_URL,
    },
    bigquery: {
      projectId: env.BIGQUERY_PROJECT_ID,
      datasetId: env.BIGQUERY_DATASET_ID,
      location: env.BIGQUERY_LOCATION,
      credentials,
      keyFilename,
    },
    mode,
    blueprints,
    tablePrefix,
    batchSize: env.SYNC_BATCH_SIZE,
    concurrency: env.SYNC_CONCURRENCY,
    writeRetry: {
      retries: env.WRITE_RETRIES,
      baseDelayMs: env.WRITE_RETRY_BASE_DELAY_MS,
      maxDelayMs: env.WRITE_RETRY_BASE_DELAY_MS * 2 ** Math.max(0, env.WRITE_RETRIES - 1),
    },
    dedupRetry: {
      retries: env.DEDUP_RETRIES,
      baseDelayMs: env.DEDUP_RETRY_BASE_DELAY_MS,
      maxDelayMs: env.DEDUP_RETRY_MAX_DELAY_MS,
    },
    logging: { level: env.LOG_LEVEL, format: env.LOG_FORMAT },
  };
}
