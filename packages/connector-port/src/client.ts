/**
 * Port API Client
 *
 * REST client for the Port catalog API (v1): client-credentials token
 * exchange, blueprint lookup and paginated entity search.
 */

import { z } from 'zod';
import {
  AuthError,
  CatalogRequestError,
  Logger,
  NetworkError,
  silentLogger,
} from '@catalogsync/core';

export interface PortClientConfig {
  clientId: string;
  clientSecret: string;
  /** API base URL (default: https://api.getport.io/v1) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 60000) */
  timeoutMs?: number;
  logger?: Logger;
}

export const DEFAULT_PORT_API_URL = 'https://api.getport.io/v1';

/** Tokens are refreshed this long before they expire */
const TOKEN_REFRESH_MARGIN_MS = 60_000;

const fieldSchema = z
  .object({
    type: z.string().optional(),
    format: z.string().optional(),
    title: z.string().optional(),
    description: z.string().optional(),
    items: z.object({ type: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export const portBlueprintSchema = z
  .object({
    identifier: z.string(),
    title: z.string().optional(),
    schema: z
      .object({ properties: z.record(fieldSchema).default({}) })
      .passthrough()
      .default({}),
    relations: z
      .record(
        z
          .object({
            target: z.string().optional(),
            many: z.boolean().default(false),
            description: z.string().optional(),
          })
          .passthrough()
      )
      .default({}),
    calculationProperties: z.record(fieldSchema).default({}),
    aggregationProperties: z.record(fieldSchema).default({}),
    mirrorProperties: z
      .record(z.object({ path: z.string().optional() }).passthrough())
      .default({}),
  })
  .passthrough();

export type PortBlueprint = z.infer<typeof portBlueprintSchema>;

const optionalText = z.string().nullish();

export const portEntitySchema = z
  .object({
    identifier: z.string(),
    title: optionalText,
    icon: optionalText,
    team: z.union([z.array(z.string()), z.string()]).nullish(),
    properties: z.record(z.unknown()).default({}),
    relations: z.record(z.unknown()).default({}),
    calculationProperties: z.record(z.unknown()).optional(),
    aggregationProperties: z.record(z.unknown()).optional(),
    mirrorProperties: z.record(z.unknown()).optional(),
    createdAt: optionalText,
    createdBy: optionalText,
    updatedAt: optionalText,
    updatedBy: optionalText,
  })
  .passthrough();

export type PortEntity = z.infer<typeof portEntitySchema>;

const tokenResponseSchema = z.object({
  accessToken: z.string(),
  expiresIn: z.number(),
});

const errorBodySchema = z.object({
  message: z.string().optional(),
  error: z.string().optional(),
});

const blueprintResponseSchema = z.object({ blueprint: portBlueprintSchema });

const searchResponseSchema = z.object({
  entities: z.array(portEntitySchema).default([]),
  next: z.string().nullish(),
});

export interface PortSearchPage {
  entities: PortEntity[];
  next?: string;
}

export class PortClient {
  private readonly config: PortClientConfig;
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private accessToken?: string;
  private tokenExpiresAt = 0;

  constructor(config: PortClientConfig) {
    this.config = config;
    this.baseUrl = (config.baseUrl ?? DEFAULT_PORT_API_URL).replace(/\/+$/, '');
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Get a blueprint definition
   */
  async getBlueprint(blueprintId: string): Promise<PortBlueprint> {
    const body = await this.request('GET', `/blueprints/${encodeURIComponent(blueprintId)}`);
    return this.parse(blueprintResponseSchema, body, `blueprint ${blueprintId}`).blueprint;
  }

  /**
   * Fetch one page of entities. `from` is the cursor returned as `next`
   * by the previous page.
   */
  async searchEntities(
    blueprintId: string,
    query: Record<string, unknown>,
    from?: string
  ): Promise<PortSearchPage> {
    const body = await this.request(
      'POST',
      `/blueprints/${encodeURIComponent(blueprintId)}/entities/search`,
      { query: from ? { ...query, from } : query }
    );
    const page = this.parse(searchResponseSchema, body, `entities of ${blueprintId}`);
    return { entities: page.entities, next: page.next ?? undefined };
  }

  private async getAccessToken(): Promise<string> {
    if (this.accessToken && Date.now() < this.tokenExpiresAt - TOKEN_REFRESH_MARGIN_MS) {
      return this.accessToken;
    }

    this.logger.debug('Refreshing Port access token');
    const body = await this.send('POST', '/auth/access_token', {
      clientId: this.config.clientId,
      clientSecret: this.config.clientSecret,
    });
    const token = this.parse(tokenResponseSchema, body, 'access token');
    this.accessToken = token.accessToken;
    this.tokenExpiresAt = Date.now() + token.expiresIn * 1000;
    return token.accessToken;
  }

  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const token = await this.getAccessToken();
    return this.send(method, path, body, token);
  }

  /**
   * Make an API request
   */
  private async send(method: string, path: string, body?: unknown, token?: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const timeoutMs = this.config.timeoutMs ?? 60_000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new NetworkError({
          service: 'Port',
          message: `request timed out after ${timeoutMs}ms`,
          cause: err,
        });
      }

      throw new NetworkError({
        service: 'Port',
        message: err instanceof Error ? err.message : String(err),
        cause: err instanceof Error ? err : undefined,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      const message = await readErrorMessage(response);

      if (response.status === 401 || response.status === 403) {
        if (response.status === 401) {
          this.accessToken = undefined;
        }
        throw new AuthError({ service: 'Port', message });
      }

      throw new CatalogRequestError({
        message: `Port API ${method} ${path} failed: ${message}`,
        status: response.status,
      });
    }

    return response.json();
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue?.path.length ? issue.path.join('.') : '(root)';
      throw new CatalogRequestError({
        message: `Unexpected Port response for ${what}: ${where}: ${issue?.message ?? 'invalid'}`,
      });
    }
    return result.data;
  }
}

async function readErrorMessage(response: Response): Promise<string> {
  const fallback = `HTTP ${response.status}`;
  const text = await response.text().catch(() => '');
  if (!text) return fallback;

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return `${fallback}: ${text.slice(0, 200)}`;
  }

  const parsed = errorBodySchema.safeParse(json);
  if (parsed.success && (parsed.data.message || parsed.data.error)) {
    return parsed.data.message ?? parsed.data.error ?? fallback;
  }
  return `${fallback}: ${text.slice(0, 200)}`;
}
