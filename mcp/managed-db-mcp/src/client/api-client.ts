/**
 * Managed DB API Client
 *
 * One method per upstream endpoint. Each call is a single attempt bounded by
 * the configured timeout; there is no retry. Failures are raised as
 * BridgeError subclasses so the tool registry can format them.
 */

import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import {
  ConfigError,
  MalformedResponseError,
  TransportError,
  UpstreamError,
  formatIssues,
} from '../errors.js';
import {
  AnyJsonSchema,
  BackupSchema,
  ProjectHealthSchema,
  ProjectListSchema,
  ProjectSchema,
  RotatedKeysSchema,
  type Backup,
  type CreateProjectRequest,
  type CreateTableRequest,
  type MigrationRequest,
  type Project,
  type ProjectHealth,
  type ProjectList,
  type RotatedKeys,
} from './types.js';

export interface ManagedDbClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

type HttpMethod = 'GET' | 'POST' | 'DELETE';

/**
 * A decoded response. `value` has been checked against the endpoint's schema
 * and is what the formatters read; `body` is the JSON exactly as received.
 */
export interface Decoded<T> {
  value: T;
  body: unknown;
}

interface SendOptions {
  body?: unknown;
  query?: Record<string, string>;
}

// Longest slice of an unexpected body quoted back in an error
const MAX_SNIPPET_LENGTH = 200;

export class ManagedDbClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;

  constructor(options: ManagedDbClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
  }

  createProject(input: CreateProjectRequest): Promise<Decoded<Project>> {
    return this.requestJson(ProjectSchema, 'POST', '/projects', { body: input });
  }

  listProjects(): Promise<Decoded<ProjectList>> {
    return this.requestJson(ProjectListSchema, 'GET', '/projects');
  }

  getProject(projectId: string): Promise<Decoded<Project>> {
    return this.requestJson(ProjectSchema, 'GET', projectPath(projectId));
  }

  /**
   * Soft delete marks the project deleted and keeps its data; hard delete
   * removes the database and its REST container.
   */
  async deleteProject(projectId: string, hard: boolean): Promise<void> {
    const response = await this.send('DELETE', projectPath(projectId), {
      query: { hard: String(hard) },
    });
    await readText(response);
  }

  rotateProjectKeys(projectId: string): Promise<Decoded<RotatedKeys>> {
    return this.requestJson(RotatedKeysSchema, 'POST', `${projectPath(projectId)}/rotate-keys`);
  }

  getProjectHealth(projectId: string): Promise<Decoded<ProjectHealth>> {
    return this.requestJson(ProjectHealthSchema, 'GET', `${projectPath(projectId)}/health`);
  }

  createTable(projectId: string, table: CreateTableRequest): Promise<Decoded<unknown>> {
    return this.requestJson(AnyJsonSchema, 'POST', `${projectPath(projectId)}/tables`, { body: table });
  }

  runMigration(projectId: string, migration: MigrationRequest): Promise<Decoded<unknown>> {
    return this.requestJson(AnyJsonSchema, 'POST', `${projectPath(projectId)}/migrations`, { body: migration });
  }

  backupProject(projectId: string): Promise<Decoded<Backup>> {
    return this.requestJson(BackupSchema, 'POST', `${projectPath(projectId)}/backup`);
  }

  restoreProject(projectId: string, artifactPath: string): Promise<Decoded<unknown>> {
    return this.requestJson(AnyJsonSchema, 'POST', `${projectPath(projectId)}/restore`, {
      body: { artifact_path: artifactPath },
    });
  }

  /**
   * Resolve an API path against the base URL, keeping the base path
   * (`http://host/api` + `/projects` -> `http://host/api/projects`).
   */
  buildUrl(path: string, query?: Record<string, string>): URL {
    const base = this.baseUrl.trim();
    if (!base) {
      throw new ConfigError('MANAGED_DB_API_URL is not set');
    }

    let url: URL;
    try {
      url = new URL(`${base.replace(/\/+$/, '')}${path}`);
    } catch (err) {
      throw new ConfigError(`MANAGED_DB_API_URL is not a valid URL: ${base}`, { cause: err });
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new ConfigError(`MANAGED_DB_API_URL must use http or https: ${base}`);
    }

    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  private async requestJson<S extends z.ZodTypeAny>(
    schema: S,
    method: HttpMethod,
    path: string,
    options: SendOptions = {}
  ): Promise<Decoded<z.infer<S>>> {
    const response = await this.send(method, path, options);
    const text = await readText(response);

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw new MalformedResponseError(
        `Expected JSON from ${method} ${path}, got: ${snippet(text) || '(empty body)'}`,
        { cause: err }
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError(
        `Unexpected response from ${method} ${path}: ${formatIssues(parsed.error.issues).join('; ')}`
      );
    }
    return { value: parsed.data, body };
  }

  private async send(method: HttpMethod, path: string, options: SendOptions = {}): Promise<Response> {
    const url = this.buildUrl(path, options.query);
    const requestId = uuidv4();
    const started = Date.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          'X-Request-Id': requestId,
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      console.error(`[api] ${requestId} ${method} ${url.pathname} failed after ${Date.now() - started}ms`);
      if (isTimeout(err)) {
        throw new TransportError(`Request to ${url.href} timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      throw new TransportError(`Request to ${url.href} failed: ${describeCause(err)}`, { cause: err });
    }

    console.error(`[api] ${requestId} ${method} ${url.pathname} -> ${response.status} (${Date.now() - started}ms)`);

    if (!response.ok) {
      const text = await readText(response);
      throw new UpstreamError(response.status, extractDetail(text) || response.statusText || `HTTP ${response.status}`);
    }
    return response;
  }
}

function projectPath(projectId: string): string {
  return `/projects/${encodeURIComponent(projectId)}`;
}

async function readText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    throw new TransportError(`Failed to read response body: ${describeCause(err)}`, { cause: err });
  }
}

/**
 * Pull the error message out of an upstream error body: the `detail` field
 * when the body is a JSON object carrying one, else the whole JSON body,
 * else the raw text.
 */
export function extractDetail(text: string): string {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return text.trim();
  }

  if (isRecord(body) && body.detail !== undefined) {
    return typeof body.detail === 'string' ? body.detail : JSON.stringify(body.detail);
  }
  return JSON.stringify(body);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTimeout(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError';
}

// fetch wraps socket errors (ECONNREFUSED, ENOTFOUND) in a generic TypeError
function describeCause(err: unknown): string {
  if (!(err instanceof Error)) {
    return String(err);
  }
  const cause = err.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
    return cause.message || code || err.message;
  }
  return err.message;
}

function snippet(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_SNIPPET_LENGTH ? `${trimmed.slice(0, MAX_SNIPPET_LENGTH)}...` : trimmed;
}
