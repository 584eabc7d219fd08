/**
 * Bridge Configuration
 * Upstream API location, request timeout and HTTP transport port, read from the environment.
 */

import { z } from 'zod';

// Upstream Managed DB API base URL (paths are appended, base path kept)
export const DEFAULT_API_URL = 'http://localhost:8080/api';

// Per-request timeout in milliseconds (30 seconds)
export const DEFAULT_TIMEOUT_MS = 30 * 1000;

// Port for the HTTP transport
export const DEFAULT_PORT = 3102;

export interface BridgeConfig {
  apiUrl: string;
  timeoutMs: number;
  port: number;
}

const PositiveIntSchema = z.coerce.number().int().positive();
const PortSchema = PositiveIntSchema.max(65535);

/**
 * Read configuration once at start-up.
 *
 * The API URL is not validated here: a bad URL must not stop the process,
 * so the client reports it on every tool call instead.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  return {
    apiUrl: env.MANAGED_DB_API_URL ?? DEFAULT_API_URL,
    timeoutMs: readInt(env, 'MANAGED_DB_API_TIMEOUT_MS', DEFAULT_TIMEOUT_MS, PositiveIntSchema),
    port: readInt(env, 'PORT', DEFAULT_PORT, PortSchema),
  };
}

/** Parse a --port value; undefined unless it is a whole number from 1 to 65535. */
export function parsePort(value: string): number | undefined {
  if (value.trim() === '') {
    return undefined;
  }
  const parsed = PortSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number, schema: z.ZodNumber): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    console.error(`[config] Ignoring invalid ${key}=${raw}, using ${fallback}`);
    return fallback;
  }
  return parsed.data;
}
