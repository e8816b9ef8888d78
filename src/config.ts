import 'dotenv/config';
import { DEFAULT_SCOPES } from './clients/credentials';

function intEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Environment variable ${name} must be a positive integer, got: ${raw}`);
  }
  return value;
}

function listEnv(name: string, fallback: string[]): string[] {
  const raw = process.env[name];
  if (!raw) return fallback;
  return raw.split(',').map((s) => s.trim()).filter(Boolean);
}

export const config = {
  port: intEnv('PORT', 8080),
  host: process.env.HOST ?? '0.0.0.0',
  logLevel: process.env.LOG_LEVEL ?? 'info',

  /** When set, PUT /run requires `Authorization: Bearer <API_KEY>`. */
  apiKey: process.env.API_KEY || null,

  google: {
    scopes: listEnv('GOOGLE_SCOPES', DEFAULT_SCOPES),
  },

  database: {
    poolMax: intEnv('DB_POOL_MAX', 4),
    acquireTimeoutMs: intEnv('DB_ACQUIRE_TIMEOUT_MS', 30_000),
  },
} as const;

export type AppConfig = typeof config;
