import 'dotenv/config';
import { z } from 'zod';

const DEFAULT_PAGE_SIZE = 20;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const csv = (value: string | undefined) =>
  (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  STORE_BACKEND: z.enum(['redis', 'memory']).default('redis'),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  REDIS_KEY_PREFIX: z.string().min(1).default('examples'),
  PAGE_SIZE: z.coerce.number().int().positive().max(1000).default(DEFAULT_PAGE_SIZE),
  PUBLIC_BASE_URL: z.string().url().optional(),
  API_KEYS: z.string().optional(),
  CORS_ORIGINS: z.string().optional(),
});

export type StoreBackend = z.infer<typeof envSchema>['STORE_BACKEND'];
export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  store: {
    backend: StoreBackend;
    redisUrl: string;
    keyPrefix: string;
  };
  pagination: {
    pageSize: number;
  };
  // Absolute base for pagination links; request host is used when unset
  publicBaseUrl?: string;
  auth: {
    apiKeys: string[];
  };
  cors: {
    // true allows any origin
    origins: true | string[];
  };
}

type Env = Record<string, string | undefined>;

/**
 * Builds the process-wide configuration from environment variables.
 * Empty strings are treated as unset so `.env` placeholders fall back to defaults.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => typeof value === 'string' && value.trim() !== ''),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  const corsOrigins = csv(vars.CORS_ORIGINS);

  return {
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    store: {
      backend: vars.STORE_BACKEND,
      redisUrl: vars.REDIS_URL,
      keyPrefix: vars.REDIS_KEY_PREFIX,
    },
    pagination: {
      pageSize: vars.PAGE_SIZE,
    },
    publicBaseUrl: vars.PUBLIC_BASE_URL?.replace(/\/+$/, ''),
    auth: {
      apiKeys: csv(vars.API_KEYS),
    },
    cors: {
      origins: corsOrigins.length === 0 || corsOrigins.includes('*') ? true : corsOrigins,
    },
  };
}
