import { z } from 'zod';
import type { PoolConfig } from 'pg';

const commaList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0)
  );

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),

    DATABASE_URL: z.string().url().optional(),
    DB_HOST: z.string().min(1).default('localhost'),
    DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
    DB_USER: z.string().optional(),
    DB_PASSWORD: z.string().optional(),
    DB_NAME: z.string().min(1).default('users'),
    DB_SSLMODE: z.enum(['disable', 'require']).default('disable'),
    DB_POOL_MAX: z.coerce.number().int().positive().default(20),

    JWT_SECRET: z.string({ required_error: 'JWT_SECRET is required' }).min(1),
    JWT_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),

    CORS_ORIGINS: commaList.default('*'),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .optional(),

    TRUST_PROXY: z.coerce.number().int().min(0).default(0),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
    LOGIN_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'production' && env.JWT_SECRET.length < 32) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['JWT_SECRET'],
        message: 'JWT_SECRET must be at least 32 characters in production',
      });
    }
  });

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface RateLimitConfig {
  windowMs: number;
  max: number;
  loginMax: number;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  database: PoolConfig;
  jwt: {
    secret: string;
    ttlSeconds: number;
  };
  /** Empty list means any origin. */
  corsOrigins: string[];
  logLevel: LogLevel;
  /** Number of reverse-proxy hops whose X-Forwarded-For is trusted. */
  trustProxy: number;
  rateLimit: RateLimitConfig;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Build the application config from an environment map.
 * Pure: callers pass `process.env` (after dotenv has populated it).
 */
export function loadConfig(source: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }
  const env = parsed.data;

  const database: PoolConfig = env.DATABASE_URL
    ? { connectionString: env.DATABASE_URL }
    : {
        host: env.DB_HOST,
        port: env.DB_PORT,
        user: env.DB_USER,
        password: env.DB_PASSWORD,
        database: env.DB_NAME,
      };
  database.max = env.DB_POOL_MAX;
  database.idleTimeoutMillis = 30000;
  database.connectionTimeoutMillis = 2000;
  if (env.DB_SSLMODE === 'require') {
    database.ssl = { rejectUnauthorized: false };
  }

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    database,
    jwt: {
      secret: env.JWT_SECRET,
      ttlSeconds: env.JWT_TTL_SECONDS,
    },
    corsOrigins: env.CORS_ORIGINS.filter((origin) => origin !== '*'),
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === 'test' ? 'silent' : 'info'),
    trustProxy: env.TRUST_PROXY,
    rateLimit: {
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      max: env.RATE_LIMIT_MAX,
      loginMax: env.LOGIN_RATE_LIMIT_MAX,
    },
  };
}
