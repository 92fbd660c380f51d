import { z } from 'zod';

/**
 * Process-wide settings, read from the environment once at startup.
 * The returned object is frozen; components receive it (or the parts they
 * need) through their constructors.
 */

export const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  JWT_SECRET: z
    .string({ required_error: 'JWT_SECRET is required' })
    .min(16, 'JWT_SECRET must be at least 16 characters'),
  JWT_ALGORITHM: z.enum(JWT_ALGORITHMS).default('HS256'),
  ACCESS_TOKEN_TTL_MINUTES: z.coerce.number().int().positive().default(360),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

const databaseEnvSchema = z.object({
  DATABASE_URL: z.string({ required_error: 'DATABASE_URL is required' }).min(1, 'DATABASE_URL is required'),
});

export interface TokenSettings {
  readonly secret: string;
  readonly algorithm: JwtAlgorithm;
  readonly ttlMinutes: number;
}

export interface AppConfig {
  readonly env: 'development' | 'production' | 'test';
  readonly port: number;
  readonly databaseUrl?: string;
  readonly token: TokenSettings;
  readonly logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  const env = parsed.data;
  return Object.freeze({
    env: env.NODE_ENV,
    port: env.PORT,
    databaseUrl: env.DATABASE_URL,
    token: Object.freeze({
      secret: env.JWT_SECRET,
      algorithm: env.JWT_ALGORITHM,
      ttlMinutes: env.ACCESS_TOKEN_TTL_MINUTES,
    }),
    logLevel: env.LOG_LEVEL,
  });
}

/** Just the connection string, for tools (migrations) that need no token settings. */
export function loadDatabaseUrl(source: NodeJS.ProcessEnv = process.env): string {
  const parsed = databaseEnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map((e) => e.message));
  }
  return parsed.data.DATABASE_URL;
}
