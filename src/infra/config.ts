import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  // 7 days
  JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(604800),
  CONNECTIVITY_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .optional(),
});

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  databaseUrl: string;
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  connectivityTimeoutMs: number;
  logLevel?: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Parse configuration from environment variables. Entry points load `.env`
 * through `dotenv/config` before calling this. Throws `ConfigError` naming
 * every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  const vars = parsed.data;
  return {
    nodeEnv: vars.NODE_ENV,
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    jwtSecret: vars.JWT_SECRET,
    jwtExpiresInSeconds: vars.JWT_EXPIRES_IN_SECONDS,
    connectivityTimeoutMs: vars.CONNECTIVITY_TIMEOUT_MS,
    logLevel: vars.LOG_LEVEL,
  };
}
