import dotenv from 'dotenv';
import { z } from 'zod';

export interface AppConfig {
  readonly port: number;
  readonly jwtSecret: string;
  readonly databaseUrl: string;
  readonly tokenTtlHours: number;
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET environment variable is required'),
  DATABASE_URL: z.string().url('DATABASE_URL must be a connection URL'),
  TOKEN_TTL_HOURS: z.coerce.number().int().positive().default(24),
});

/**
 * Read configuration once at startup. Values from `.env` fill in whatever
 * the process environment leaves unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) {
    dotenv.config();
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  return Object.freeze({
    port: parsed.data.PORT,
    jwtSecret: parsed.data.JWT_SECRET,
    databaseUrl: parsed.data.DATABASE_URL,
    tokenTtlHours: parsed.data.TOKEN_TTL_HOURS,
  });
}
