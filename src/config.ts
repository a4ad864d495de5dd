import dotenv from 'dotenv';
import { z } from 'zod';
import { normalizeEmail } from './domain/auth/user.js';

/**
 * Process-wide configuration, loaded once at startup.
 * Rotating `jwtSecret` invalidates every token issued under the old value.
 */
export interface AppConfig {
  readonly port: number;
  readonly jwtSecret: string;
  readonly adminEmails: ReadonlySet<string>;
  readonly databasePath: string;
  readonly tokenTtlSeconds: number;
}

const envSchema = z.object({
  JWT_SECRET: z.string().min(1, 'JWT_SECRET environment variable is required'),
  ADMIN_EMAILS: z.string().default(''),
  DATABASE_PATH: z.string().min(1).default('data/app.db'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60 * 24 * 14),
});

function parseAdminEmails(raw: string): Set<string> {
  return new Set(
    raw
      .split(',')
      .map((e) => normalizeEmail(e))
      .filter((e) => e.length > 0)
  );
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return Object.freeze({
    port: parsed.PORT,
    jwtSecret: parsed.JWT_SECRET,
    adminEmails: parseAdminEmails(parsed.ADMIN_EMAILS),
    databasePath: parsed.DATABASE_PATH,
    tokenTtlSeconds: parsed.TOKEN_TTL_SECONDS,
  });
}

/**
 * Read `.env` (if present) into process.env, then build the config.
 */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
