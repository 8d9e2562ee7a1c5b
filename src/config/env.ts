/**
 * Environment Configuration
 *
 * Validates and exports typed environment variables using Zod.
 * Values come from `process.env`, populated from a local `.env` file when present.
 *
 * Usage:
 *   import { env } from '../config/env';
 *   console.log(env.NBA_BASE_URL); // string, guaranteed to be a URL
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// ─────────────────────────────────────────────────────────────────────────────
// Schema Definition
// ─────────────────────────────────────────────────────────────────────────────

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),

  // Reference sites
  NBA_BASE_URL: z.url().default('https://www.basketball-reference.com'),
  NHL_BASE_URL: z.url().default('https://www.hockey-reference.com'),

  // HTTP
  HTTP_USER_AGENT: z.string().min(1).default('reference-season-stats/0.1'),
});

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

/**
 * Get the validated environment configuration.
 * Parses on first call and caches the result.
 * Throws if validation fails.
 */
export function getEnv(): Env {
  if (_env) {
    return _env;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  _env = result.data;
  return _env;
}

/**
 * Resolve the log level: an explicit LOG_LEVEL wins, tests stay quiet,
 * production logs at info and everything else at debug.
 */
export function resolveLogLevel(config: Env = getEnv()): (typeof LOG_LEVELS)[number] {
  if (config.LOG_LEVEL) return config.LOG_LEVEL;
  if (config.NODE_ENV === 'test') return 'silent';
  return config.NODE_ENV === 'production' ? 'info' : 'debug';
}

/** Drop the cached configuration so the next `getEnv()` re-reads `process.env`. */
export function resetEnv(): void {
  _env = null;
}

// Export a lazy-evaluated env object for convenience
export const env: Readonly<Env> = new Proxy({} as Env, {
  get(_target, prop: string) {
    return getEnv()[prop as keyof Env];
  },
});
