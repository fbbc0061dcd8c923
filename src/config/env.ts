/**
 * Environment Variable Handler
 *
 * Reads the few environment variables tsrr honours.
 * Supports .env files for local development via dotenv.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

export const EnvSchema = z.object({
  /** Directory holding config.toml (default: ~/.tsrr) */
  TSRR_HOME: z.string().min(1).optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/**
 * Cached environment variables (loaded once at first access).
 * Access through loadEnv()/getEnv(); tests reset it with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

/**
 * Load environment variables (called once, then cached).
 *
 * An empty TSRR_HOME is treated as unset.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const result = EnvSchema.safeParse({
    TSRR_HOME: process.env.TSRR_HOME?.trim() || undefined,
  });

  _envCache = result.success ? result.data : {};
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to point TSRR_HOME at a temp directory.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
