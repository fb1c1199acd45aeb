/**
 * Environment variable utilities
 * Consistent parsing of boolean and optional values
 */

type Env = Record<string, string | undefined>;

/**
 * Parse truthy environment variable
 * Accepts: 1, true, yes, on (case-insensitive)
 */
export const isTrue = (v?: string): boolean =>
  /^(1|true|yes|on)$/i.test(String(v || ''));

/**
 * Get environment variable with default
 */
export const getEnv = (env: Env, key: string, defaultValue = ''): string =>
  env[key]?.trim() || defaultValue;

/**
 * Get integer environment variable with default.
 * Values below `min` fall back to the default.
 */
export const getEnvInt = (env: Env, key: string, defaultValue: number, min = 0): number => {
  const val = env[key];
  if (!val) return defaultValue;
  const parsed = parseInt(val, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : defaultValue;
};
