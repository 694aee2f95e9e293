/**
 * Environment variable configuration
 * Provides type-safe access to environment variables
 */

import path from 'path';

// ============================================================
// Environment Variable Keys
// ============================================================

/**
 * Recognized environment variables
 */
export const ENV_KEYS = [
  'RC_DB_PATH',
  'RC_LOG_LEVEL',
  'RC_LOG_FORMAT',
] as const;

export type EnvKey = (typeof ENV_KEYS)[number];

/**
 * Get environment variable by key
 *
 * @param key - Environment variable key (from ENV_KEYS)
 * @returns Environment variable value (undefined if not set or empty)
 */
export function getEnvByKey(key: EnvKey): string | undefined {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return undefined;
  }
  return value;
}

// ============================================================
// Database Path
// ============================================================

/**
 * Default database location, relative to the working directory
 */
export function getDefaultDbPath(): string {
  return path.join(process.cwd(), 'data', 'reincarnation.sqlite');
}

/**
 * Normalize a database path.
 *
 * @returns Absolute path (':memory:' passes through unchanged)
 */
export function resolveDbPath(dbPath: string): string {
  return dbPath === ':memory:' ? dbPath : path.resolve(dbPath);
}

/**
 * Resolve the database path.
 *
 * Priority: RC_DB_PATH > getDefaultDbPath()
 */
export function getDbPath(): string {
  return resolveDbPath(getEnvByKey('RC_DB_PATH') ?? getDefaultDbPath());
}

// ============================================================
// Log Configuration
// ============================================================

/**
 * Log level type (defined here to avoid circular dependency with logger.ts)
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log configuration
 */
export interface LogConfig {
  level: LogLevel;
  format: 'json' | 'text';
}

/**
 * Validate log level
 */
function isValidLogLevel(level: string | undefined): level is LogLevel {
  return level !== undefined && ['debug', 'info', 'warn', 'error'].includes(level);
}

/**
 * Get log configuration
 *
 * @example
 * ```typescript
 * const config = getLogConfig();
 * console.log(config.level); // 'debug' in development, 'info' in production
 * console.log(config.format); // 'text' or 'json'
 * ```
 */
export function getLogConfig(): LogConfig {
  const levelEnv = getEnvByKey('RC_LOG_LEVEL')?.toLowerCase();
  const formatEnv = getEnvByKey('RC_LOG_FORMAT')?.toLowerCase();

  // Default: debug in development, info in production
  const defaultLevel: LogLevel = process.env.NODE_ENV === 'production' ? 'info' : 'debug';

  return {
    level: isValidLogLevel(levelEnv) ? levelEnv : defaultLevel,
    format: formatEnv === 'json' ? 'json' : 'text',
  };
}
