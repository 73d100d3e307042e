import { DEFAULT_KEYSTORE_PATH } from './versions.js';
import { LOG_LEVELS, isLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';
import { ValidationError } from './errors.js';

export interface OracleConfig {
  keystorePath: string;
  logLevel: LogLevel;
}

export const ENV_KEYS = {
  KEYSTORE: 'ORACLE_KEYSTORE',
  LOG_LEVEL: 'ORACLE_LOG_LEVEL',
} as const;

/** Unvalidated values, e.g. straight from CLI flags. */
export interface ConfigOverrides {
  keystorePath?: string;
  logLevel?: string;
}

/**
 * Resolve configuration: explicit overrides, then environment, then defaults.
 * Empty strings count as unset.
 */
export function resolveConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  overrides: ConfigOverrides = {},
): OracleConfig {
  const pick = (override: string | undefined, key: string): string | undefined =>
    override || env[key] || undefined;

  const keystorePath = pick(overrides.keystorePath, ENV_KEYS.KEYSTORE) ?? DEFAULT_KEYSTORE_PATH;
  const level = pick(overrides.logLevel, ENV_KEYS.LOG_LEVEL) ?? 'info';

  if (!isLogLevel(level)) {
    const message = `${ENV_KEYS.LOG_LEVEL} must be one of ${LOG_LEVELS.join(', ')}, got "${level}"`;
    throw new ValidationError(message, [message]);
  }

  return { keystorePath, logLevel: level };
}
