import { ConfigurationError } from './errors';

/**
 * Environment variable helpers
 */

type Env = Record<string, string | undefined>;

export function getEnv(key: string, defaultValue?: string, env: Env = process.env): string {
  const value = env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(
      `Environment variable ${key} is required but not set`,
      'tfguard',
      { key }
    );
  }
  return value;
}

export function getEnvOptional(key: string, env: Env = process.env): string | undefined {
  const value = env[key];
  return value === '' ? undefined : value;
}

export function getEnvNumber(key: string, defaultValue?: number, env: Env = process.env): number {
  const value = env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(
      `Environment variable ${key} is required but not set`,
      'tfguard',
      { key }
    );
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(
      `Environment variable ${key} must be a valid integer`,
      'tfguard',
      { key, value }
    );
  }
  return parsed;
}

export function getEnvBoolean(key: string, defaultValue: boolean = false, env: Env = process.env): boolean {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Comma-separated list; blanks are dropped
 */
export function getEnvList(key: string, env: Env = process.env): string[] | undefined {
  const value = env[key];
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}
