/**
 * Service configuration
 *
 * Defaults, then the YAML file named by TFGUARD_CONFIG (if any), then
 * environment variables. The merged result is validated once with zod.
 */

import { readFile } from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import type { ToolkitConfig } from '@tfguard/shared-types';
import { ConfigurationError, errorMessage, getEnvList, getEnvNumber, getEnvOptional } from '@tfguard/shared-utils';
import { SERVICE_NAME } from './errors';
import { DEFAULT_REGISTRY_URL } from './modules/registry';
import { DEFAULT_SCAN_TIMEOUT_MS } from './scan/checkov';
import { DEFAULT_COMMAND_TIMEOUT_MS } from './runner/command-runner';

type Env = Record<string, string | undefined>;

export const DEFAULT_PORT = 3006;
export const DEFAULT_FETCH_MAX_BYTES = 50 * 1024 * 1024;
export const DEFAULT_FETCH_TIMEOUT_MS = 60_000;

const positiveInt = z.number().int().positive();

export const configSchema = z.object({
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  registryUrl: z.string().url().default(DEFAULT_REGISTRY_URL),
  fetch: z
    .object({
      maxBytes: positiveInt.default(DEFAULT_FETCH_MAX_BYTES),
      timeoutMs: positiveInt.default(DEFAULT_FETCH_TIMEOUT_MS),
    })
    .default({}),
  scan: z
    .object({
      checkovPath: z.string().min(1).default('checkov'),
      timeoutMs: positiveInt.default(DEFAULT_SCAN_TIMEOUT_MS),
    })
    .default({}),
  terraform: z
    .object({
      binaryPath: z.string().min(1).default('terraform'),
      timeoutMs: positiveInt.default(DEFAULT_COMMAND_TIMEOUT_MS),
    })
    .default({}),
  cache: z
    .object({
      maxEntries: z.number().int().min(0).default(0),
    })
    .default({}),
  remediation: z
    .object({
      disabledChecks: z.array(z.string().min(1)).default([]),
    })
    .default({}),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function merge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const existing = out[key];
    out[key] = isRecord(existing) && isRecord(value) ? merge(existing, value) : value;
  }
  return out;
}

function fromEnv(env: Env): Record<string, unknown> {
  const number = (key: string) => (getEnvOptional(key, env) === undefined ? undefined : getEnvNumber(key, undefined, env));
  const disabledChecks = getEnvList('TFGUARD_DISABLED_CHECKS', env);

  return {
    port: number('PORT'),
    logLevel: getEnvOptional('LOG_LEVEL', env),
    registryUrl: getEnvOptional('TFGUARD_REGISTRY_URL', env),
    fetch: {
      maxBytes: number('TFGUARD_FETCH_MAX_BYTES'),
      timeoutMs: number('TFGUARD_FETCH_TIMEOUT_MS'),
    },
    scan: {
      checkovPath: getEnvOptional('TFGUARD_CHECKOV_PATH', env),
      timeoutMs: number('TFGUARD_SCAN_TIMEOUT_MS'),
    },
    terraform: {
      binaryPath: getEnvOptional('TFGUARD_TERRAFORM_PATH', env),
      timeoutMs: number('TFGUARD_COMMAND_TIMEOUT_MS'),
    },
    cache: {
      maxEntries: number('TFGUARD_CACHE_ENTRIES'),
    },
    remediation: {
      disabledChecks,
    },
  };
}

async function fromFile(configPath: string): Promise<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = YAML.parse(await readFile(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${configPath}: ${errorMessage(error)}`, SERVICE_NAME, {
      configPath,
    });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Configuration file ${configPath} must contain a mapping`, SERVICE_NAME, {
      configPath,
    });
  }
  return parsed;
}

export function parseConfig(raw: unknown): ToolkitConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, SERVICE_NAME, { issues });
  }
  return result.data;
}

export async function loadConfig(env: Env = process.env): Promise<ToolkitConfig> {
  const configPath = getEnvOptional('TFGUARD_CONFIG', env);
  const file = configPath ? await fromFile(configPath) : {};
  return parseConfig(merge(file, fromEnv(env)));
}
