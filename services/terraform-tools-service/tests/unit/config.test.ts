import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { describe, expect, test } from 'vitest';
import { ConfigurationError } from '@tfguard/shared-utils';
import { DEFAULT_FETCH_MAX_BYTES, loadConfig, parseConfig } from '../../src/config';
import { withWorkspace } from '../../src/modules/snapshot';

describe('parseConfig', () => {
  test('should fill in defaults', () => {
    expect(parseConfig({})).toEqual({
      port: 3006,
      logLevel: 'info',
      registryUrl: 'https://registry.terraform.io',
      fetch: { maxBytes: DEFAULT_FETCH_MAX_BYTES, timeoutMs: 60_000 },
      scan: { checkovPath: 'checkov', timeoutMs: 300_000 },
      terraform: { binaryPath: 'terraform', timeoutMs: 600_000 },
      cache: { maxEntries: 0 },
      remediation: { disabledChecks: [] },
    });
  });

  test('should list every invalid field', () => {
    expect(() => parseConfig({ port: 0, fetch: { maxBytes: -1 } })).toThrow(
      'Invalid configuration: port: Number must be greater than or equal to 1, fetch.maxBytes: Number must be greater than 0'
    );
  });
});

describe('loadConfig', () => {
  test('should read environment overrides', async () => {
    const config = await loadConfig({
      PORT: '8080',
      LOG_LEVEL: 'debug',
      TFGUARD_CHECKOV_PATH: '/opt/checkov/bin/checkov',
      TFGUARD_CACHE_ENTRIES: '16',
      TFGUARD_DISABLED_CHECKS: 'CKV_GCP_7, CKV_GCP_12',
    });

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
    expect(config.scan).toEqual({ checkovPath: '/opt/checkov/bin/checkov', timeoutMs: 300_000 });
    expect(config.cache.maxEntries).toBe(16);
    expect(config.remediation.disabledChecks).toEqual(['CKV_GCP_7', 'CKV_GCP_12']);
  });

  test('should layer the environment over the YAML file', async () => {
    await withWorkspace('config', async dir => {
      const file = path.join(dir, 'tfguard.yaml');
      await writeFile(
        file,
        ['port: 4000', 'scan:', '  timeoutMs: 120000', 'remediation:', '  disabledChecks: [CKV_GCP_114]', ''].join('\n')
      );

      const config = await loadConfig({ TFGUARD_CONFIG: file, PORT: '5000' });

      expect(config.port).toBe(5000);
      expect(config.scan).toEqual({ checkovPath: 'checkov', timeoutMs: 120_000 });
      expect(config.remediation.disabledChecks).toEqual(['CKV_GCP_114']);
    });
  });

  test('should reject a file that is not a mapping', async () => {
    await withWorkspace('config', async dir => {
      const file = path.join(dir, 'tfguard.yaml');
      await writeFile(file, '- just\n- a list\n');

      await expect(loadConfig({ TFGUARD_CONFIG: file })).rejects.toThrow(
        `Configuration file ${file} must contain a mapping`
      );
    });
  });

  test('should reject a missing file', async () => {
    await expect(loadConfig({ TFGUARD_CONFIG: '/nonexistent/tfguard.yaml' })).rejects.toBeInstanceOf(ConfigurationError);
  });

  test('should reject non-numeric numbers', async () => {
    await expect(loadConfig({ PORT: 'eighty' })).rejects.toThrow('Environment variable PORT must be a valid integer');
  });
});
