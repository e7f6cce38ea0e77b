import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { describe, expect, test } from 'vitest';
import { ValidationError } from '@tfguard/shared-utils';
import { parseConfig } from '../../src/config';
import { withWorkspace } from '../../src/modules/snapshot';
import { TerraformToolkit } from '../../src/toolkit';
import { BUCKET_TF, BucketAccessScanner, FIXED_BUCKET_TF, FakeRunner, routeFetch, zip } from '../helpers';

const MODULE_URL = 'https://files.test/log-bucket.zip';

function setup() {
  const runner = new FakeRunner();
  const scanner = new BucketAccessScanner();
  const fetch = routeFetch({
    [MODULE_URL]: () =>
      new Response(
        zip({
          'log-bucket/main.tf': BUCKET_TF,
          'log-bucket/variables.tf': 'variable "project" {\n  type = string\n}\n',
          'log-bucket/README.md': '# Log Bucket\n',
        })
      ),
  });
  const toolkit = new TerraformToolkit(parseConfig({ terraform: { binaryPath: 'tf' } }), { runner, scanner, fetch });
  return { runner, scanner, fetch, toolkit };
}

describe('TerraformToolkit.analyzeModule', () => {
  test('should report on a module without scanning it', async () => {
    const { toolkit, scanner } = setup();

    const { report, remediation } = await toolkit.analyzeModule({ module: MODULE_URL });

    expect(report.module.title).toBe('Log Bucket');
    expect(report.inputs.map(input => input.name)).toEqual(['project']);
    expect(report.resources).toEqual([{ address: 'google_storage_bucket.logs', file: 'main.tf', line: 1 }]);
    expect(report.findings).toEqual([]);
    expect(remediation).toBeUndefined();
    expect(scanner.scannedDirs).toHaveLength(0);
  });

  test('should scan and preview a fix', async () => {
    const { toolkit, scanner } = setup();

    const { report, remediation } = await toolkit.analyzeModule({ module: MODULE_URL, scan: true, remediate: true });

    expect(report.summary.findings).toBe(1);
    expect(remediation?.changedFiles).toEqual([{ path: 'main.tf', content: FIXED_BUCKET_TF }]);
    expect(remediation?.postScanFindings).toEqual([]);
    expect(report.remediation?.appliedPatches).toBe(1);
    expect(scanner.scannedDirs).toHaveLength(2);
  });

  test('should require scan for remediation', async () => {
    const { toolkit, fetch } = setup();

    await expect(toolkit.analyzeModule({ module: MODULE_URL, remediate: true })).rejects.toBeInstanceOf(ValidationError);
    expect(fetch.requested).toHaveLength(0);
  });
});

describe('TerraformToolkit.runSecurityScan', () => {
  test('should filter findings by severity', async () => {
    const { toolkit } = setup();

    await withWorkspace('test', async dir => {
      await writeFile(path.join(dir, 'main.tf'), BUCKET_TF);

      const high = await toolkit.runSecurityScan({ directory: dir, minSeverity: 'HIGH' });
      const critical = await toolkit.runSecurityScan({ directory: dir, minSeverity: 'CRITICAL' });

      expect(high.findings).toHaveLength(1);
      expect(critical.findings).toHaveLength(0);
      expect(critical.result.findings).toHaveLength(1);
    });
  });
});

describe('TerraformToolkit.fixSecurityIssues', () => {
  test('should write patched files back to the directory', async () => {
    const { toolkit } = setup();

    await withWorkspace('test', async dir => {
      await writeFile(path.join(dir, 'main.tf'), BUCKET_TF);

      const result = await toolkit.fixSecurityIssues({ directory: dir });

      expect(result.initialFindings).toHaveLength(1);
      expect(result.writtenFiles).toEqual(['main.tf']);
      expect(await readFile(path.join(dir, 'main.tf'), 'utf8')).toBe(FIXED_BUCKET_TF);
    });
  });

  test('should leave files untouched on a dry run', async () => {
    const { toolkit } = setup();

    await withWorkspace('test', async dir => {
      await writeFile(path.join(dir, 'main.tf'), BUCKET_TF);

      const result = await toolkit.fixSecurityIssues({ directory: dir, dryRun: true });

      expect(result.writtenFiles).toEqual([]);
      expect(result.remediation.changedFiles).toEqual([{ path: 'main.tf', content: FIXED_BUCKET_TF }]);
      expect(await readFile(path.join(dir, 'main.tf'), 'utf8')).toBe(BUCKET_TF);
    });
  });

  test('should init and validate the patched files when asked', async () => {
    const { toolkit, runner } = setup();
    runner.enqueue({ stdout: 'Initialized' }, { stdout: JSON.stringify({ valid: true, diagnostics: [] }) });

    await withWorkspace('test', async dir => {
      await writeFile(path.join(dir, 'main.tf'), BUCKET_TF);

      const result = await toolkit.fixSecurityIssues({ directory: dir, dryRun: true, validate: true });

      expect(result.remediation.validation?.valid).toBe(true);
      expect(runner.calls.map(call => call.args?.[0])).toEqual(['init', 'validate']);
      expect(runner.argsOf(0)).toContain('-backend=false');
      expect(runner.calls[0]?.command).toBe('tf');
      expect(runner.calls[0]?.cwd).not.toBe(dir);
    });
  });
});

describe('TerraformToolkit.runTerraformCommand', () => {
  test('should save plans to tfplan by default', async () => {
    const { toolkit, runner } = setup();
    runner.enqueue({ exitCode: 2, stdout: 'Plan: 1 to add' });

    const output = await toolkit.runTerraformCommand({ command: 'plan', directory: '/work', variables: { env: 'dev' } });

    expect(output).toMatchObject({ command: 'plan', hasChanges: true, planFile: 'tfplan' });
    expect(runner.argsOf(0)).toEqual([
      'plan',
      '-no-color',
      '-input=false',
      '-detailed-exitcode',
      '-out=tfplan',
      '-var',
      'env=dev',
    ]);
    expect(runner.calls[0]?.vars).toEqual({ env: 'dev' });
  });

  test('should apply the saved plan', async () => {
    const { toolkit, runner } = setup();

    await toolkit.runTerraformCommand({ command: 'apply', directory: '/work' });

    expect(runner.argsOf(0)).toEqual(['apply', '-no-color', '-input=false', 'tfplan']);
  });

  test('should auto-approve destroy', async () => {
    const { toolkit, runner } = setup();

    await toolkit.runTerraformCommand({ command: 'destroy', directory: '/work' });

    expect(runner.argsOf(0)).toEqual(['destroy', '-no-color', '-input=false', '-auto-approve']);
  });

  test('should format before validating when asked', async () => {
    const { toolkit, runner } = setup();
    runner.enqueue({ stdout: 'main.tf' }, { stdout: JSON.stringify({ valid: true }) });

    const output = await toolkit.runTerraformCommand({ command: 'validate', directory: '/work', format: true });

    expect(output).toEqual({
      command: 'validate',
      validation: { valid: true, errorCount: 0, warningCount: 0, diagnostics: [] },
    });
    expect(runner.calls.map(call => call.args?.[0])).toEqual(['fmt', 'validate']);
    expect(runner.calls[0]?.cwd).toBe('/work');
  });
});
