import { describe, expect, test } from 'vitest';
import { z } from 'zod';
import { parseConfig } from '../../src/config';
import { ScanError } from '../../src/errors';
import { TerraformToolkit } from '../../src/toolkit';
import { createTools, formatCommandOutput, formatSearchResults } from '../../src/tools/definitions';
import { ToolRegistry } from '../../src/tools/registry';
import { defineTool } from '../../src/tools/types';
import { BucketAccessScanner, FakeRunner, routeFetch } from '../helpers';

function registry(runner = new FakeRunner()) {
  const toolkit = new TerraformToolkit(parseConfig({}), {
    runner,
    scanner: new BucketAccessScanner(),
    fetch: routeFetch({}),
  });
  return new ToolRegistry(createTools(toolkit));
}

describe('ToolRegistry', () => {
  test('should register the toolkit tools with their permission tiers', () => {
    expect(registry().describe().map(tool => [tool.name, tool.permissionTier, tool.isDestructive])).toEqual([
      ['terraform_analyze_module', 'auto_allow', false],
      ['terraform_search_modules', 'auto_allow', false],
      ['terraform_run_checkov', 'auto_allow', false],
      ['terraform_fix_security_issues', 'ask_once', true],
      ['terraform_command', 'always_ask', true],
      ['terraform_workflow_guide', 'auto_allow', false],
      ['terraform_gcp_best_practices', 'auto_allow', false],
      ['terraform_gcp_security_recommendations', 'auto_allow', false],
      ['terraform_gcp_provider_resources_listing', 'auto_allow', false],
      ['terraform_gcp_resource_documentation', 'auto_allow', false],
    ]);
  });

  test('should reject duplicate names', () => {
    const tools = registry();
    const first = tools.get('terraform_command');
    if (!first) throw new Error('missing tool');

    expect(() => tools.register(first)).toThrow("ToolRegistry: tool 'terraform_command' is already registered");
  });
});

describe('defineTool', () => {
  const echo = defineTool({
    name: 'echo',
    description: 'Echo a message',
    inputSchema: z.object({ message: z.string().min(1) }),
    permissionTier: 'auto_allow',
    async run(input) {
      if (input.message === 'fail') throw new ScanError('engineFailed', 'Checkov exited with code 2: boom');
      return { output: input.message, data: { length: input.message.length } };
    },
  });

  test('should run valid input', async () => {
    expect(await echo.execute({ message: 'hi' })).toEqual({ isError: false, output: 'hi', data: { length: 2 } });
  });

  test('should return validation errors instead of throwing', async () => {
    const result = await echo.execute({ message: '' });

    expect(result.isError).toBe(true);
    expect(result.output).toBe('Error: Invalid input for echo: message: String must contain at least 1 character(s)');
  });

  test('should treat a missing input as an empty object', async () => {
    const result = await echo.execute(undefined);

    expect(result.output).toBe('Error: Invalid input for echo: message: Required');
  });

  test('should carry typed errors in the wire shape', async () => {
    const result = await echo.execute({ message: 'fail' });

    expect(result).toMatchObject({
      isError: true,
      output: 'Error: Checkov exited with code 2: boom',
      error: { code: 'SCAN_ERROR', service: 'terraform-tools-service', details: { kind: 'engineFailed' } },
    });
  });
});

describe('toolkit tools', () => {
  test('should reject remediation without a scan', async () => {
    const tool = registry().get('terraform_analyze_module');

    const result = await tool?.execute({ module: 'acme/network/google', remediate: true });

    expect(result?.output).toBe('Error: remediate and validate require scan: true');
  });

  test('should reject unknown lifecycle commands', async () => {
    const result = await registry().get('terraform_command')?.execute({ command: 'import', directory: '/work' });

    expect(result?.isError).toBe(true);
    if (result?.isError) expect(result.error.code).toBe('VALIDATION_ERROR');
  });

  test('should run a plan and format its output', async () => {
    const runner = new FakeRunner().enqueue({ exitCode: 0, stdout: 'No changes.', durationMs: 12 });

    const result = await registry(runner).get('terraform_command')?.execute({ command: 'plan', directory: '/work' });

    expect(result?.output).toBe(
      [
        '## terraform plan: no changes',
        '',
        'Plan saved to `tfplan`. Apply it with the apply command.',
        '',
        '`terraform plan -no-color -input=false -detailed-exitcode -out=tfplan` exited with 0 in 12ms',
        '',
        '```',
        'No changes.',
        '```',
      ].join('\n')
    );
  });

  test('should serve the workflow guide', async () => {
    const result = await registry().get('terraform_workflow_guide')?.execute({});

    expect(result?.isError).toBe(false);
    expect(result?.output.startsWith('# Terraform Workflow on GCP\n')).toBe(true);
  });

  test('should filter security recommendations by impact', async () => {
    const result = await registry().get('terraform_gcp_security_recommendations')?.execute({ impact: 'high' });

    expect(result?.isError).toBe(false);
    expect(result?.data).toEqual({ count: 2, ids: ['SEC-GCP-001', 'SEC-GCP-004'] });
  });

  test('should serve one best-practices category', async () => {
    const result = await registry().get('terraform_gcp_best_practices')?.execute({ category: 'storage' });

    expect(result?.output.startsWith('# GCP Terraform Best Practices\n\n## Storage\n\n- Enforce uniform')).toBe(true);
    expect(result?.output.endsWith('- Use customer-managed encryption keys (CMEK) where compliance requires it.')).toBe(true);
  });

  test('should report an unknown best-practices category as not found', async () => {
    const result = await registry().get('terraform_gcp_best_practices')?.execute({ category: 'Billing' });

    expect(result?.isError).toBe(true);
    if (result?.isError) expect(result.error.code).toBe('NOT_FOUND');
  });

  test('should list the resources of one provider service', async () => {
    const result = await registry().get('terraform_gcp_provider_resources_listing')?.execute({ service: 'kms' });

    expect(result?.data).toEqual({ services: ['kms'] });
    expect(result?.output).toBe(
      [
        '# GCP Terraform Provider Resources',
        '',
        '## kms',
        '',
        '- **google_kms_key_ring**: A Cloud KMS key ring. [Documentation](https://registry.terraform.io/providers/hashicorp/google/latest/docs/resources/kms_key_ring)',
        '- **google_kms_crypto_key**: A Cloud KMS crypto key. [Documentation](https://registry.terraform.io/providers/hashicorp/google/latest/docs/resources/kms_crypto_key)',
      ].join('\n')
    );
  });

  test('should reject resource names outside the google provider', async () => {
    const result = await registry().get('terraform_gcp_resource_documentation')?.execute({ resourceName: 'aws_s3_bucket' });

    expect(result?.isError).toBe(true);
    if (result?.isError) expect(result.error.code).toBe('VALIDATION_ERROR');
  });

  test('should document a catalogued resource', async () => {
    const result = await registry().get('terraform_gcp_resource_documentation')?.execute({ resourceName: 'google_sql_user' });

    expect(result?.data).toEqual({ resource: 'google_sql_user', documented: false });
    expect(result?.output).toBe(
      '# google_sql_user\n\nA user of a Cloud SQL instance.\n\nDocumentation: https://registry.terraform.io/providers/hashicorp/google/latest/docs/resources/sql_user'
    );
  });
});

describe('formatters', () => {
  test('should describe an empty search', () => {
    expect(formatSearchResults('nat', [], 'google')).toBe("No modules found for query 'nat' for provider 'google'.");
  });

  test('should list search results', () => {
    const text = formatSearchResults('network', [
      {
        id: 'acme/network/google/9.1.0',
        namespace: 'acme',
        name: 'network',
        provider: 'google',
        version: '9.1.0',
        description: 'VPC networks',
        downloads: 1200,
        verified: true,
      },
    ]);

    expect(text).toBe(
      [
        '# Terraform Module Search Results',
        '',
        "Found 1 modules matching 'network':",
        '',
        '## acme/network/google (verified)',
        'VPC networks',
        '',
        '- **Version:** 9.1.0',
        '- **Downloads:** 1200',
        '- **URL:** https://registry.terraform.io/modules/acme/network/google/9.1.0',
      ].join('\n')
    );
  });

  test('should list validation diagnostics', () => {
    const text = formatCommandOutput({
      command: 'validate',
      validation: {
        valid: false,
        errorCount: 1,
        warningCount: 0,
        diagnostics: [{ severity: 'error', summary: 'Missing required argument', file: 'main.tf', line: 3 }],
      },
    });

    expect(text).toBe(
      [
        '## terraform validate: invalid',
        '',
        '- Errors: 1',
        '- Warnings: 0',
        '- ERROR: Missing required argument (main.tf:3)',
      ].join('\n')
    );
  });
});
