/**
 * Tool definitions for the Terraform toolkit
 */

import { z } from 'zod';
import { renderReport } from '../modules/report';
import { formatFinding, formatScanResult } from '../scan/format';
import { SEVERITIES } from '../scan/types';
import { LIFECYCLE_COMMANDS, type TerraformCommandResult } from '../terraform/operations';
import type { FixSecurityIssuesOutput, TerraformCommandOutput, TerraformToolkit } from '../toolkit';
import { loadResource } from '../resources';
import {
  IMPACT_LEVELS,
  formatProviderResources,
  formatResourceDocumentation,
  formatSecurityRecommendations,
  loadProviderCatalog,
  loadSecurityRecommendations,
  selectSection,
} from '../resources/catalog';
import type { RegistryModuleSummary } from '../modules/types';
import { defineTool, type ToolDefinition } from './types';

const checkIdsSchema = z
  .array(z.string().regex(/^[A-Za-z0-9_]+$/, 'check ids look like CKV_GCP_29'))
  .optional()
  .describe('Restrict the scan to these Checkov check ids');

const directorySchema = z.string().min(1).describe('Directory containing the Terraform configuration');

const variablesSchema = z
  .record(z.string().regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, 'invalid variable name'), z.string())
  .optional()
  .describe('Input variables, passed as -var key=value');

export function formatSearchResults(query: string, modules: readonly RegistryModuleSummary[], provider?: string): string {
  const scope = provider ? ` for provider '${provider}'` : '';
  if (modules.length === 0) {
    return `No modules found for query '${query}'${scope}.`;
  }

  const out = ['# Terraform Module Search Results', '', `Found ${modules.length} modules matching '${query}'${scope}:`, ''];
  for (const module of modules) {
    out.push(`## ${module.namespace}/${module.name}/${module.provider}${module.verified ? ' (verified)' : ''}`);
    if (module.description) out.push(module.description, '');
    out.push(
      `- **Version:** ${module.version}`,
      `- **Downloads:** ${module.downloads}`,
      `- **URL:** https://registry.terraform.io/modules/${module.namespace}/${module.name}/${module.provider}/${module.version}`
    );
    if (module.source) out.push(`- **Source:** ${module.source}`);
    out.push('');
  }
  return out.join('\n').trimEnd();
}

function commandBlock(result: TerraformCommandResult): string[] {
  return [`\`${result.command}\` exited with ${result.exitCode} in ${result.durationMs}ms`, '', '```', result.output.trimEnd(), '```'];
}

export function formatCommandOutput(output: TerraformCommandOutput): string {
  switch (output.command) {
    case 'validate': {
      const { validation } = output;
      const out = [
        `## terraform validate: ${validation.valid ? 'valid' : 'invalid'}`,
        '',
        `- Errors: ${validation.errorCount}`,
        `- Warnings: ${validation.warningCount}`,
      ];
      for (const diagnostic of validation.diagnostics) {
        const where = diagnostic.file ? ` (${diagnostic.file}${diagnostic.line ? `:${diagnostic.line}` : ''})` : '';
        out.push(`- ${diagnostic.severity.toUpperCase()}: ${diagnostic.summary}${where}`);
        if (diagnostic.detail) out.push(`  ${diagnostic.detail}`);
      }
      return out.join('\n');
    }
    case 'plan':
      return [
        `## terraform plan: ${output.hasChanges ? 'changes pending' : 'no changes'}`,
        '',
        `Plan saved to \`${output.planFile}\`. Apply it with the apply command.`,
        '',
        ...commandBlock(output.result),
      ].join('\n');
    case 'init':
    case 'apply':
    case 'destroy':
      return [`## terraform ${output.command}`, '', ...commandBlock(output.result)].join('\n');
  }
}

export function formatRemediation(output: FixSecurityIssuesOutput, dryRun: boolean): string {
  const { remediation } = output;
  const out = ['# Security Remediation', ''];
  out.push(
    `- Findings before: ${output.initialFindings.length}`,
    `- Patches applied: ${remediation.appliedPatches.length}`,
    `- Findings after re-scan: ${remediation.postScanFindings.length}`,
    `- Strategy table version: ${remediation.strategyTableVersion}`
  );
  if (dryRun) {
    out.push(`- Dry run: ${remediation.changedFiles.length} file(s) would change`);
  } else {
    out.push(`- Files written: ${output.writtenFiles.length > 0 ? output.writtenFiles.join(', ') : 'none'}`);
  }
  if (remediation.validation) {
    out.push(`- terraform validate: ${remediation.validation.valid ? 'passed' : 'failed'}`);
  }

  if (remediation.skippedFindings.length > 0) {
    out.push('', '## Skipped', '');
    for (const { finding, reason } of remediation.skippedFindings) {
      out.push(`- ${finding.checkId} on ${finding.resourceRef.address} (${finding.resourceRef.file}): ${reason}`);
    }
  }

  if (remediation.postScanFindings.length > 0) {
    out.push('', '## Remaining Findings', '');
    for (const finding of remediation.postScanFindings) {
      out.push(...formatFinding(finding), '');
    }
    out.pop();
  }

  if (dryRun && remediation.changedFiles.length > 0) {
    out.push('', '## Patched Files', '');
    for (const file of remediation.changedFiles) {
      out.push(`### ${file.path}`, '', '```hcl', file.content.trimEnd(), '```', '');
    }
    out.pop();
  }

  return out.join('\n');
}

export function createTools(toolkit: TerraformToolkit): ToolDefinition[] {
  return [
    defineTool({
      name: 'terraform_analyze_module',
      description:
        'Fetch a Terraform module by registry id (namespace/name/provider) or URL and report its inputs, outputs, ' +
        'resources and README. Optionally scan it with Checkov and preview automated fixes.',
      inputSchema: z.object({
        module: z.string().min(1).describe('namespace/name/provider, optionally with //subdir, or an http(s) URL'),
        version: z.string().optional().describe('Exact registry version; latest when omitted'),
        scan: z.boolean().default(false),
        remediate: z.boolean().default(false),
        validate: z.boolean().default(false),
        checks: checkIdsSchema,
      }),
      permissionTier: 'auto_allow',
      async run(input, { signal }) {
        const { report } = await toolkit.analyzeModule(input, { signal });
        return { output: renderReport(report), data: report };
      },
    }),

    defineTool({
      name: 'terraform_search_modules',
      description: 'Search the Terraform module registry',
      inputSchema: z.object({
        query: z.string().min(1),
        provider: z.string().optional().default('google'),
        limit: z.number().int().min(1).max(100).optional(),
      }),
      permissionTier: 'auto_allow',
      async run(input, { signal }) {
        const modules = await toolkit.searchModules(input, { signal });
        return { output: formatSearchResults(input.query, modules, input.provider), data: { count: modules.length, modules } };
      },
    }),

    defineTool({
      name: 'terraform_run_checkov',
      description: 'Run a Checkov scan over a Terraform configuration directory',
      inputSchema: z.object({
        directory: directorySchema,
        checks: checkIdsSchema,
        minSeverity: z.enum(SEVERITIES).optional(),
      }),
      permissionTier: 'auto_allow',
      async run(input, { signal }) {
        const { result, findings } = await toolkit.runSecurityScan(input, { signal });
        return { output: formatScanResult(result, findings), data: { ...result, findings } };
      },
    }),

    defineTool({
      name: 'terraform_fix_security_issues',
      description:
        'Scan a Terraform directory with Checkov, patch the findings that have a known fix, re-scan once and ' +
        'write the patched files back (unless dryRun)',
      inputSchema: z.object({
        directory: directorySchema,
        checks: checkIdsSchema,
        dryRun: z.boolean().default(false),
        validate: z.boolean().default(false),
      }),
      permissionTier: 'ask_once',
      isDestructive: true,
      async run(input, { signal }) {
        const result = await toolkit.fixSecurityIssues(input, { signal });
        return { output: formatRemediation(result, input.dryRun), data: result };
      },
    }),

    defineTool({
      name: 'terraform_command',
      description:
        'Run a Terraform lifecycle command (init, validate, plan, apply, destroy). plan saves a plan file ' +
        '(tfplan by default) and apply applies a saved plan file.',
      inputSchema: z.object({
        command: z.enum(LIFECYCLE_COMMANDS),
        directory: directorySchema,
        variables: variablesSchema,
        planFile: z.string().min(1).optional(),
        format: z.boolean().default(false).describe('Run terraform fmt -recursive before validate'),
      }),
      permissionTier: 'always_ask',
      isDestructive: true,
      async run(input, { signal }) {
        const output = await toolkit.runTerraformCommand(input, { signal });
        return { output: formatCommandOutput(output), data: output };
      },
    }),

    defineTool({
      name: 'terraform_workflow_guide',
      description: 'Security-first Terraform workflow guide for GCP',
      inputSchema: z.object({}),
      permissionTier: 'auto_allow',
      async run() {
        const guide = await loadResource('workflow-guide');
        return { output: guide, data: { resource: 'workflow-guide' } };
      },
    }),

    defineTool({
      name: 'terraform_gcp_best_practices',
      description: 'GCP Terraform best practices, optionally for one category (Networking, Storage, Compute, GKE, IAM)',
      inputSchema: z.object({
        category: z.string().min(1).optional(),
      }),
      permissionTier: 'auto_allow',
      async run(input) {
        const guide = await loadResource('gcp-best-practices');
        const output = input.category ? selectSection(guide, input.category) : guide;
        return { output, data: { resource: 'gcp-best-practices', category: input.category } };
      },
    }),

    defineTool({
      name: 'terraform_gcp_security_recommendations',
      description: 'Security recommendations for Terraform on GCP with examples, optionally filtered by impact',
      inputSchema: z.object({
        impact: z
          .string()
          .transform(value => value.toUpperCase())
          .pipe(z.enum(IMPACT_LEVELS))
          .optional(),
      }),
      permissionTier: 'auto_allow',
      async run(input) {
        const recommendations = await loadSecurityRecommendations();
        const selected = input.impact ? recommendations.filter(rec => rec.impact === input.impact) : recommendations;
        return {
          output: formatSecurityRecommendations(recommendations, input.impact),
          data: { count: selected.length, ids: selected.map(rec => rec.id) },
        };
      },
    }),

    defineTool({
      name: 'terraform_gcp_provider_resources_listing',
      description: 'List Google provider resource types by service (compute, storage, container, sql, iam, ...)',
      inputSchema: z.object({
        service: z.string().min(1).optional(),
      }),
      permissionTier: 'auto_allow',
      async run(input) {
        const catalog = await loadProviderCatalog();
        return {
          output: formatProviderResources(catalog, input.service),
          data: { services: input.service ? [input.service.toLowerCase()] : Object.keys(catalog.services) },
        };
      },
    }),

    defineTool({
      name: 'terraform_gcp_resource_documentation',
      description: 'Arguments and an example for a Google provider resource type',
      inputSchema: z.object({
        resourceName: z.string().regex(/^google_[a-z0-9_]+$/, 'resource types look like google_storage_bucket'),
      }),
      permissionTier: 'auto_allow',
      async run(input) {
        const catalog = await loadProviderCatalog();
        return {
          output: formatResourceDocumentation(catalog, input.resourceName),
          data: { resource: input.resourceName, documented: input.resourceName in catalog.documentation },
        };
      },
    }),
  ];
}
