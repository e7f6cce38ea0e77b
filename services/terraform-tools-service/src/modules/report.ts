/**
 * Module Report Builder. Pure aggregation; never fails on well-typed input.
 */

import type { RemediationResult, SkipReason } from '../remediation/types';
import { SEVERITIES, type Finding, type Severity } from '../scan/types';
import { formatFinding } from '../scan/format';
import { canonicalReference } from './reference';
import type { ModuleModel, ModuleReference, OutputSpec, VariableSpec } from './types';

export const README_PREVIEW_CHARS = 2000;

export interface ReportResource {
  address: string;
  file: string;
  line: number;
}

export interface ReportSummary {
  inputs: number;
  requiredInputs: number;
  outputs: number;
  resources: number;
  findings: number;
  findingsBySeverity: Record<Severity, number>;
  fixableFindings: number;
}

export interface ReportRemediation {
  appliedPatches: number;
  skipped: { findingId: string; checkId: string; reason: SkipReason }[];
  postScanFindings: number;
  changedFiles: string[];
  valid?: boolean;
  strategyTableVersion: string;
}

export interface ModuleReport {
  module: {
    reference: string;
    source: string;
    version?: string;
    title?: string;
    registryUrl?: string;
  };
  summary: ReportSummary;
  inputs: readonly VariableSpec[];
  outputs: readonly OutputSpec[];
  resources: ReportResource[];
  readme: string;
  findings: readonly Finding[];
  remediation?: ReportRemediation;
}

export interface ReportInput {
  reference: ModuleReference;
  source: string;
  version?: string;
  model: ModuleModel;
  findings?: readonly Finding[];
  remediation?: RemediationResult;
}

function countBySeverity(findings: readonly Finding[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0, INFO: 0, UNKNOWN: 0 };
  for (const finding of findings) counts[finding.severity]++;
  return counts;
}

export function buildReport(input: ReportInput): ModuleReport {
  const { reference, model, remediation } = input;
  const findings = input.findings ?? [];

  return {
    module: {
      reference: canonicalReference(reference),
      source: input.source,
      version: input.version,
      title: model.title,
      registryUrl:
        reference.kind === 'registry'
          ? `https://registry.terraform.io/modules/${reference.namespace}/${reference.name}/${reference.provider}${input.version ? `/${input.version}` : ''}`
          : undefined,
    },
    summary: {
      inputs: model.inputs.length,
      requiredInputs: model.inputs.filter(variable => variable.required).length,
      outputs: model.outputs.length,
      resources: model.resources.length,
      findings: findings.length,
      findingsBySeverity: countBySeverity(findings),
      fixableFindings: findings.filter(finding => finding.fixable).length,
    },
    inputs: model.inputs,
    outputs: model.outputs,
    resources: model.resources.map(block => ({
      address: `${block.typeName ?? ''}.${block.instanceName ?? ''}`,
      file: block.sourceFile,
      line: block.line,
    })),
    readme: model.readmeText,
    findings,
    remediation: remediation && {
      appliedPatches: remediation.appliedPatches.length,
      skipped: remediation.skippedFindings.map(({ finding, reason }) => ({
        findingId: finding.id,
        checkId: finding.checkId,
        reason,
      })),
      postScanFindings: remediation.postScanFindings.length,
      changedFiles: remediation.changedFiles.map(file => file.path),
      valid: remediation.validation?.valid,
      strategyTableVersion: remediation.strategyTableVersion,
    },
  };
}

export function truncateReadme(readme: string, limit = README_PREVIEW_CHARS): string {
  if (readme.length <= limit) return readme;
  return `${readme.slice(0, limit)}...\n\n(README truncated due to length)`;
}

export function renderReport(report: ModuleReport): string {
  const { module, summary } = report;
  const out = [`# Module Analysis: ${module.reference}`, ''];

  if (module.title) out.push(`**Title:** ${module.title}`);
  if (module.version) out.push(`**Version:** ${module.version}`);
  if (module.registryUrl) out.push(`**Registry Link:** ${module.registryUrl}`);
  out.push(`**Source:** ${module.source}`, '');

  out.push(
    '## Summary',
    '',
    `- Inputs: ${summary.inputs} (${summary.requiredInputs} required)`,
    `- Outputs: ${summary.outputs}`,
    `- Resources: ${summary.resources}`,
    `- Findings: ${summary.findings} (${summary.fixableFindings} auto-fixable)`,
    ''
  );

  out.push(`## Inputs (${report.inputs.length})`, '');
  for (const input of report.inputs) {
    out.push(
      `### ${input.name}`,
      `- **Description:** ${input.description?.trim() || 'No description provided'}`,
      `- **Type:** ${input.type ?? 'any'}`,
      `- **Default:** ${input.default ?? 'no default (required)'}`
    );
    if (input.sensitive) out.push('- **Sensitive:** yes');
    out.push('');
  }

  out.push(`## Outputs (${report.outputs.length})`, '');
  for (const output of report.outputs) {
    out.push(`### ${output.name}`, `- **Description:** ${output.description?.trim() || 'No description provided'}`);
    if (output.sensitive) out.push('- **Sensitive:** yes');
    out.push('');
  }

  out.push(`## Resources (${report.resources.length})`, '');
  for (const resource of report.resources) {
    out.push(`- \`${resource.address}\` (${resource.file}:${resource.line})`);
  }
  out.push('');

  if (report.findings.length > 0) {
    const counts = SEVERITIES.filter(severity => summary.findingsBySeverity[severity] > 0)
      .map(severity => `${severity}: ${summary.findingsBySeverity[severity]}`)
      .join(', ');
    out.push(`## Security Findings (${report.findings.length})`, '', counts, '');
    for (const finding of report.findings) {
      out.push(...formatFinding(finding), '');
    }
  }

  if (report.remediation) {
    const { remediation } = report;
    out.push(
      '## Remediation',
      '',
      `- Patches applied: ${remediation.appliedPatches}`,
      `- Findings after re-scan: ${remediation.postScanFindings}`,
      `- Changed files: ${remediation.changedFiles.length > 0 ? remediation.changedFiles.join(', ') : 'none'}`
    );
    if (remediation.valid !== undefined) {
      out.push(`- terraform validate: ${remediation.valid ? 'passed' : 'failed'}`);
    }
    for (const skipped of remediation.skipped) {
      out.push(`- Skipped ${skipped.checkId} (${skipped.findingId}): ${skipped.reason}`);
    }
    out.push('');
  }

  out.push('## README', '', report.readme ? truncateReadme(report.readme) : 'No README found.');
  return out.join('\n');
}
