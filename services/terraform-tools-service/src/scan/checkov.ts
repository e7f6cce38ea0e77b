/**
 * Policy Scan Adapter for Checkov
 *
 * Checkov's JSON output comes in several shapes depending on how many
 * frameworks ran and whether anything was scanned. Each shape is classified
 * explicitly; output that matches none of them is an error rather than an
 * empty result.
 */

import { z } from 'zod';
import { ValidationError, logger } from '@tfguard/shared-utils';
import { SERVICE_NAME, ScanError, excerpt } from '../errors';
import type { CommandRunner } from '../runner/command-runner';
import { compareFindings, toSeverity, type Finding, type PolicyScanner, type ScanOptions, type ScanResult } from './types';

export const DEFAULT_SCAN_TIMEOUT_MS = 300_000; // 5 minutes
const CHECK_ID_PATTERN = /^[A-Za-z0-9_]+$/;

const failedCheckSchema = z.object({
  check_id: z.string().min(1),
  check_name: z.string(),
  file_path: z.string(),
  resource: z.string(),
  file_line_range: z.array(z.number()).nullish(),
  severity: z.string().nullish(),
  guideline: z.string().nullish(),
});

const summarySchema = z.object({
  passed: z.number(),
  failed: z.number(),
  skipped: z.number(),
  parsing_errors: z.number(),
  resource_count: z.number().optional(),
  checkov_version: z.string().optional(),
});

const reportSchema = z.object({
  check_type: z.string(),
  results: z.object({
    failed_checks: z.array(z.unknown()).default([]),
    passed_checks: z.array(z.unknown()).default([]),
    skipped_checks: z.array(z.unknown()).default([]),
    parsing_errors: z.array(z.string()).default([]),
  }),
  summary: summarySchema,
});

export type CheckovReport = z.infer<typeof reportSchema>;
export type CheckovSummary = z.infer<typeof summarySchema>;

export type CheckovOutput =
  | { shape: 'report'; report: CheckovReport }
  | { shape: 'reportList'; reports: CheckovReport[] }
  | { shape: 'summaryOnly'; summary: CheckovSummary }
  | { shape: 'unknown'; value: unknown };

export function classifyOutput(value: unknown): CheckovOutput {
  if (Array.isArray(value)) {
    const reports = z.array(reportSchema).safeParse(value);
    return reports.success ? { shape: 'reportList', reports: reports.data } : { shape: 'unknown', value };
  }
  const report = reportSchema.safeParse(value);
  if (report.success) return { shape: 'report', report: report.data };
  const summary = summarySchema.safeParse(value);
  if (summary.success) return { shape: 'summaryOnly', summary: summary.data };
  return { shape: 'unknown', value };
}

export interface CheckovScannerOptions {
  checkovPath?: string;
  timeoutMs?: number;
  /** Check ids the remediation engine is trusted to fix */
  fixableChecks?: ReadonlySet<string>;
}

export class CheckovScanner implements PolicyScanner {
  private checkovPath: string;
  private timeoutMs: number;
  private fixableChecks: ReadonlySet<string>;

  constructor(
    private runner: CommandRunner,
    options: CheckovScannerOptions = {}
  ) {
    this.checkovPath = options.checkovPath ?? 'checkov';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SCAN_TIMEOUT_MS;
    this.fixableChecks = options.fixableChecks ?? new Set();
  }

  buildArgs(dir: string, checks?: readonly string[]): string[] {
    const args = ['-d', dir, '--framework', 'terraform', '-o', 'json', '--skip-download'];
    if (checks && checks.length > 0) {
      const invalid = checks.filter(check => !CHECK_ID_PATTERN.test(check));
      if (invalid.length > 0) {
        throw new ValidationError(`Invalid check ids: ${invalid.join(', ')}`, SERVICE_NAME, { checks: invalid });
      }
      args.push('--check', checks.join(','));
    }
    return args;
  }

  async scan(dir: string, options: ScanOptions = {}): Promise<ScanResult> {
    const args = this.buildArgs(dir, options.checks);
    logger.info('Running Checkov scan', { directory: dir, checks: options.checks });

    const result = await this.runner.run({
      cwd: dir,
      command: this.checkovPath,
      args,
      timeoutMs: this.timeoutMs,
      signal: options.signal,
    });

    if (result.exitCode !== 0 && result.stdout.trim() === '') {
      throw engineFailure(result.exitCode, result.stderr);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(result.stdout);
    } catch {
      // Exit 1 only means checks failed; anything above it is the engine itself
      if (result.exitCode > 1) {
        throw engineFailure(result.exitCode, result.stderr, result.stdout);
      }
      throw new ScanError('malformedOutput', 'Checkov output is not valid JSON', {
        stdoutExcerpt: excerpt(result.stdout),
      });
    }

    const scanResult = this.toScanResult(classifyOutput(parsed), result.durationMs);
    logger.info('Checkov scan completed', {
      directory: dir,
      failed: scanResult.summary.failed,
      passed: scanResult.summary.passed,
      durationMs: result.durationMs,
    });
    return scanResult;
  }

  toScanResult(output: CheckovOutput, durationMs = 0): ScanResult {
    switch (output.shape) {
      case 'summaryOnly':
        return {
          findings: [],
          summary: {
            passed: output.summary.passed,
            failed: output.summary.failed,
            skipped: output.summary.skipped,
            parsingErrors: output.summary.parsing_errors,
          },
          parsingErrors: [],
          engineVersion: output.summary.checkov_version,
          durationMs,
        };
      case 'report':
      case 'reportList': {
        const reports = output.shape === 'report' ? [output.report] : output.reports;
        const findings = reports.flatMap(report => report.results.failed_checks.map((record, index) => this.toFinding(record, index)));
        return {
          findings: findings.sort(compareFindings),
          summary: {
            passed: sum(reports.map(report => report.summary.passed)),
            failed: sum(reports.map(report => report.summary.failed)),
            skipped: sum(reports.map(report => report.summary.skipped)),
            parsingErrors: sum(reports.map(report => report.summary.parsing_errors)),
          },
          parsingErrors: reports.flatMap(report => report.results.parsing_errors),
          engineVersion: reports.find(report => report.summary.checkov_version)?.summary.checkov_version,
          durationMs,
        };
      }
      case 'unknown':
        throw new ScanError('malformedOutput', 'Unrecognized Checkov output shape', {
          outputExcerpt: excerpt(JSON.stringify(output.value) ?? String(output.value)),
        });
    }
  }

  private toFinding(record: unknown, index: number): Finding {
    const parsed = failedCheckSchema.safeParse(record);
    if (!parsed.success) {
      throw new ScanError('malformedOutput', `Failed check #${index} does not match the expected record shape`, {
        index,
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const check = parsed.data;
    const file = check.file_path.replace(/^(\.?\/)+/, '');
    const range = check.file_line_range;
    return {
      id: `${check.check_id}:${file}:${check.resource}`,
      checkId: check.check_id,
      checkName: check.check_name,
      severity: toSeverity(check.severity),
      resourceRef: {
        file,
        address: check.resource,
        lineRange: range && range.length >= 2 ? [range[0], range[1]] : undefined,
      },
      message: check.check_name,
      guideline: check.guideline ?? undefined,
      fixable: this.fixableChecks.has(check.check_id),
    };
  }
}

function engineFailure(exitCode: number, stderr: string, stdout?: string): ScanError {
  const stderrExcerpt = excerpt(stderr);
  logger.error('Checkov failed without parseable output', { exitCode, stderr: stderrExcerpt });
  return new ScanError('engineFailed', `Checkov exited with code ${exitCode}: ${stderrExcerpt}`, {
    exitCode,
    stderrExcerpt,
    ...(stdout === undefined ? {} : { stdoutExcerpt: excerpt(stdout) }),
  });
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
