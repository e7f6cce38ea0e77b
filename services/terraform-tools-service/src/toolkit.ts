/**
 * Terraform Toolkit
 *
 * Composition root of the pipeline. Each public method is one tool-call
 * entry point: it owns its temporary workspaces and honours the caller's
 * abort signal. No state is shared between calls apart from the optional,
 * bounded module cache.
 */

import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ToolkitConfig } from '@tfguard/shared-types';
import { ValidationError, errorMessage, logger } from '@tfguard/shared-utils';
import { RemediationError, SERVICE_NAME } from './errors';
import { ModuleCache } from './modules/cache';
import { extract } from './modules/extractor';
import { SourceFetcher } from './modules/fetcher';
import { HttpClient, type FetchFn } from './modules/http';
import { parseModuleReference } from './modules/reference';
import { RegistryClient } from './modules/registry';
import { buildReport, type ModuleReport } from './modules/report';
import { loadDirectorySnapshot, withWorkspace, writeSnapshotFiles } from './modules/snapshot';
import type { RegistryModuleSummary } from './modules/types';
import { RemediationEngine, type ConfigValidator } from './remediation/engine';
import { STRATEGIES, fixableCheckIds } from './remediation/strategies';
import type { RemediationResult } from './remediation/types';
import { ProcessRunner, type CommandRunner } from './runner/command-runner';
import { CheckovScanner } from './scan/checkov';
import { filterBySeverity } from './scan/format';
import type { Finding, PolicyScanner, ScanResult, Severity } from './scan/types';
import {
  TerraformOperations,
  type LifecycleCommand,
  type TerraformCommandResult,
  type TerraformValidateResult,
} from './terraform/operations';

export interface ToolkitDependencies {
  runner?: CommandRunner;
  fetch?: FetchFn;
  scanner?: PolicyScanner;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface AnalyzeModuleInput {
  module: string;
  version?: string;
  scan?: boolean;
  remediate?: boolean;
  validate?: boolean;
  checks?: string[];
}

export interface AnalyzeModuleOutput {
  report: ModuleReport;
  remediation?: RemediationResult;
}

export interface SecurityScanInput {
  directory: string;
  checks?: string[];
  minSeverity?: Severity;
}

export interface SecurityScanOutput {
  result: ScanResult;
  /** After the severity filter */
  findings: Finding[];
}

export interface FixSecurityIssuesInput {
  directory: string;
  checks?: string[];
  dryRun?: boolean;
  validate?: boolean;
}

export interface FixSecurityIssuesOutput {
  initialFindings: Finding[];
  remediation: RemediationResult;
  /** Files written back to the directory; empty on a dry run */
  writtenFiles: string[];
}

export interface TerraformCommandInput {
  command: LifecycleCommand;
  directory: string;
  variables?: Record<string, string>;
  planFile?: string;
  format?: boolean;
}

export type TerraformCommandOutput =
  | { command: 'validate'; validation: TerraformValidateResult }
  | { command: 'plan'; result: TerraformCommandResult; hasChanges: boolean; planFile: string }
  | { command: 'init' | 'apply' | 'destroy'; result: TerraformCommandResult };

export const DEFAULT_PLAN_FILE = 'tfplan';

export class TerraformToolkit {
  readonly runner: CommandRunner;
  readonly scanner: PolicyScanner;
  readonly fetcher: SourceFetcher;
  readonly registry: RegistryClient;
  readonly engine: RemediationEngine;
  private readonly http: HttpClient;

  constructor(
    private readonly config: ToolkitConfig,
    deps: ToolkitDependencies = {}
  ) {
    this.runner = deps.runner ?? new ProcessRunner({ defaultTimeoutMs: config.terraform.timeoutMs });
    this.scanner =
      deps.scanner ??
      new CheckovScanner(this.runner, {
        checkovPath: config.scan.checkovPath,
        timeoutMs: config.scan.timeoutMs,
        fixableChecks: fixableCheckIds(STRATEGIES, config.remediation.disabledChecks),
      });

    this.http = new HttpClient({
      timeoutMs: config.fetch.timeoutMs,
      maxBytes: config.fetch.maxBytes,
      fetch: deps.fetch,
    });
    this.registry = new RegistryClient(this.http, config.registryUrl);
    this.fetcher = new SourceFetcher({
      http: this.http,
      registry: this.registry,
      cache: config.cache.maxEntries > 0 ? new ModuleCache(config.cache.maxEntries) : undefined,
    });

    this.engine = new RemediationEngine(this.scanner, {
      disabledChecks: config.remediation.disabledChecks,
      validator: this.validator,
    });
  }

  private operations(directory: string): TerraformOperations {
    return new TerraformOperations(directory, this.runner, {
      terraformPath: this.config.terraform.binaryPath,
      timeoutMs: this.config.terraform.timeoutMs,
    });
  }

  private validator: ConfigValidator = async (dir, signal) => {
    const operations = this.operations(dir);
    await operations.init({ backend: false }, signal);
    return operations.validate(signal);
  };

  async analyzeModule(input: AnalyzeModuleInput, options: CallOptions = {}): Promise<AnalyzeModuleOutput> {
    if ((input.remediate || input.validate) && !input.scan) {
      throw new ValidationError('remediate and validate require scan: true', SERVICE_NAME);
    }

    const reference = parseModuleReference(input.module, input.version);
    const snapshot = await this.fetcher.fetch(reference, { signal: options.signal });
    const model = extract(snapshot);

    if (!input.scan) {
      return { report: buildReport({ reference, source: snapshot.source, version: snapshot.version, model }) };
    }

    const scan = await withWorkspace('scan', async dir => {
      await writeSnapshotFiles(dir, snapshot.files);
      return this.scanner.scan(dir, { checks: input.checks, signal: options.signal });
    });

    const remediation = input.remediate
      ? await this.engine.remediate(model, scan.findings, snapshot, {
          checks: input.checks,
          validate: input.validate,
          signal: options.signal,
        })
      : undefined;

    return {
      report: buildReport({
        reference,
        source: snapshot.source,
        version: snapshot.version,
        model,
        findings: scan.findings,
        remediation,
      }),
      remediation,
    };
  }

  async searchModules(
    input: { query: string; provider?: string; limit?: number },
    options: CallOptions = {}
  ): Promise<RegistryModuleSummary[]> {
    return this.registry.search(input.query, { provider: input.provider, limit: input.limit, signal: options.signal });
  }

  async runSecurityScan(input: SecurityScanInput, options: CallOptions = {}): Promise<SecurityScanOutput> {
    const result = await this.scanner.scan(path.resolve(input.directory), {
      checks: input.checks,
      signal: options.signal,
    });
    return { result, findings: filterBySeverity(result.findings, input.minSeverity) };
  }

  async fixSecurityIssues(input: FixSecurityIssuesInput, options: CallOptions = {}): Promise<FixSecurityIssuesOutput> {
    const directory = path.resolve(input.directory);
    const snapshot = await loadDirectorySnapshot(directory, { maxBytes: this.config.fetch.maxBytes });
    const model = extract(snapshot);

    const scan = await this.scanner.scan(directory, { checks: input.checks, signal: options.signal });
    const remediation = await this.engine.remediate(model, scan.findings, snapshot, {
      checks: input.checks,
      validate: input.validate,
      signal: options.signal,
    });

    const writtenFiles: string[] = [];
    if (!input.dryRun) {
      for (const file of remediation.changedFiles) {
        const target = path.join(directory, ...file.path.split('/'));
        try {
          await writeFile(target, file.content, 'utf-8');
        } catch (error) {
          throw new RemediationError('ioFailure', `Failed to write ${file.path}: ${errorMessage(error)}`, {
            file: file.path,
            written: writtenFiles,
          });
        }
        writtenFiles.push(file.path);
      }
      logger.info('Wrote remediated files', { directory, files: writtenFiles });
    }

    return { initialFindings: scan.findings, remediation, writtenFiles };
  }

  async runTerraformCommand(input: TerraformCommandInput, options: CallOptions = {}): Promise<TerraformCommandOutput> {
    const operations = this.operations(path.resolve(input.directory));
    const { signal } = options;

    switch (input.command) {
      case 'init':
        return { command: 'init', result: await operations.init({}, signal) };
      case 'validate':
        if (input.format) {
          await operations.fmt(signal);
        }
        return { command: 'validate', validation: await operations.validate(signal) };
      case 'plan': {
        const planFile = input.planFile ?? DEFAULT_PLAN_FILE;
        const result = await operations.plan({ out: planFile, vars: input.variables }, signal);
        return { command: 'plan', result, hasChanges: result.hasChanges, planFile };
      }
      case 'apply':
        return {
          command: 'apply',
          result: await operations.apply({ planFile: input.planFile ?? DEFAULT_PLAN_FILE }, signal),
        };
      case 'destroy':
        return {
          command: 'destroy',
          result: await operations.destroy({ autoApprove: true, vars: input.variables }, signal),
        };
    }
  }
}
