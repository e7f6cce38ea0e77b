/**
 * Terraform Operations
 *
 * Lifecycle commands (init, validate, plan, apply, destroy, fmt) run through
 * the Command Runner against one working directory.
 */

import { logger } from '@tfguard/shared-utils';
import { z } from 'zod';
import { ensureSuccess, type CommandRunner, type CommandResult } from '../runner/command-runner';

export const LIFECYCLE_COMMANDS = ['init', 'validate', 'plan', 'apply', 'destroy'] as const;

export type LifecycleCommand = (typeof LIFECYCLE_COMMANDS)[number];

export interface TerraformInitOptions {
  /** `false` skips backend initialization, as for a throwaway validation copy */
  backend?: boolean;
}

export interface TerraformPlanOptions {
  out?: string;
  vars?: Record<string, string>;
}

export interface TerraformApplyOptions {
  /** Saved plan to apply; variables are baked into it */
  planFile: string;
}

export interface TerraformDestroyOptions {
  autoApprove?: boolean;
  vars?: Record<string, string>;
}

export interface TerraformCommandResult {
  success: boolean;
  command: string;
  output: string;
  exitCode: number;
  durationMs: number;
}

export interface TerraformPlanResult extends TerraformCommandResult {
  hasChanges: boolean;
  planFile?: string;
}

export interface ValidationDiagnostic {
  severity: 'error' | 'warning';
  summary: string;
  detail?: string;
  file?: string;
  line?: number;
}

export interface TerraformValidateResult {
  valid: boolean;
  errorCount: number;
  warningCount: number;
  diagnostics: ValidationDiagnostic[];
}

const validateOutputSchema = z.object({
  valid: z.boolean(),
  error_count: z.number().default(0),
  warning_count: z.number().default(0),
  diagnostics: z
    .array(
      z.object({
        severity: z.enum(['error', 'warning']),
        summary: z.string(),
        detail: z.string().optional(),
        range: z
          .object({
            filename: z.string(),
            start: z.object({ line: z.number() }),
          })
          .optional(),
      })
    )
    .default([]),
});

const BASE_FLAGS = ['-no-color', '-input=false'];

export class TerraformOperations {
  private readonly workingDir: string;
  private readonly runner: CommandRunner;
  private readonly terraformPath: string;
  private readonly timeoutMs?: number;

  constructor(
    workingDir: string,
    runner: CommandRunner,
    options: { terraformPath?: string; timeoutMs?: number } = {}
  ) {
    this.workingDir = workingDir;
    this.runner = runner;
    this.terraformPath = options.terraformPath ?? 'terraform';
    this.timeoutMs = options.timeoutMs;
  }

  private async execute(
    args: string[],
    options: { vars?: Record<string, string>; signal?: AbortSignal } = {}
  ): Promise<CommandResult> {
    return this.runner.run({
      cwd: this.workingDir,
      command: this.terraformPath,
      args,
      vars: options.vars,
      timeoutMs: this.timeoutMs,
      signal: options.signal,
    });
  }

  private toResult(result: CommandResult): TerraformCommandResult {
    return {
      success: result.exitCode === 0,
      command: [result.command, ...result.args].join(' '),
      output: result.stdout || result.stderr,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
    };
  }

  async init(options: TerraformInitOptions = {}, signal?: AbortSignal): Promise<TerraformCommandResult> {
    logger.info(`Terraform init in ${this.workingDir}`);

    const args = ['init', ...BASE_FLAGS];
    if (options.backend === false) args.push('-backend=false');

    return this.toResult(ensureSuccess(await this.execute(args, { signal })));
  }

  /**
   * `terraform validate -json`. Exit code 1 with a JSON body is an invalid
   * configuration, not a failed command.
   */
  async validate(signal?: AbortSignal): Promise<TerraformValidateResult> {
    logger.info(`Terraform validate in ${this.workingDir}`);

    const result = ensureSuccess(await this.execute(['validate', '-json', '-no-color'], { signal }), [0, 1]);
    const parsed = validateOutputSchema.safeParse(safeJson(result.stdout));
    if (!parsed.success) {
      // Plain-text output: only a clean exit counts as valid
      ensureSuccess(result);
      return { valid: true, errorCount: 0, warningCount: 0, diagnostics: [] };
    }

    const body = parsed.data;
    return {
      valid: body.valid,
      errorCount: body.error_count,
      warningCount: body.warning_count,
      diagnostics: body.diagnostics.map(d => ({
        severity: d.severity,
        summary: d.summary,
        detail: d.detail,
        file: d.range?.filename,
        line: d.range?.start.line,
      })),
    };
  }

  /**
   * Plan with -detailed-exitcode: 0 means no changes, 2 means changes
   */
  async plan(options: TerraformPlanOptions = {}, signal?: AbortSignal): Promise<TerraformPlanResult> {
    logger.info(`Terraform plan in ${this.workingDir}`);

    const args = ['plan', ...BASE_FLAGS, '-detailed-exitcode'];
    if (options.out) args.push(`-out=${options.out}`);

    const result = ensureSuccess(await this.execute(args, { vars: options.vars, signal }), [0, 2]);
    return {
      ...this.toResult(result),
      success: true,
      hasChanges: result.exitCode === 2,
      planFile: options.out,
    };
  }

  async apply(options: TerraformApplyOptions, signal?: AbortSignal): Promise<TerraformCommandResult> {
    logger.info(`Terraform apply in ${this.workingDir}`);

    const result = await this.execute(['apply', ...BASE_FLAGS, options.planFile], { signal });
    return this.toResult(ensureSuccess(result));
  }

  async destroy(options: TerraformDestroyOptions = {}, signal?: AbortSignal): Promise<TerraformCommandResult> {
    logger.info(`Terraform destroy in ${this.workingDir}`);

    const args = ['destroy', ...BASE_FLAGS];
    if (options.autoApprove) args.push('-auto-approve');

    const result = await this.execute(args, { vars: options.vars, signal });
    return this.toResult(ensureSuccess(result));
  }

  async fmt(signal?: AbortSignal): Promise<TerraformCommandResult> {
    const result = await this.execute(['fmt', '-no-color', '-recursive'], { signal });
    return this.toResult(ensureSuccess(result));
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
