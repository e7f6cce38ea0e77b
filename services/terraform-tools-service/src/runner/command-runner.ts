/**
 * Command Runner
 *
 * Bounded-time subprocess execution for Terraform and Checkov. Commands are
 * spawned without a shell; output is captured in full (up to a cap) and
 * returned together with the exit code. Nothing here retries: plan, apply
 * and destroy are not safe to repeat blindly.
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import { CancelledError, logger, systemErrorCode } from '@tfguard/shared-utils';
import { RunnerError, SERVICE_NAME, excerpt } from '../errors';

export const DEFAULT_COMMAND_TIMEOUT_MS = 600_000; // 10 minutes
const MAX_OUTPUT_BYTES = 50 * 1024 * 1024;
const KILL_GRACE_MS = 5_000;

export interface RunOptions {
  cwd: string;
  command: string;
  args?: readonly string[];
  /** Serialized as repeated `-var key=value` flags after `args` */
  vars?: Readonly<Record<string, string>>;
  env?: Readonly<Record<string, string>>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CommandResult {
  command: string;
  args: string[];
  stdout: string;
  stderr: string;
  exitCode: number;
  durationMs: number;
  /** Output went past the capture cap and was cut */
  truncated: boolean;
}

export interface CommandRunner {
  run(options: RunOptions): Promise<CommandResult>;
}

/** The parts of a ChildProcess the runner relies on */
export interface ChildHandle {
  readonly stdout: NodeJS.ReadableStream | null;
  readonly stderr: NodeJS.ReadableStream | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildHandle;

const defaultSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

export function varFlags(vars: Readonly<Record<string, string>> | undefined): string[] {
  if (!vars) return [];
  return Object.entries(vars).flatMap(([key, value]) => ['-var', `${key}=${value}`]);
}

class OutputBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  append(chunk: string | Buffer, budget: { remaining: number }) {
    const buf = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    if (budget.remaining <= 0) {
      this.truncated = true;
      return;
    }
    const kept = buf.length > budget.remaining ? buf.subarray(0, budget.remaining) : buf;
    if (kept.length < buf.length) this.truncated = true;
    this.chunks.push(kept);
    this.size += kept.length;
    budget.remaining -= kept.length;
  }

  toString(): string {
    return Buffer.concat(this.chunks, this.size).toString('utf-8');
  }
}

export class ProcessRunner implements CommandRunner {
  private readonly spawnFn: SpawnFn;
  private readonly defaultTimeoutMs: number;

  constructor(options: { spawn?: SpawnFn; defaultTimeoutMs?: number } = {}) {
    this.spawnFn = options.spawn ?? defaultSpawn;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  }

  async run(options: RunOptions): Promise<CommandResult> {
    const args = [...(options.args ?? []), ...varFlags(options.vars)];
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const { signal } = options;

    if (signal?.aborted) {
      throw new CancelledError(options.command, SERVICE_NAME);
    }

    logger.debug(`Executing: ${options.command} ${args.join(' ')} in ${options.cwd}`);

    const started = Date.now();
    const child = this.spawnFn(options.command, args, {
      cwd: options.cwd,
      env: {
        ...process.env,
        TF_IN_AUTOMATION: 'true',
        TF_INPUT: 'false',
        ...options.env,
      },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    return new Promise<CommandResult>((resolve, reject) => {
      const stdout = new OutputBuffer();
      const stderr = new OutputBuffer();
      const budget = { remaining: MAX_OUTPUT_BYTES };
      let settled = false;
      let timedOut = false;
      let cancelled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const terminate = () => {
        child.kill('SIGTERM');
        killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
        killTimer.unref();
      };

      const timer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, timeoutMs);

      const onAbort = () => {
        cancelled = true;
        terminate();
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const settle = (action: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        signal?.removeEventListener('abort', onAbort);
        action();
      };

      child.stdout?.on('data', (chunk: string | Buffer) => stdout.append(chunk, budget));
      child.stderr?.on('data', (chunk: string | Buffer) => stderr.append(chunk, budget));

      child.once('error', err => {
        settle(() => {
          if (systemErrorCode(err) === 'ENOENT') {
            reject(
              new RunnerError('notFound', `Command not found: ${options.command}`, {
                command: options.command,
              })
            );
          } else {
            reject(err);
          }
        });
      });

      child.once('close', code => {
        settle(() => {
          if (cancelled) {
            reject(new CancelledError(options.command, SERVICE_NAME));
            return;
          }
          if (timedOut) {
            reject(
              new RunnerError('timeout', `${options.command} timed out after ${timeoutMs}ms`, {
                command: options.command,
                args,
                timeoutMs,
                stderr: excerpt(stderr.toString()),
              })
            );
            return;
          }
          resolve({
            command: options.command,
            args,
            stdout: stdout.toString(),
            stderr: stderr.toString(),
            exitCode: code ?? 1,
            durationMs: Date.now() - started,
            truncated: stdout.truncated || stderr.truncated,
          });
        });
      });
    });
  }
}

/**
 * Raise RunnerError{nonZeroExit} unless the exit code is one the caller accepts
 */
export function ensureSuccess(result: CommandResult, accepted: readonly number[] = [0]): CommandResult {
  if (!accepted.includes(result.exitCode)) {
    throw new RunnerError(
      'nonZeroExit',
      `${result.command} ${result.args[0] ?? ''} exited with code ${result.exitCode}: ${excerpt(result.stderr || result.stdout, 500)}`,
      {
        command: result.command,
        args: result.args,
        exitCode: result.exitCode,
        stderr: excerpt(result.stderr),
      }
    );
  }
  return result;
}
