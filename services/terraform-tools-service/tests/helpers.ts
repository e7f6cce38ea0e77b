import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { gzipSync, strToU8, zipSync } from 'fflate';
import { pack as tarPack } from 'tar-stream';
import type { FetchFn } from '../src/modules/http';
import type { Finding, PolicyScanner, ScanOptions, ScanResult } from '../src/scan/types';
import {
  varFlags,
  type CommandResult,
  type CommandRunner,
  type RunOptions,
} from '../src/runner/command-runner';

/**
 * In-process CommandRunner: records every call and answers from a queue
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RunOptions[] = [];
  private readonly queue: Array<Partial<CommandResult> | Error> = [];

  enqueue(...results: Array<Partial<CommandResult> | Error>): this {
    this.queue.push(...results);
    return this;
  }

  async run(options: RunOptions): Promise<CommandResult> {
    this.calls.push(options);
    const next = this.queue.shift() ?? {};
    if (next instanceof Error) throw next;
    return {
      command: options.command,
      args: [...(options.args ?? []), ...varFlags(options.vars)],
      stdout: '',
      stderr: '',
      exitCode: 0,
      durationMs: 1,
      truncated: false,
      ...next,
    };
  }

  argsOf(index: number): string[] {
    const call = this.calls[index];
    if (!call) throw new Error(`No call #${index}`);
    return [...(call.args ?? []), ...varFlags(call.vars)];
  }
}

/** Build a gzip-compressed tar archive from path → content pairs */
export async function tarGz(entries: Record<string, string>): Promise<Uint8Array> {
  const pack = tarPack();
  const chunks: Buffer[] = [];
  const done = new Promise<void>((resolve, reject) => {
    pack.on('data', (chunk: Buffer) => chunks.push(chunk));
    pack.on('end', () => resolve());
    pack.on('error', reject);
  });
  for (const [name, content] of Object.entries(entries)) {
    pack.entry({ name }, content);
  }
  pack.finalize();
  await done;
  return gzipSync(Buffer.concat(chunks));
}

export function zip(entries: Record<string, string | Uint8Array>): Uint8Array {
  const files: Record<string, Uint8Array> = {};
  for (const [name, content] of Object.entries(entries)) {
    files[name] = typeof content === 'string' ? strToU8(content) : content;
  }
  return zipSync(files);
}

/** A fetch stand-in that serves fixed responses by URL */
export function routeFetch(routes: Record<string, () => Response>): FetchFn & { requested: string[] } {
  const requested: string[] = [];
  const fn = async (input: string) => {
    requested.push(input);
    const route = routes[input];
    return route ? route() : new Response('not found', { status: 404 });
  };
  return Object.assign(fn, { requested });
}

/**
 * Stand-in for Checkov that fails CKV_GCP_29 on `main.tf` until the bucket
 * enables uniform bucket-level access
 */
export class BucketAccessScanner implements PolicyScanner {
  readonly scannedDirs: string[] = [];

  async scan(dir: string, options: ScanOptions = {}): Promise<ScanResult> {
    this.scannedDirs.push(dir);
    if (options.signal?.aborted) throw new Error('aborted');
    const content = await readFile(path.join(dir, 'main.tf'), 'utf8');
    const findings: Finding[] = content.includes('uniform_bucket_level_access = true')
      ? []
      : [
          {
            id: 'CKV_GCP_29:main.tf:google_storage_bucket.logs',
            checkId: 'CKV_GCP_29',
            checkName: 'Ensure that Cloud Storage buckets have uniform bucket-level access enabled',
            severity: 'HIGH',
            resourceRef: { file: 'main.tf', address: 'google_storage_bucket.logs', lineRange: [1, 4] },
            message: 'Ensure that Cloud Storage buckets have uniform bucket-level access enabled',
            fixable: true,
          },
        ];
    return {
      findings,
      summary: { passed: 3, failed: findings.length, skipped: 0, parsingErrors: 0 },
      parsingErrors: [],
      durationMs: 1,
    };
  }
}

export const BUCKET_TF = 'resource "google_storage_bucket" "logs" {\n  name     = "logs"\n  location = "US"\n}\n';

export const FIXED_BUCKET_TF =
  'resource "google_storage_bucket" "logs" {\n  name     = "logs"\n  location = "US"\n  uniform_bucket_level_access = true\n}\n';
