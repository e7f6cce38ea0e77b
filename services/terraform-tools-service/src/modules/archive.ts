/**
 * Payload decoding for module downloads: ZIP, gzip-compressed tar, or a
 * single plain-text file. Decompressed size is bounded while inflating, so
 * an archive bomb fails with FetchError{tooLarge} before it fills memory.
 */

import { Readable } from 'node:stream';
import { Gunzip, strFromU8, unzipSync } from 'fflate';
import { extract as tarExtract, type Headers } from 'tar-stream';
import { FetchError } from '../errors';
import type { SnapshotFile } from './types';

export type PayloadFormat = 'zip' | 'tar.gz' | 'text';

const TEXT_EXTENSIONS = ['.tf', '.tf.json', '.tfvars', '.md', '.hcl'];
const BINARY_SNIFF_BYTES = 8000;

interface DecodeOptions {
  /** Basename from the download URL, used to name plain-text payloads */
  fileName: string;
  maxBytes: number;
}

class SizeBudget {
  private used = 0;

  constructor(private readonly maxBytes: number) {}

  charge(bytes: number) {
    this.used += bytes;
    if (this.used > this.maxBytes) {
      throw new FetchError('tooLarge', `Decompressed module exceeds ${this.maxBytes} bytes`, {
        maxBytes: this.maxBytes,
      });
    }
  }
}

export function detectFormat(bytes: Uint8Array): PayloadFormat {
  if (bytes.length >= 4 && bytes[0] === 0x50 && bytes[1] === 0x4b && (bytes[2] === 0x03 || bytes[2] === 0x05)) {
    return 'zip';
  }
  if (bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b) {
    return 'tar.gz';
  }
  return 'text';
}

export function isBinary(bytes: Uint8Array): boolean {
  const limit = Math.min(bytes.length, BINARY_SNIFF_BYTES);
  for (let i = 0; i < limit; i++) {
    if (bytes[i] === 0) return true;
  }
  return false;
}

function isTar(bytes: Uint8Array): boolean {
  return bytes.length >= 262 && strFromU8(bytes.subarray(257, 262)) === 'ustar';
}

/**
 * Normalize an archive entry path. Entries that would land outside the
 * extraction root make the whole archive unacceptable.
 */
export function normalizeEntryPath(raw: string): string {
  const path = raw.replace(/\\/g, '/').replace(/^(\.\/)+/, '');
  if (path.startsWith('/') || /^[A-Za-z]:/.test(path) || path.split('/').includes('..')) {
    throw new FetchError('unsupportedFormat', `Archive entry escapes the module root: ${raw}`, { entry: raw });
  }
  return path;
}

/**
 * GitHub and most release tarballs wrap everything in one directory
 */
export function stripCommonRoot(files: SnapshotFile[]): SnapshotFile[] {
  if (files.length === 0) return files;
  const first = files[0].path.split('/')[0];
  const shared = files.every(file => file.path.includes('/') && file.path.split('/')[0] === first);
  if (!shared) return files;
  return files.map(file => ({ ...file, path: file.path.slice(first.length + 1) }));
}

function toTextFile(path: string, bytes: Uint8Array): SnapshotFile | null {
  if (path === '' || path.endsWith('/') || isBinary(bytes)) return null;
  return { path, content: strFromU8(bytes) };
}

function decodeZip(bytes: Uint8Array, budget: SizeBudget): SnapshotFile[] {
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(bytes, {
      filter: file => {
        budget.charge(file.originalSize);
        return true;
      },
    });
  } catch (error) {
    if (error instanceof FetchError) throw error;
    throw new FetchError('unsupportedFormat', 'Corrupt ZIP archive', { cause: String(error) });
  }

  const files: SnapshotFile[] = [];
  for (const [name, data] of Object.entries(entries)) {
    const file = toTextFile(normalizeEntryPath(name), data);
    if (file) files.push(file);
  }
  return files;
}

function gunzipBounded(bytes: Uint8Array, budget: SizeBudget): Uint8Array {
  const chunks: Uint8Array[] = [];
  let total = 0;
  const gunzip = new Gunzip(chunk => {
    budget.charge(chunk.length);
    chunks.push(chunk);
    total += chunk.length;
  });

  try {
    gunzip.push(bytes, true);
  } catch (error) {
    if (error instanceof FetchError) throw error;
    throw new FetchError('unsupportedFormat', 'Corrupt gzip stream', { cause: String(error) });
  }

  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

async function decodeTar(bytes: Uint8Array): Promise<SnapshotFile[]> {
  const files: SnapshotFile[] = [];
  const extractor = tarExtract();

  await new Promise<void>((resolve, reject) => {
    extractor.on('entry', (header: Headers, stream, next) => {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('end', () => {
        try {
          if (header.type === 'file' || header.type === 'contiguous-file') {
            const file = toTextFile(normalizeEntryPath(header.name), Buffer.concat(chunks));
            if (file) files.push(file);
          }
          next();
        } catch (error) {
          extractor.destroy(error instanceof Error ? error : new Error(String(error)));
        }
      });
      stream.resume();
    });
    extractor.on('finish', resolve);
    extractor.on('error', reject);
    Readable.from([Buffer.from(bytes)]).pipe(extractor);
  }).catch((error: unknown) => {
    if (error instanceof FetchError) throw error;
    throw new FetchError('unsupportedFormat', 'Corrupt tar archive', { cause: String(error) });
  });

  return files;
}

function decodeText(bytes: Uint8Array, fileName: string, budget: SizeBudget): SnapshotFile[] {
  budget.charge(bytes.length);
  const known = TEXT_EXTENSIONS.some(ext => fileName.toLowerCase().endsWith(ext));
  if (!known || isBinary(bytes)) {
    throw new FetchError('unsupportedFormat', `Unsupported module payload: ${fileName || '(unnamed)'}`, {
      fileName,
    });
  }
  return [{ path: fileName, content: strFromU8(bytes) }];
}

/**
 * Decode a downloaded payload into text files. Binary archive members are
 * left out; the caller sorts and re-roots the result.
 */
export async function decodePayload(bytes: Uint8Array, options: DecodeOptions): Promise<SnapshotFile[]> {
  const budget = new SizeBudget(options.maxBytes);
  const format = detectFormat(bytes);

  switch (format) {
    case 'zip':
      return stripCommonRoot(decodeZip(bytes, budget));
    case 'tar.gz': {
      const tar = gunzipBounded(bytes, budget);
      if (!isTar(tar)) {
        throw new FetchError('unsupportedFormat', 'gzip payload is not a tar archive', { fileName: options.fileName });
      }
      return stripCommonRoot(await decodeTar(tar));
    }
    case 'text':
      return decodeText(bytes, options.fileName, budget);
  }
}
