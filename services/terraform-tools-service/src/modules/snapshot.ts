/**
 * Snapshot helpers: ordering, subdirectory selection, loading a directory
 * from disk and materializing files into a scoped temporary workspace.
 */

import { mkdir, mkdtemp, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { logger } from '@tfguard/shared-utils';
import { FetchError } from '../errors';
import { isBinary } from './archive';
import type { FileSnapshot, SnapshotFile } from './types';

const SKIPPED_DIRECTORIES = new Set(['.terraform', '.git', 'node_modules']);

export function sortFiles(files: readonly SnapshotFile[]): SnapshotFile[] {
  return [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

/**
 * Keep the files under `subdir`, with paths relative to it
 */
export function selectSubdir(files: readonly SnapshotFile[], subdir: string, source: string): SnapshotFile[] {
  const prefix = `${subdir.replace(/^\/+|\/+$/g, '')}/`;
  const selected = files
    .filter(file => file.path.startsWith(prefix))
    .map(file => ({ path: file.path.slice(prefix.length), content: file.content }));

  if (selected.length === 0) {
    throw new FetchError('notFound', `Subdirectory "${subdir}" not found in ${source}`, { source, subdir });
  }
  return selected;
}

export async function loadDirectorySnapshot(dir: string, options: { maxBytes: number }): Promise<FileSnapshot> {
  const root = path.resolve(dir);
  const info = await stat(root).catch(() => null);
  if (!info?.isDirectory()) {
    throw new FetchError('notFound', `Directory not found: ${dir}`, { directory: dir });
  }

  const files: SnapshotFile[] = [];
  let total = 0;

  const walk = async (current: string): Promise<void> => {
    const entries = await readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const absolute = path.join(current, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) await walk(absolute);
        continue;
      }
      if (!entry.isFile()) continue;

      const bytes = await readFile(absolute);
      total += bytes.length;
      if (total > options.maxBytes) {
        throw new FetchError('tooLarge', `Directory ${dir} exceeds ${options.maxBytes} bytes`, {
          directory: dir,
          maxBytes: options.maxBytes,
        });
      }
      if (isBinary(bytes)) continue;

      files.push({
        path: path.relative(root, absolute).split(path.sep).join('/'),
        content: bytes.toString('utf8'),
      });
    }
  };

  await walk(root);
  logger.debug('Loaded directory snapshot', { directory: root, files: files.length, bytes: total });
  return { source: root, files: sortFiles(files) };
}

export async function writeSnapshotFiles(dir: string, files: readonly SnapshotFile[]): Promise<void> {
  for (const file of files) {
    const target = path.join(dir, ...file.path.split('/'));
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, file.content, 'utf8');
  }
}

/**
 * Run `fn` inside a fresh temporary directory that is removed afterwards,
 * whether `fn` succeeds, throws or is cancelled.
 */
export async function withWorkspace<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), `tfguard-${prefix}-`));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
