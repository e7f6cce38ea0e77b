/**
 * Source Fetcher
 *
 * Turns a ModuleReference into a FileSnapshot: registry references are
 * resolved to a source address, URLs are downloaded directly, and the
 * payload is decoded in memory. Nothing is retried.
 */

import { logger } from '@tfguard/shared-utils';
import { decodePayload } from './archive';
import type { ModuleCache } from './cache';
import type { HttpClient } from './http';
import { canonicalReference, resolveSourceAddress } from './reference';
import type { RegistryClient } from './registry';
import { selectSubdir, sortFiles } from './snapshot';
import type { FileSnapshot, ModuleReference, SnapshotFile } from './types';

export interface SourceFetcherOptions {
  http: HttpClient;
  registry: RegistryClient;
  cache?: ModuleCache;
}

export interface FetchOptions {
  signal?: AbortSignal;
}

function fileNameOf(url: string): string {
  try {
    const segments = new URL(url).pathname.split('/').filter(Boolean);
    return decodeURIComponent(segments[segments.length - 1] ?? '');
  } catch {
    return '';
  }
}

export class SourceFetcher {
  private http: HttpClient;
  private registry: RegistryClient;
  private cache?: ModuleCache;

  constructor(options: SourceFetcherOptions) {
    this.http = options.http;
    this.registry = options.registry;
    this.cache = options.cache;
  }

  async fetch(ref: ModuleReference, options: FetchOptions = {}): Promise<FileSnapshot> {
    // A "latest" lookup is never served from cache
    const cacheKey = ref.kind === 'url' || ref.version ? canonicalReference(ref) : undefined;
    const cached = cacheKey ? this.cache?.get(cacheKey) : undefined;
    if (cached) {
      logger.debug('Module cache hit', { module: cacheKey });
      return cached;
    }

    const snapshot = ref.kind === 'registry' ? await this.fetchRegistry(ref, options) : await this.fetchUrl(ref, options);

    if (cacheKey) {
      this.cache?.set(cacheKey, snapshot);
    }
    return snapshot;
  }

  private async fetchRegistry(
    ref: Extract<ModuleReference, { kind: 'registry' }>,
    options: FetchOptions
  ): Promise<FileSnapshot> {
    const version = ref.version ?? (await this.registry.latestVersion(ref, options.signal));
    const location = await this.registry.downloadLocation(ref, version, options.signal);
    const { url, subdir: packageSubdir } = resolveSourceAddress(location);

    let files = await this.download(url, options);
    if (packageSubdir) files = selectSubdir(files, packageSubdir, url);
    if (ref.subdir) files = selectSubdir(files, ref.subdir, url);

    return { source: canonicalReference({ ...ref, version }), version, files: sortFiles(files) };
  }

  private async fetchUrl(ref: Extract<ModuleReference, { kind: 'url' }>, options: FetchOptions): Promise<FileSnapshot> {
    let files = await this.download(ref.url, options);
    if (ref.subdir) files = selectSubdir(files, ref.subdir, ref.url);
    return { source: canonicalReference(ref), files: sortFiles(files) };
  }

  private async download(url: string, options: FetchOptions): Promise<SnapshotFile[]> {
    logger.info('Fetching module source', { url });
    const started = Date.now();

    const bytes = await this.http.download(url, { signal: options.signal });
    const files = await decodePayload(bytes, { fileName: fileNameOf(url), maxBytes: this.http.maxBytes });

    logger.info('Fetched module source', {
      url,
      bytes: bytes.length,
      files: files.length,
      durationMs: Date.now() - started,
    });
    return files;
  }
}
