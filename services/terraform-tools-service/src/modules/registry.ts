/**
 * Terraform module registry API client (`/v1/modules`).
 */

import { z } from 'zod';
import { logger } from '@tfguard/shared-utils';
import { FetchError } from '../errors';
import type { HttpClient } from './http';
import type { RegistryModuleSummary, RegistryReference } from './types';

export const DEFAULT_REGISTRY_URL = 'https://registry.terraform.io';

const moduleVersionSchema = z.object({
  version: z.string().min(1),
});

const searchResponseSchema = z.object({
  modules: z
    .array(
      z.object({
        id: z.string(),
        namespace: z.string(),
        name: z.string(),
        provider: z.string(),
        version: z.string(),
        description: z.string().nullish(),
        downloads: z.number().nullish(),
        source: z.string().nullish(),
        verified: z.boolean().nullish(),
      })
    )
    .default([]),
});

export interface SearchOptions {
  provider?: string;
  limit?: number;
  signal?: AbortSignal;
}

export class RegistryClient {
  private baseUrl: string;

  constructor(
    private http: HttpClient,
    baseUrl: string = DEFAULT_REGISTRY_URL
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  private modulePath(ref: RegistryReference): string {
    return `${this.baseUrl}/v1/modules/${ref.namespace}/${ref.name}/${ref.provider}`;
  }

  /**
   * Latest published version of a module
   */
  async latestVersion(ref: RegistryReference, signal?: AbortSignal): Promise<string> {
    const url = this.modulePath(ref);
    const parsed = moduleVersionSchema.safeParse(await this.http.getJson(url, { signal }));
    if (!parsed.success) {
      throw new FetchError('networkFailure', `Registry response for ${url} has no version`, { url });
    }
    return parsed.data.version;
  }

  /**
   * Source address of a module version, from the `X-Terraform-Get` header.
   * Relative addresses are resolved against the download endpoint.
   */
  async downloadLocation(ref: RegistryReference, version: string, signal?: AbortSignal): Promise<string> {
    const url = `${this.modulePath(ref)}/${encodeURIComponent(version)}/download`;
    const location = await this.http.request(url, { signal }, async response => response.headers.get('x-terraform-get'));

    if (!location) {
      throw new FetchError('networkFailure', `Registry did not return a download location for ${url}`, { url });
    }
    if (location.startsWith('/') || location.startsWith('./') || location.startsWith('../')) {
      return new URL(location, url).href;
    }
    return location;
  }

  async search(query: string, options: SearchOptions = {}): Promise<RegistryModuleSummary[]> {
    const params = new URLSearchParams({ q: query });
    if (options.provider) params.set('provider', options.provider);
    if (options.limit) params.set('limit', String(options.limit));

    const url = `${this.baseUrl}/v1/modules/search?${params.toString()}`;
    logger.info('Searching module registry', { query, provider: options.provider });

    const parsed = searchResponseSchema.safeParse(await this.http.getJson(url, { signal: options.signal }));
    if (!parsed.success) {
      throw new FetchError('networkFailure', 'Registry search returned an unexpected response', {
        url,
        issues: parsed.error.issues.map(issue => issue.message),
      });
    }

    return parsed.data.modules.map(module => ({
      id: module.id,
      namespace: module.namespace,
      name: module.name,
      provider: module.provider,
      version: module.version,
      description: module.description ?? '',
      downloads: module.downloads ?? 0,
      source: module.source ?? undefined,
      verified: module.verified ?? false,
    }));
  }
}
