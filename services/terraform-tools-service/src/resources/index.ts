/**
 * Static knowledge resources, served by name. Guides are markdown files;
 * catalog resources are rendered from their JSON data.
 */

import { readFile } from 'node:fs/promises';
import {
  formatProviderResources,
  formatSecurityRecommendations,
  loadProviderCatalog,
  loadSecurityRecommendations,
} from './catalog';

export const RESOURCE_NAMES = [
  'workflow-guide',
  'gcp-best-practices',
  'gcp-provider-resources',
  'gcp-security-recommendations',
] as const;

export type ResourceName = (typeof RESOURCE_NAMES)[number];

export function isResourceName(name: string): name is ResourceName {
  return RESOURCE_NAMES.some(candidate => candidate === name);
}

export async function loadResource(name: ResourceName): Promise<string> {
  switch (name) {
    case 'workflow-guide':
    case 'gcp-best-practices':
      return readFile(new URL(`./${name}.md`, import.meta.url), 'utf-8');
    case 'gcp-provider-resources':
      return formatProviderResources(await loadProviderCatalog());
    case 'gcp-security-recommendations':
      return formatSecurityRecommendations(await loadSecurityRecommendations());
  }
}
