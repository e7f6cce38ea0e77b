/**
 * GCP knowledge catalog: provider resource listings, resource documentation
 * and security recommendations, kept as JSON beside this file and rendered
 * to markdown on request.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { NotFoundError } from '@tfguard/shared-utils';
import { SERVICE_NAME } from '../errors';

export const IMPACT_LEVELS = ['HIGH', 'MEDIUM', 'LOW'] as const;

export type ImpactLevel = (typeof IMPACT_LEVELS)[number];

const providerResourceSchema = z.object({
  name: z.string(),
  description: z.string(),
  documentationUrl: z.string().url(),
});

const resourceDocumentationSchema = z.object({
  arguments: z.array(
    z.object({
      name: z.string(),
      type: z.string(),
      required: z.boolean(),
      description: z.string(),
    })
  ),
  example: z.string(),
});

const providerCatalogSchema = z.object({
  services: z.record(z.array(providerResourceSchema)),
  documentation: z.record(resourceDocumentationSchema),
});

const recommendationSchema = z.object({
  id: z.string(),
  title: z.string(),
  impact: z.enum(IMPACT_LEVELS),
  description: z.string(),
  example: z.string(),
  remediation: z.string(),
  compliance: z.array(z.string()),
});

export type ProviderResource = z.infer<typeof providerResourceSchema>;
export type ProviderCatalog = z.infer<typeof providerCatalogSchema>;
export type SecurityRecommendation = z.infer<typeof recommendationSchema>;

async function readData<S extends z.ZodTypeAny>(file: string, schema: S): Promise<z.output<S>> {
  const text = await readFile(new URL(`./${file}`, import.meta.url), 'utf-8');
  return schema.parse(JSON.parse(text));
}

export function loadProviderCatalog(): Promise<ProviderCatalog> {
  return readData('gcp-provider-resources.json', providerCatalogSchema);
}

export function loadSecurityRecommendations(): Promise<SecurityRecommendation[]> {
  return readData('gcp-security-recommendations.json', z.array(recommendationSchema));
}

export function formatProviderResources(catalog: ProviderCatalog, service?: string): string {
  let services = Object.entries(catalog.services);
  if (service !== undefined) {
    const wanted = service.toLowerCase();
    services = services.filter(([name]) => name === wanted);
    if (services.length === 0) {
      const known = Object.keys(catalog.services);
      throw new NotFoundError(`Unknown GCP service: ${service}. Known services: ${known.join(', ')}`, SERVICE_NAME, {
        service,
        known,
      });
    }
  }

  const out = ['# GCP Terraform Provider Resources', ''];
  for (const [name, resources] of services) {
    out.push(`## ${name}`, '');
    for (const resource of resources) {
      out.push(`- **${resource.name}**: ${resource.description} [Documentation](${resource.documentationUrl})`);
    }
    out.push('');
  }
  return out.join('\n').trimEnd();
}

export function findProviderResource(catalog: ProviderCatalog, name: string): ProviderResource | undefined {
  for (const resources of Object.values(catalog.services)) {
    const found = resources.find(resource => resource.name === name);
    if (found) return found;
  }
  return undefined;
}

/**
 * Argument reference and example where the catalog documents the resource,
 * otherwise the listing entry and its link
 */
export function formatResourceDocumentation(catalog: ProviderCatalog, name: string): string {
  const resource = findProviderResource(catalog, name);
  if (!resource) {
    throw new NotFoundError(`No documentation for resource: ${name}`, SERVICE_NAME, { resource: name });
  }

  const out = [`# ${resource.name}`, '', resource.description, ''];
  const documentation = catalog.documentation[name];
  if (documentation) {
    out.push('## Arguments', '');
    for (const argument of documentation.arguments) {
      const presence = argument.required ? 'Required' : 'Optional';
      out.push(`- **${argument.name}** (${presence}, ${argument.type}): ${argument.description}`);
    }
    out.push('', '## Example', '', '```hcl', documentation.example, '```', '');
  }
  out.push(`Documentation: ${resource.documentationUrl}`);
  return out.join('\n');
}

export function formatSecurityRecommendations(
  recommendations: readonly SecurityRecommendation[],
  impact?: ImpactLevel
): string {
  const selected = impact ? recommendations.filter(rec => rec.impact === impact) : recommendations;
  if (selected.length === 0) {
    return `No security recommendations with impact ${impact ?? 'any'}.`;
  }

  const out = ['# GCP Security Recommendations', ''];
  for (const rec of selected) {
    out.push(
      `## ${rec.id}: ${rec.title}`,
      '',
      `**Impact:** ${rec.impact}`,
      '',
      rec.description,
      '',
      '```hcl',
      rec.example,
      '```',
      '',
      `**Remediation:** ${rec.remediation}`,
      '',
      `**Compliance:** ${rec.compliance.join(', ')}`,
      ''
    );
  }
  return out.join('\n').trimEnd();
}

/** `## ` headings of a markdown document */
export function sectionTitles(markdown: string): string[] {
  return markdown
    .split('\n')
    .filter(line => line.startsWith('## '))
    .map(line => line.slice(3).trim());
}

/**
 * The document title followed by the one `## ` section whose heading matches
 * `category`, ignoring case
 */
export function selectSection(markdown: string, category: string): string {
  const lines = markdown.split('\n');
  const start = lines.findIndex(line => line.startsWith('## ') && line.slice(3).trim().toLowerCase() === category.toLowerCase());
  if (start === -1) {
    const known = sectionTitles(markdown);
    throw new NotFoundError(`Unknown category: ${category}. Categories: ${known.join(', ')}`, SERVICE_NAME, {
      category,
      known,
    });
  }

  const next = lines.findIndex((line, index) => index > start && line.startsWith('## '));
  const section = lines.slice(start, next === -1 ? lines.length : next);
  const title = lines.find(line => line.startsWith('# '));
  return [...(title ? [title, ''] : []), ...section].join('\n').trimEnd();
}
