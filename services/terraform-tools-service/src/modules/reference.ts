/**
 * Module reference parsing
 *
 * Accepts registry addresses (`namespace/name/provider`, optionally prefixed
 * by the public registry host), HTTP(S) URLs and GitHub source addresses,
 * each optionally followed by a `//sub/dir` selector.
 */

import { ValidationError } from '@tfguard/shared-utils';
import { FetchError, SERVICE_NAME } from '../errors';
import type { ModuleReference } from './types';

const REGISTRY_HOST = 'registry.terraform.io/';
const REGISTRY_PATTERN = /^([A-Za-z0-9][A-Za-z0-9_-]{0,63})\/([A-Za-z0-9][A-Za-z0-9_-]{0,63})\/([a-z0-9]{1,64})$/;
const VERSION_PATTERN = /^v?\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?$/;
const GITHUB_PATTERN = /^(?:https:\/\/)?github\.com\/([\w.-]+)\/([\w.-]+?)(?:\.git)?$/;

/**
 * Split `address//sub/dir?query` into the address (query kept) and the
 * subdirectory. The `//` of a URL scheme is not a selector.
 */
export function splitSubdir(address: string): { address: string; subdir?: string } {
  const queryIndex = address.indexOf('?');
  const path = queryIndex === -1 ? address : address.slice(0, queryIndex);
  const query = queryIndex === -1 ? '' : address.slice(queryIndex);

  const schemeIndex = path.indexOf('://');
  const searchFrom = schemeIndex === -1 ? 0 : schemeIndex + 3;
  const selector = path.indexOf('//', searchFrom);
  if (selector === -1) {
    return { address };
  }

  const subdir = path.slice(selector + 2).replace(/^\/+|\/+$/g, '');
  return { address: path.slice(0, selector) + query, subdir: subdir || undefined };
}

function assertSafeSubdir(subdir: string | undefined, input: string): void {
  if (subdir === undefined) return;
  if (subdir.split('/').some(segment => segment === '..' || segment === '')) {
    throw new ValidationError(`Invalid module subdirectory in ${input}`, SERVICE_NAME, { subdir });
  }
}

/**
 * Turn a GitHub source into a downloadable zip archive URL, or return null
 */
export function githubArchiveUrl(address: string): string | null {
  const withoutGit = address.startsWith('git::') ? address.slice('git::'.length) : address;
  const queryIndex = withoutGit.indexOf('?');
  const base = queryIndex === -1 ? withoutGit : withoutGit.slice(0, queryIndex);
  const params = new URLSearchParams(queryIndex === -1 ? '' : withoutGit.slice(queryIndex + 1));

  const match = GITHUB_PATTERN.exec(base);
  if (!match) return null;

  const [, owner, repo] = match;
  const ref = params.get('ref') ?? 'HEAD';
  return `https://github.com/${owner}/${repo}/archive/${encodeURIComponent(ref)}.zip`;
}

/**
 * Resolve a Terraform source address (as found in a registry download
 * response) to a URL this service can download.
 */
export function resolveSourceAddress(address: string): { url: string; subdir?: string } {
  const split = splitSubdir(address.trim());

  const github = githubArchiveUrl(split.address);
  if (github) {
    return { url: github, subdir: split.subdir };
  }

  if (/^https?:\/\//.test(split.address)) {
    return { url: split.address, subdir: split.subdir };
  }

  throw new FetchError('unsupportedFormat', `Unsupported module source address: ${address}`, {
    source: address,
  });
}

export function parseModuleReference(input: string, version?: string): ModuleReference {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new ValidationError('Module reference must not be empty', SERVICE_NAME);
  }

  const { address, subdir } = splitSubdir(trimmed);
  assertSafeSubdir(subdir, trimmed);

  const registryAddress = address.startsWith(REGISTRY_HOST) ? address.slice(REGISTRY_HOST.length) : address;
  const registryMatch = REGISTRY_PATTERN.exec(registryAddress);
  if (registryMatch) {
    if (version !== undefined && !VERSION_PATTERN.test(version)) {
      throw new ValidationError(
        `Invalid module version "${version}": an exact version such as 1.2.3 is required`,
        SERVICE_NAME,
        { version }
      );
    }
    const [, namespace, name, provider] = registryMatch;
    return {
      kind: 'registry',
      namespace,
      name,
      provider,
      version: version?.replace(/^v/, ''),
      subdir,
    };
  }

  if (version !== undefined) {
    throw new ValidationError('A version can only be given for registry modules', SERVICE_NAME, {
      module: trimmed,
    });
  }

  const github = githubArchiveUrl(address);
  if (github) {
    return { kind: 'url', url: github, subdir };
  }

  if (/^https?:\/\//.test(address)) {
    try {
      new URL(address);
    } catch {
      throw new ValidationError(`Invalid module URL: ${address}`, SERVICE_NAME);
    }
    return { kind: 'url', url: address, subdir };
  }

  throw new ValidationError(
    `Invalid module reference "${trimmed}". Use namespace/name/provider or an http(s) URL.`,
    SERVICE_NAME,
    { module: trimmed }
  );
}

/** Stable key for a reference; also the display name in reports */
export function canonicalReference(ref: ModuleReference): string {
  const base =
    ref.kind === 'registry'
      ? `${ref.namespace}/${ref.name}/${ref.provider}${ref.version ? `@${ref.version}` : ''}`
      : ref.url;
  return ref.subdir ? `${base}//${ref.subdir}` : base;
}
