/**
 * Remediation Engine
 *
 * Maps findings to byte-range patches on the original files, applies them,
 * and re-scans the patched files exactly once. Conditions that only affect
 * one finding end up in `skippedFindings`; nothing here retries or recurses.
 */

import { ConfigurationError, logger } from '@tfguard/shared-utils';
import { SERVICE_NAME } from '../errors';
import { utf8Offsets } from '../modules/hcl-scanner';
import { withWorkspace, writeSnapshotFiles } from '../modules/snapshot';
import type { DeclarationBlock, FileSnapshot, ModuleModel, SnapshotFile } from '../modules/types';
import { compareFindings, type Finding, type PolicyScanner, type ResourceRef } from '../scan/types';
import type { TerraformValidateResult } from '../terraform/operations';
import { applyPatches, overlaps } from './patches';
import { STRATEGIES, STRATEGY_TABLE_VERSION, planEdit, type StrategyTable } from './strategies';
import type { Patch, RemediationOptions, RemediationResult, SkipReason, SkippedFinding } from './types';

/** Validates a configuration directory; backed by `terraform validate` */
export type ConfigValidator = (dir: string, signal?: AbortSignal) => Promise<TerraformValidateResult>;

export interface RemediationEngineOptions {
  strategies?: StrategyTable;
  strategyTableVersion?: string;
  disabledChecks?: Iterable<string>;
  validator?: ConfigValidator;
}

/**
 * `module.net.google_compute_subnetwork.main["a"]` →
 * `{ kind: 'resource', type: 'google_compute_subnetwork', name: 'main' }`
 */
export function parseResourceAddress(address: string): { kind: 'resource' | 'data'; type: string; name: string } | null {
  let rest = address.trim();
  for (;;) {
    const moduleMatch = /^module\.[A-Za-z0-9_-]+(\[[^\]]*\])?\./.exec(rest);
    if (!moduleMatch) break;
    rest = rest.slice(moduleMatch[0].length);
  }
  rest = rest.replace(/\[[^\]]*\]$/, '');

  const kind = rest.startsWith('data.') ? 'data' : 'resource';
  if (kind === 'data') rest = rest.slice('data.'.length);

  const match = /^([A-Za-z0-9_-]+)\.([A-Za-z0-9_-]+)$/.exec(rest);
  return match ? { kind, type: match[1], name: match[2] } : null;
}

export function findBlock(blocks: readonly DeclarationBlock[], ref: ResourceRef): DeclarationBlock | undefined {
  const address = parseResourceAddress(ref.address);
  if (!address) return undefined;
  return blocks.find(
    block =>
      block.sourceFile === ref.file &&
      block.kind === address.kind &&
      block.typeName === address.type &&
      block.instanceName === address.name
  );
}

function toPatch(block: DeclarationBlock, edit: { start: number; end: number; text: string }, findingId: string): Patch {
  const toBytes = utf8Offsets(block.bodyText);
  return {
    targetFile: block.sourceFile,
    byteRange: {
      start: block.bodyRange.start + toBytes(edit.start),
      end: block.bodyRange.start + toBytes(edit.end),
    },
    replacementText: edit.text,
    originFindingId: findingId,
  };
}

/**
 * Instances of one `count`/`for_each` resource share a declaration block and
 * plan the same zero-width insertion, which `overlaps` alone lets through.
 */
function collides(accepted: Patch, candidate: Patch, acceptedCheckId: string | undefined, candidateCheckId: string): boolean {
  if (accepted.targetFile !== candidate.targetFile) return false;
  if (overlaps(accepted.byteRange, candidate.byteRange)) return true;
  const sameRange =
    accepted.byteRange.start === candidate.byteRange.start && accepted.byteRange.end === candidate.byteRange.end;
  if (sameRange && accepted.replacementText === candidate.replacementText) return true;
  const bothInsertions = accepted.byteRange.start === accepted.byteRange.end && candidate.byteRange.start === candidate.byteRange.end;
  return bothInsertions && sameRange && acceptedCheckId === candidateCheckId;
}

export class RemediationEngine {
  private strategies: StrategyTable;
  private strategyTableVersion: string;
  private disabledChecks: ReadonlySet<string>;
  private validator?: ConfigValidator;

  constructor(
    private scanner: PolicyScanner,
    options: RemediationEngineOptions = {}
  ) {
    this.strategies = options.strategies ?? STRATEGIES;
    this.strategyTableVersion = options.strategyTableVersion ?? STRATEGY_TABLE_VERSION;
    this.disabledChecks = new Set(options.disabledChecks ?? []);
    this.validator = options.validator;
  }

  /**
   * Patches for the findings, in acceptance order, plus the findings that
   * could not be patched. Pure: touches neither disk nor scanner.
   */
  plan(model: ModuleModel, findings: readonly Finding[]): { patches: Patch[]; skipped: SkippedFinding[] } {
    const patches: Patch[] = [];
    const skipped: SkippedFinding[] = [];
    const seen = new Set<string>();
    const checkIds = new Map<string, string>();

    const skip = (finding: Finding, reason: SkipReason) => {
      logger.debug('Skipping finding', { finding: finding.id, reason });
      skipped.push({ finding, reason });
    };

    for (const finding of [...findings].sort(compareFindings)) {
      if (seen.has(finding.id)) continue;
      seen.add(finding.id);

      const strategy = finding.fixable && !this.disabledChecks.has(finding.checkId) ? this.strategies[finding.checkId] : undefined;
      if (!strategy) {
        skip(finding, 'noStrategy');
        continue;
      }

      const block = findBlock(model.blocks, finding.resourceRef);
      if (!block) {
        skip(finding, 'blockNotFound');
        continue;
      }
      if (block.typeName === null || !strategy.resourceTypes.includes(block.typeName)) {
        skip(finding, 'noStrategy');
        continue;
      }

      const edit = planEdit(strategy, block);
      if (!edit) {
        skip(finding, 'alreadyCompliant');
        continue;
      }

      const patch = toPatch(block, edit, finding.id);
      if (patches.some(accepted => collides(accepted, patch, checkIds.get(accepted.originFindingId), finding.checkId))) {
        skip(finding, 'conflict');
        continue;
      }
      patches.push(patch);
      checkIds.set(patch.originFindingId, finding.checkId);
    }

    return { patches, skipped };
  }

  async remediate(
    model: ModuleModel,
    findings: readonly Finding[],
    snapshot: FileSnapshot,
    options: RemediationOptions = {}
  ): Promise<RemediationResult> {
    const { validator } = this;
    if (options.validate && !validator) {
      throw new ConfigurationError('Validation was requested but no validator is configured', SERVICE_NAME);
    }

    const { patches, skipped } = this.plan(model, findings);

    const byFile = new Map<string, Patch[]>();
    for (const patch of patches) {
      byFile.set(patch.targetFile, [...(byFile.get(patch.targetFile) ?? []), patch]);
    }

    const changedFiles: SnapshotFile[] = [];
    const files = snapshot.files.map(file => {
      const filePatches = byFile.get(file.path);
      if (!filePatches) return file;
      const patched = { path: file.path, content: applyPatches(file.content, filePatches) };
      changedFiles.push(patched);
      return patched;
    });

    logger.info('Remediation planned', {
      source: snapshot.source,
      patches: patches.length,
      skipped: skipped.length,
      changedFiles: changedFiles.length,
    });

    if (patches.length === 0 && !options.validate) {
      return {
        appliedPatches: [],
        skippedFindings: skipped,
        postScanFindings: [...findings],
        changedFiles: [],
        strategyTableVersion: this.strategyTableVersion,
      };
    }

    return withWorkspace('remediate', async dir => {
      await writeSnapshotFiles(dir, files);

      const postScanFindings =
        patches.length > 0
          ? (await this.scanner.scan(dir, { checks: options.checks, signal: options.signal })).findings
          : [...findings];

      let validation: TerraformValidateResult | undefined;
      if (options.validate && validator) {
        validation = await validator(dir, options.signal);
      }

      return {
        appliedPatches: patches,
        skippedFindings: skipped,
        postScanFindings,
        changedFiles,
        validation,
        strategyTableVersion: this.strategyTableVersion,
      };
    });
  }
}
