import type { ByteRange, SnapshotFile } from '../modules/types';
import type { Finding } from '../scan/types';
import type { TerraformValidateResult } from '../terraform/operations';

export interface Patch {
  targetFile: string;
  /** UTF-8 byte range of the original file to replace; empty for insertions */
  byteRange: ByteRange;
  replacementText: string;
  originFindingId: string;
}

export type SkipReason = 'noStrategy' | 'conflict' | 'blockNotFound' | 'alreadyCompliant';

export interface SkippedFinding {
  finding: Finding;
  reason: SkipReason;
}

export interface RemediationResult {
  appliedPatches: Patch[];
  skippedFindings: SkippedFinding[];
  /** Findings of the single re-scan of the patched files */
  postScanFindings: Finding[];
  /** Full patched content of every file with at least one patch */
  changedFiles: SnapshotFile[];
  validation?: TerraformValidateResult;
  strategyTableVersion: string;
}

export interface RemediationOptions {
  signal?: AbortSignal;
  /** Run `terraform init -backend=false` and `terraform validate` on the patched files */
  validate?: boolean;
  /** Check ids the re-scan is restricted to */
  checks?: readonly string[];
}
