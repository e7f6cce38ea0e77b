/**
 * Byte-range patch application. Ranges always refer to the original file,
 * so patches are applied from the end of the file towards its start:
 * applying a later range first never shifts an earlier one.
 */

import type { ByteRange } from '../modules/types';
import type { Patch } from './types';

/** Touching ranges do not overlap; an insertion strictly inside a range does */
export function overlaps(a: ByteRange, b: ByteRange): boolean {
  return a.start < b.end && b.start < a.end;
}

export function applyPatch(content: Buffer, patch: Pick<Patch, 'byteRange' | 'replacementText'>): Buffer {
  const { start, end } = patch.byteRange;
  if (start < 0 || end < start || end > content.length) {
    throw new RangeError(`Patch range [${start}, ${end}) is outside a ${content.length}-byte file`);
  }
  return Buffer.concat([content.subarray(0, start), Buffer.from(patch.replacementText, 'utf8'), content.subarray(end)]);
}

/**
 * Apply non-overlapping patches to one file. `patches` is in acceptance
 * order; insertions at the same offset end up in that order.
 */
export function applyPatches(content: string, patches: readonly Patch[]): string {
  const ordered = patches
    .map((patch, index) => ({ patch, index }))
    .sort(
      (a, b) =>
        b.patch.byteRange.start - a.patch.byteRange.start ||
        b.patch.byteRange.end - a.patch.byteRange.end ||
        b.index - a.index
    );

  let buffer = Buffer.from(content, 'utf8');
  for (const { patch } of ordered) {
    buffer = applyPatch(buffer, patch);
  }
  return buffer.toString('utf8');
}
