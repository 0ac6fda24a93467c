// Padding reconciler — absorbs the size change of a rewritten VORBIS_COMMENT
// block into the PADDING block that directly follows it.
//
// delta = newTagLength - oldTagLength. A shrinking tag block grows the padding;
// a growing one eats into it as long as there is room. Without room the padding
// passes unchanged and the header region grows by delta.

import { BlockType, MAX_BLOCK_LENGTH, withLength, type BlockHeader } from "../block-header.js";

export interface PaddingReconciliation {
  readonly header: BlockHeader;
  /** False when the padding could not absorb delta and passes as-is. */
  readonly changed: boolean;
}

export function reconcilePadding(padding: BlockHeader, delta: number): PaddingReconciliation {
  if (padding.type !== BlockType.PADDING) {
    throw new RangeError(`reconcilePadding expects a PADDING header, got type ${padding.type}`);
  }
  const length = padding.length - delta;
  if (delta === 0 || length < 0 || length > MAX_BLOCK_LENGTH) {
    return { header: padding, changed: false };
  }
  return { header: withLength(padding, length), changed: true };
}
