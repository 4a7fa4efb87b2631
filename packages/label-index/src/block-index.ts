import {
  BLOCK_VOXELS,
  EmptyVolumeError,
  MalformedBlockDataError,
  compareBlockKeys,
  decodeBlockKey
} from "@bodysample/core";
import type { BlockCount, LabelBlockIndex, LabelIndexCounts } from "./types.js";

const MAX_U32 = 0xffffffff;

/**
 * Collapses supervoxel counts to one count per block and orders blocks by key. The order
 * fixes the global voxel enumeration the sampler draws ordinals from.
 */
export function buildBlockIndex(counts: LabelIndexCounts, labelId?: bigint): LabelBlockIndex {
  const blocks: BlockCount[] = [];
  let totalVoxels = 0;

  for (const [key, supervoxels] of counts) {
    let count = 0;
    for (const [supervoxel, svCount] of supervoxels) {
      if (!Number.isInteger(svCount) || svCount < 0 || svCount > MAX_U32) {
        throw new MalformedBlockDataError(`INDEX_BAD_COUNT ${svCount} for supervoxel ${supervoxel} in block key ${key}`);
      }
      count += svCount;
    }
    if (count === 0) continue;

    const block = decodeBlockKey(key);
    if (count > BLOCK_VOXELS) {
      throw new MalformedBlockDataError(`INDEX_BLOCK_OVERFULL ${count} voxels`, block);
    }
    blocks.push({ key, block, count });
    totalVoxels += count;
  }

  if (totalVoxels === 0) {
    throw new EmptyVolumeError(labelId);
  }
  if (!Number.isSafeInteger(totalVoxels)) {
    throw new MalformedBlockDataError(`INDEX_TOTAL_TOO_LARGE ${totalVoxels}`);
  }

  blocks.sort((a, b) => compareBlockKeys(a.key, b.key));
  return { blocks: Object.freeze(blocks), totalVoxels };
}
