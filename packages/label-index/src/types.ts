import type { BlockCoordinate } from "@bodysample/core";

/** Supervoxel id → voxel count inside one block. */
export type SupervoxelCounts = ReadonlyMap<bigint, number>;

/** Packed block key → supervoxel counts for that block. */
export type LabelIndexCounts = ReadonlyMap<bigint, SupervoxelCounts>;

export interface LabelIndexData {
  blocks: LabelIndexCounts;
  label?: bigint;
  lastMutId?: bigint;
  lastModTime?: string;
  lastModUser?: string;
  lastModApp?: string;
}

export interface LabelIndexMessage extends LabelIndexData {
  label: bigint;
  lastMutId: bigint;
  lastModTime: string;
  lastModUser: string;
  lastModApp: string;
}

export interface BlockCount {
  key: bigint;
  block: BlockCoordinate;
  count: number;
}

export interface LabelBlockIndex {
  /** Blocks holding at least one voxel of the label, by key ascending. */
  blocks: readonly BlockCount[];
  totalVoxels: number;
}
