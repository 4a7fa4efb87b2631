import { blockOrigin, encodeBlockKey, sortPoints, voxelCoordinate, type BlockCoordinate, type Point } from "@bodysample/core";
import type { LabelIndexData, SupervoxelCounts } from "@bodysample/label-index";
import { encodeRles, type RlesRun } from "@bodysample/loaders-rles";
import type { SparseVolumeSource } from "../src/index.js";

/** `count` voxels of a block taken every `stride` local offsets, in local order. */
export function blockVoxels(block: BlockCoordinate, count: number, stride = 1): Point[] {
  const origin = blockOrigin(block);
  return Array.from({ length: count }, (_, i) => voxelCoordinate(origin, i * stride));
}

export function pointKey(p: Point): string {
  return `${p.x},${p.y},${p.z}`;
}

export function runsOf(points: readonly Point[]): RlesRun[] {
  const runs: RlesRun[] = [];
  for (const p of sortPoints(points)) {
    const last = runs[runs.length - 1];
    if (last && last.y === p.y && last.z === p.z && last.x + last.length === p.x) {
      last.length++;
    } else {
      runs.push({ x: p.x, y: p.y, z: p.z, length: 1 });
    }
  }
  return runs;
}

export interface FakeBlock {
  block: BlockCoordinate;
  voxels: Point[];
  /** Count reported by the index when it should disagree with the voxels. */
  declaredCount?: number;
  fail?: boolean;
  corrupt?: boolean;
}

/** In-memory sparse-volume service holding one label. */
export class FakeVolume implements SparseVolumeSource {
  public readonly fetched: BlockCoordinate[] = [];
  private readonly byKey = new Map<bigint, FakeBlock>();

  public constructor(blocks: FakeBlock[]) {
    for (const b of blocks) {
      this.byKey.set(encodeBlockKey(b.block), b);
    }
  }

  public async getLabelIndex(labelId: bigint): Promise<LabelIndexData> {
    const blocks = new Map<bigint, SupervoxelCounts>();
    for (const [key, b] of this.byKey) {
      blocks.set(key, new Map([[labelId, b.declaredCount ?? b.voxels.length]]));
    }
    return { blocks, lastMutId: 3n, lastModUser: "tester" };
  }

  public async getBlockPayload(_labelId: bigint, block: BlockCoordinate): Promise<Uint8Array> {
    this.fetched.push(block);
    const b = this.byKey.get(encodeBlockKey(block));
    if (b?.fail) {
      throw new TypeError("socket hang up");
    }
    if (b?.corrupt) {
      return Uint8Array.from([0, 3, 0]);
    }
    return encodeRles(runsOf(b?.voxels ?? []));
  }
}
