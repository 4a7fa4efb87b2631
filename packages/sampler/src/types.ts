import type { BlockCoordinate, PointCloud } from "@bodysample/core";
import type { LabelIndexData } from "@bodysample/label-index";
import type { RandomSource } from "./select.js";

export type SamplingMode = "uniform";

export interface SourceRequestOptions {
  signal?: AbortSignal;
}

/** What the sampler needs from the sparse-volume service. */
export interface SparseVolumeSource {
  getLabelIndex(labelId: bigint, options?: SourceRequestOptions): Promise<LabelIndexData>;
  getBlockPayload(labelId: bigint, block: BlockCoordinate, options?: SourceRequestOptions): Promise<Uint8Array>;
}

export interface SampleOptions {
  mode?: SamplingMode;
  random?: RandomSource;
  /** Decode every span of a fetched block and require the index count to match. Default true. */
  verifyCounts?: boolean;
  signal?: AbortSignal;
}

export interface BlockWalkStats {
  blocksTotal: number;
  blocksFetched: number;
  blocksSkipped: number;
  spansDecoded: number;
}

export interface SampleReport {
  labelId: string;
  mode: SamplingMode;
  density: number;
  stats: BlockWalkStats & {
    totalVoxels: number;
    sampleSize: number;
    points: number;
  };
  labelIndex: {
    lastMutId: string | null;
    lastModTime: string | null;
    lastModUser: string | null;
    lastModApp: string | null;
  };
  timingMs: {
    index: number;
    select: number;
    blocks: number;
    total: number;
  };
}

export interface SampleResult {
  points: PointCloud;
  report: SampleReport;
}
