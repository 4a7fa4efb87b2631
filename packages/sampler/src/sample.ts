import {
  EmptyVolumeError,
  LabelIndexFetchError,
  UnsupportedSamplingModeError,
  isSamplerError,
  type PointCloud
} from "@bodysample/core";
import { withDvidClient, type FetchLike } from "@bodysample/dvid-client";
import { buildBlockIndex, type LabelBlockIndex, type LabelIndexData } from "@bodysample/label-index";
import { sampleBlocks } from "./orchestrator.js";
import { assertDensity, sampleSize, selectOrdinals, type RandomSource } from "./select.js";
import type { BlockWalkStats, SampleOptions, SampleReport, SampleResult, SamplingMode, SparseVolumeSource } from "./types.js";

export type OrdinalSelector = (total: number, density: number, random: RandomSource) => number[];

// New sampling strategies plug in here.
const SELECTORS = new Map<string, OrdinalSelector>([["uniform", selectOrdinals]]);

function selectorFor(mode: string): OrdinalSelector {
  const selector = SELECTORS.get(mode);
  if (!selector) {
    throw new UnsupportedSamplingModeError(mode);
  }
  return selector;
}

export function parseLabelId(value: bigint | number | string): bigint {
  if (typeof value === "bigint") {
    if (value < 0n) throw new RangeError(`Label id must be non-negative, got ${value}`);
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`Label id must be a non-negative integer, got ${value}`);
    }
    return BigInt(value);
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new RangeError(`Label id must be a non-negative integer, got "${value}"`);
  }
  return BigInt(trimmed);
}

function optionalString(value: bigint | string | undefined): string | null {
  return value === undefined ? null : String(value);
}

function buildReport(
  labelId: bigint,
  mode: SamplingMode,
  density: number,
  indexData: LabelIndexData | undefined,
  totals: { totalVoxels: number; sampleSize: number; points: number },
  stats: BlockWalkStats,
  timingMs: SampleReport["timingMs"]
): SampleReport {
  return {
    labelId: labelId.toString(),
    mode,
    density,
    stats: { ...totals, ...stats },
    labelIndex: {
      lastMutId: optionalString(indexData?.lastMutId),
      lastModTime: optionalString(indexData?.lastModTime),
      lastModUser: optionalString(indexData?.lastModUser),
      lastModApp: optionalString(indexData?.lastModApp)
    },
    timingMs
  };
}

/**
 * Samples a label through any {@link SparseVolumeSource}. A label without voxels yields an
 * empty cloud; every other failure rejects, so a resolved cloud always holds exactly
 * round(N * density) points.
 */
export async function sampleLabel(
  source: SparseVolumeSource,
  labelId: bigint,
  density: number,
  options: SampleOptions = {}
): Promise<SampleResult> {
  const t0 = Date.now();
  const mode = options.mode ?? "uniform";
  const select = selectorFor(mode);
  assertDensity(density);
  const signal = options.signal;

  let indexData: LabelIndexData;
  try {
    indexData = await source.getLabelIndex(labelId, { signal });
  } catch (error) {
    signal?.throwIfAborted();
    if (isSamplerError(error)) throw error;
    throw new LabelIndexFetchError(labelId, error instanceof Error ? error.message : String(error), { cause: error });
  }
  const indexMs = Date.now() - t0;

  let index: LabelBlockIndex;
  try {
    index = buildBlockIndex(indexData.blocks, labelId);
  } catch (error) {
    if (error instanceof EmptyVolumeError) {
      const stats: BlockWalkStats = { blocksTotal: 0, blocksFetched: 0, blocksSkipped: 0, spansDecoded: 0 };
      return {
        points: [],
        report: buildReport(labelId, mode, density, indexData, { totalVoxels: 0, sampleSize: 0, points: 0 }, stats, {
          index: indexMs,
          select: 0,
          blocks: 0,
          total: Date.now() - t0
        })
      };
    }
    throw error;
  }

  const selectStart = Date.now();
  const ordinals = select(index.totalVoxels, density, options.random ?? Math.random);
  const selectMs = Date.now() - selectStart;

  const blocksStart = Date.now();
  const { points, stats } = await sampleBlocks(
    index,
    ordinals,
    (entry) => source.getBlockPayload(labelId, entry.block, { signal }),
    { verifyCounts: options.verifyCounts, signal }
  );
  const blocksMs = Date.now() - blocksStart;

  return {
    points,
    report: buildReport(
      labelId,
      mode,
      density,
      indexData,
      { totalVoxels: index.totalVoxels, sampleSize: sampleSize(index.totalVoxels, density), points: points.length },
      stats,
      { index: indexMs, select: selectMs, blocks: blocksMs, total: Date.now() - t0 }
    )
  };
}

export interface SampleRequest extends SampleOptions {
  server: string;
  uuid: string;
  instance?: string;
  labelId: bigint | number | string;
  density: number;
  timeoutMs?: number;
  fetch?: FetchLike;
}

/** Samples a label straight from a DVID server; the client lives only for this call. */
export async function sampleWithReport(request: SampleRequest): Promise<SampleResult> {
  const labelId = parseLabelId(request.labelId);
  return withDvidClient(
    {
      server: request.server,
      uuid: request.uuid,
      instance: request.instance,
      timeoutMs: request.timeoutMs,
      fetch: request.fetch
    },
    (client) => sampleLabel(client, labelId, request.density, request)
  );
}

export async function sample(request: SampleRequest): Promise<PointCloud> {
  const result = await sampleWithReport(request);
  return result.points;
}
