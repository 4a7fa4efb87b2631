import {
  BlockFetchError,
  MalformedBlockDataError,
  blockOrigin,
  isSamplerError,
  voxelCoordinate,
  type Point
} from "@bodysample/core";
import type { BlockCount, LabelBlockIndex } from "@bodysample/label-index";
import { iterateBlockSpans } from "@bodysample/loaders-rles";
import type { BlockWalkStats } from "./types.js";

export type FetchBlock = (entry: BlockCount) => Promise<Uint8Array>;

export interface BlockWalkOptions {
  verifyCounts?: boolean;
  signal?: AbortSignal;
}

export interface BlockWalkResult {
  points: Point[];
  stats: BlockWalkStats;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// A caller abort surfaces as the signal's reason, whether it lands mid-fetch or between blocks.
async function fetchGuarded(fetchBlock: FetchBlock, entry: BlockCount, signal?: AbortSignal): Promise<Uint8Array> {
  try {
    return await fetchBlock(entry);
  } catch (error) {
    signal?.throwIfAborted();
    if (isSamplerError(error)) throw error;
    throw new BlockFetchError(entry.block, messageOf(error), { cause: error });
  }
}

/**
 * Maps ordinals [first, last), all inside this block's cursor range, to coordinates by
 * walking the block's spans once. Returns the number of spans decoded.
 */
function resolveBlock(
  payload: Uint8Array,
  entry: BlockCount,
  cursor: number,
  ordinals: readonly number[],
  first: number,
  last: number,
  verifyCounts: boolean,
  out: Point[]
): number {
  const origin = blockOrigin(entry.block);
  let seen = 0;
  let spans = 0;
  let next = first;

  for (const span of iterateBlockSpans(payload, entry.block)) {
    spans++;
    while (next < last && ordinals[next] - cursor < seen + span.length) {
      out.push(voxelCoordinate(origin, span.start + (ordinals[next] - cursor - seen)));
      next++;
    }
    seen += span.length;
    if (next === last && !verifyCounts) break;
  }

  if (next < last) {
    throw new MalformedBlockDataError(
      `BLOCK_SHORT: index declares ${entry.count} voxels, spans hold ${seen}`,
      entry.block
    );
  }
  if (verifyCounts && seen !== entry.count) {
    throw new MalformedBlockDataError(
      `BLOCK_COUNT_MISMATCH: index declares ${entry.count} voxels, spans hold ${seen}`,
      entry.block
    );
  }
  return spans;
}

/**
 * Walks blocks in key order with a running global cursor. Blocks whose cursor range holds
 * no ordinal are skipped without a fetch. Any failure aborts the whole walk.
 */
export async function sampleBlocks(
  index: LabelBlockIndex,
  ordinals: readonly number[],
  fetchBlock: FetchBlock,
  options: BlockWalkOptions = {}
): Promise<BlockWalkResult> {
  const verifyCounts = options.verifyCounts ?? true;
  const points: Point[] = [];
  const stats: BlockWalkStats = {
    blocksTotal: index.blocks.length,
    blocksFetched: 0,
    blocksSkipped: 0,
    spansDecoded: 0
  };

  let cursor = 0;
  let next = 0;
  for (const entry of index.blocks) {
    if (next >= ordinals.length) break;
    const end = cursor + entry.count;
    if (ordinals[next] >= end) {
      cursor = end;
      continue;
    }

    options.signal?.throwIfAborted();
    const first = next;
    while (next < ordinals.length && ordinals[next] < end) next++;

    const payload = await fetchGuarded(fetchBlock, entry, options.signal);
    stats.blocksFetched++;
    try {
      stats.spansDecoded += resolveBlock(payload, entry, cursor, ordinals, first, next, verifyCounts, points);
    } catch (error) {
      if (error instanceof MalformedBlockDataError && error.block === undefined) {
        throw new MalformedBlockDataError(error.message, entry.block);
      }
      throw error;
    }
    cursor = end;
  }

  if (next < ordinals.length) {
    throw new RangeError(`Ordinal ${ordinals[next]} lies beyond the label's ${cursor} voxels`);
  }
  stats.blocksSkipped = stats.blocksTotal - stats.blocksFetched;
  return { points, stats };
}
