import {
  BLOCK_SIZE,
  MalformedBlockDataError,
  blockOrigin,
  localOffset,
  type BlockCoordinate,
  type RunLengthSpan
} from "@bodysample/core";

export const RLES_HEADER_BYTES = 12;
export const RLES_RUN_BYTES = 16;

export interface RlesHeader {
  payloadDescriptor: number;
  dimensions: number;
  runDimension: number;
  voxelCount: number;
  spanCount: number;
}

/** One run along X in absolute voxel coordinates. */
export interface RlesRun {
  x: number;
  y: number;
  z: number;
  length: number;
}

class Cursor {
  public offset = 0;
  public constructor(public readonly view: DataView) {}

  public ensure(size: number): void {
    if (this.offset + size > this.view.byteLength) {
      throw new MalformedBlockDataError(`RLES_TRUNCATED at offset=${this.offset}`);
    }
  }

  public u8(): number {
    this.ensure(1);
    const v = this.view.getUint8(this.offset);
    this.offset += 1;
    return v;
  }

  public u32(): number {
    this.ensure(4);
    const v = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return v;
  }

  public i32(): number {
    this.ensure(4);
    const v = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return v;
  }
}

function cursorOf(input: Uint8Array): Cursor {
  return new Cursor(new DataView(input.buffer, input.byteOffset, input.byteLength));
}

function readHeader(c: Cursor): RlesHeader {
  if (c.view.byteLength < RLES_HEADER_BYTES) {
    throw new MalformedBlockDataError(`RLES_TRUNCATED: header needs ${RLES_HEADER_BYTES} bytes, got ${c.view.byteLength}`);
  }
  const payloadDescriptor = c.u8();
  const dimensions = c.u8();
  const runDimension = c.u8();
  c.u8(); // reserved
  const voxelCount = c.u32();
  const spanCount = c.u32();

  if (payloadDescriptor !== 0) {
    throw new MalformedBlockDataError(`RLES_UNSUPPORTED_PAYLOAD_${payloadDescriptor}`);
  }
  if (dimensions !== 3) {
    throw new MalformedBlockDataError(`RLES_UNSUPPORTED_DIMENSIONS_${dimensions}`);
  }
  if (runDimension !== 0) {
    throw new MalformedBlockDataError(`RLES_UNSUPPORTED_RUN_DIMENSION_${runDimension}`);
  }
  const bodyBytes = c.view.byteLength - RLES_HEADER_BYTES;
  if (bodyBytes < spanCount * RLES_RUN_BYTES) {
    throw new MalformedBlockDataError(
      `RLES_TRUNCATED: header declares ${spanCount} spans, body holds ${bodyBytes} bytes`
    );
  }

  return { payloadDescriptor, dimensions, runDimension, voxelCount, spanCount };
}

export function readRlesHeader(input: Uint8Array): RlesHeader {
  return readHeader(cursorOf(input));
}

/**
 * Lazily yields the runs of an "rles" payload in wire order. The header and the body
 * length are validated before the first run is produced.
 */
export function* iterateRuns(input: Uint8Array): Generator<RlesRun, void, undefined> {
  const c = cursorOf(input);
  const header = readHeader(c);
  for (let i = 0; i < header.spanCount; i++) {
    const x = c.i32();
    const y = c.i32();
    const z = c.i32();
    const length = c.i32();
    if (length <= 0) {
      throw new MalformedBlockDataError(`RLES_NON_POSITIVE_RUN_LENGTH ${length} at span ${i}`);
    }
    yield { x, y, z, length };
  }
}

/**
 * Lazily yields the runs of one block's payload as spans of the block's local linear index
 * (X fastest). Spans must stay inside the block and strictly advance.
 */
export function* iterateBlockSpans(
  input: Uint8Array,
  block: BlockCoordinate
): Generator<RunLengthSpan, void, undefined> {
  const origin = blockOrigin(block);
  let previousEnd = 0;
  let index = 0;
  for (const run of iterateRuns(input)) {
    const start = localOffset(origin, run);
    if (start < 0) {
      throw new MalformedBlockDataError(`RLES_RUN_OUTSIDE_BLOCK at (${run.x},${run.y},${run.z})`, block);
    }
    if (run.x - origin.x + run.length > BLOCK_SIZE) {
      throw new MalformedBlockDataError(`RLES_RUN_CROSSES_BLOCK at (${run.x},${run.y},${run.z})`, block);
    }
    if (start < previousEnd) {
      throw new MalformedBlockDataError(`RLES_SPANS_OVERLAP_OR_UNORDERED at span ${index}`, block);
    }
    previousEnd = start + run.length;
    index++;
    yield { start, length: run.length };
  }
}

export function decodeBlockSpans(input: Uint8Array, block: BlockCoordinate): RunLengthSpan[] {
  return [...iterateBlockSpans(input, block)];
}

export function countRunVoxels(runs: Iterable<{ length: number }>): number {
  let total = 0;
  for (const run of runs) {
    total += run.length;
  }
  return total;
}

function writeU32LE(target: number[], value: number): void {
  target.push(value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff);
}

function writeI32LE(target: number[], value: number): void {
  writeU32LE(target, value >>> 0);
}

export function encodeRles(runs: readonly RlesRun[]): Uint8Array {
  const bytes: number[] = [0, 3, 0, 0];
  writeU32LE(bytes, countRunVoxels(runs));
  writeU32LE(bytes, runs.length);
  for (const run of runs) {
    writeI32LE(bytes, run.x);
    writeI32LE(bytes, run.y);
    writeI32LE(bytes, run.z);
    writeI32LE(bytes, run.length);
  }
  return Uint8Array.from(bytes);
}
