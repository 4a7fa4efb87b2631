import type { BlockCoordinate, Point } from "./types.js";

export const BLOCK_SIZE = 64;
export const BLOCK_VOXELS = BLOCK_SIZE * BLOCK_SIZE * BLOCK_SIZE;

const FIELD_BITS = 21n;
const FIELD_MASK = (1n << FIELD_BITS) - 1n;
const SIGN_BIT = 1n << (FIELD_BITS - 1n);
const MAGNITUDE_MASK = SIGN_BIT - 1n;
const MAX_MAGNITUDE = Number(MAGNITUDE_MASK);
const MAX_KEY = (1n << 64n) - 1n;

function decodeField(bits: bigint): number {
  const magnitude = Number(bits & MAGNITUDE_MASK);
  return (bits & SIGN_BIT) !== 0n && magnitude !== 0 ? -magnitude : magnitude;
}

function encodeField(value: number, axis: string): bigint {
  if (!Number.isInteger(value) || Math.abs(value) > MAX_MAGNITUDE) {
    throw new RangeError(`Block ${axis} index out of range: ${value}`);
  }
  const magnitude = BigInt(Math.abs(value));
  // -0 and 0 both pack as a plain zero
  return value < 0 ? magnitude | SIGN_BIT : magnitude;
}

/**
 * Unpacks a label-index block key. X occupies bits 0-20, Y bits 21-41 and Z bits 42-62.
 * Each field is sign-magnitude: bit 20 of the field is the sign, bits 0-19 the magnitude.
 */
export function decodeBlockKey(key: bigint): BlockCoordinate {
  if (key < 0n || key > MAX_KEY) {
    throw new RangeError(`Block key outside uint64 range: ${key}`);
  }
  return {
    x: decodeField(key & FIELD_MASK),
    y: decodeField((key >> FIELD_BITS) & FIELD_MASK),
    z: decodeField((key >> (2n * FIELD_BITS)) & FIELD_MASK)
  };
}

export function encodeBlockKey(block: BlockCoordinate): bigint {
  return (
    encodeField(block.x, "x") |
    (encodeField(block.y, "y") << FIELD_BITS) |
    (encodeField(block.z, "z") << (2n * FIELD_BITS))
  );
}

export function compareBlockKeys(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function blockOrigin(block: BlockCoordinate): Point {
  return {
    x: block.x * BLOCK_SIZE,
    y: block.y * BLOCK_SIZE,
    z: block.z * BLOCK_SIZE
  };
}

export function blockOfVoxel(point: Point): BlockCoordinate {
  return {
    x: Math.floor(point.x / BLOCK_SIZE),
    y: Math.floor(point.y / BLOCK_SIZE),
    z: Math.floor(point.z / BLOCK_SIZE)
  };
}

// Local linear order inside a block: X fastest, then Y, then Z.
export function voxelCoordinate(origin: Point, localOffset: number): Point {
  if (!Number.isInteger(localOffset) || localOffset < 0 || localOffset >= BLOCK_VOXELS) {
    throw new RangeError(`Local voxel offset out of range: ${localOffset}`);
  }
  const lx = localOffset % BLOCK_SIZE;
  const ly = Math.floor(localOffset / BLOCK_SIZE) % BLOCK_SIZE;
  const lz = Math.floor(localOffset / (BLOCK_SIZE * BLOCK_SIZE));
  return { x: origin.x + lx, y: origin.y + ly, z: origin.z + lz };
}

/** Inverse of {@link voxelCoordinate}; returns -1 when the point lies outside the block. */
export function localOffset(origin: Point, point: Point): number {
  const lx = point.x - origin.x;
  const ly = point.y - origin.y;
  const lz = point.z - origin.z;
  if (lx < 0 || ly < 0 || lz < 0 || lx >= BLOCK_SIZE || ly >= BLOCK_SIZE || lz >= BLOCK_SIZE) {
    return -1;
  }
  return (lz * BLOCK_SIZE + ly) * BLOCK_SIZE + lx;
}
