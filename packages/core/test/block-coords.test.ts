import { describe, expect, it } from "vitest";
import fc from "fast-check";
import {
  BLOCK_VOXELS,
  blockOfVoxel,
  blockOrigin,
  compareBlockKeys,
  decodeBlockKey,
  encodeBlockKey,
  localOffset,
  voxelCoordinate
} from "../src/index.js";

describe("decodeBlockKey", () => {
  it("reads x, y and z from the low, middle and high fields", () => {
    expect(decodeBlockKey(0n)).toEqual({ x: 0, y: 0, z: 0 });
    expect(decodeBlockKey(42n)).toEqual({ x: 42, y: 0, z: 0 });
    expect(decodeBlockKey(42n << 21n)).toEqual({ x: 0, y: 42, z: 0 });
    expect(decodeBlockKey(42n << 42n)).toEqual({ x: 0, y: 0, z: 42 });
    expect(decodeBlockKey((5n << 42n) | (10n << 21n) | 15n)).toEqual({ x: 15, y: 10, z: 5 });
  });

  it("treats the top bit of each field as a sign flag", () => {
    expect(decodeBlockKey(0x100001n)).toEqual({ x: -1, y: 0, z: 0 });
    expect(decodeBlockKey(0x100003n << 21n)).toEqual({ x: 0, y: -3, z: 0 });
    expect(decodeBlockKey(0x1fffffn)).toEqual({ x: -1048575, y: 0, z: 0 });
    expect(decodeBlockKey(0x100000n)).toEqual({ x: 0, y: 0, z: 0 });
  });

  it("rejects keys outside the uint64 range", () => {
    expect(() => decodeBlockKey(-1n)).toThrow(RangeError);
    expect(() => decodeBlockKey(1n << 64n)).toThrow(RangeError);
  });
});

describe("encodeBlockKey", () => {
  it("packs negative indices with the sign flag", () => {
    expect(encodeBlockKey({ x: -1, y: 0, z: 0 })).toBe(0x100001n);
    expect(encodeBlockKey({ x: 15, y: 10, z: 5 })).toBe((5n << 42n) | (10n << 21n) | 15n);
  });

  it("rejects magnitudes that do not fit in 20 bits", () => {
    expect(() => encodeBlockKey({ x: 1 << 20, y: 0, z: 0 })).toThrow(RangeError);
    expect(() => encodeBlockKey({ x: 0, y: 0.5, z: 0 })).toThrow(RangeError);
  });

  it("property: decode inverts encode within the 21-bit range", () => {
    const axis = fc.integer({ min: -1048575, max: 1048575 });
    fc.assert(
      fc.property(axis, axis, axis, (x, y, z) => {
        const decoded = decodeBlockKey(encodeBlockKey({ x, y, z }));
        return decoded.x === x && decoded.y === y && decoded.z === z;
      })
    );
  });

  it("round-trips boundary values", () => {
    for (const block of [
      { x: 1048575, y: 1048575, z: 1048575 },
      { x: -1048575, y: -1048575, z: -1048575 },
      { x: 0, y: -1, z: 1 }
    ]) {
      expect(decodeBlockKey(encodeBlockKey(block))).toEqual(block);
    }
  });
});

describe("compareBlockKeys", () => {
  it("orders keys as unsigned integers", () => {
    const keys = [1n << 63n, 5n, 0n, 42n << 21n];
    expect([...keys].sort(compareBlockKeys)).toEqual([0n, 5n, 42n << 21n, 1n << 63n]);
  });
});

describe("voxelCoordinate", () => {
  const origin = blockOrigin({ x: 1, y: 2, z: -1 });

  it("places the block origin at 64 voxels per block index", () => {
    expect(origin).toEqual({ x: 64, y: 128, z: -64 });
  });

  it("varies x fastest, then y, then z", () => {
    expect(voxelCoordinate(origin, 0)).toEqual({ x: 64, y: 128, z: -64 });
    expect(voxelCoordinate(origin, 1)).toEqual({ x: 65, y: 128, z: -64 });
    expect(voxelCoordinate(origin, 64)).toEqual({ x: 64, y: 129, z: -64 });
    expect(voxelCoordinate(origin, 4096)).toEqual({ x: 64, y: 128, z: -63 });
    expect(voxelCoordinate(origin, BLOCK_VOXELS - 1)).toEqual({ x: 127, y: 191, z: -1 });
  });

  it("rejects offsets outside the block", () => {
    expect(() => voxelCoordinate(origin, BLOCK_VOXELS)).toThrow(RangeError);
    expect(() => voxelCoordinate(origin, -1)).toThrow(RangeError);
  });

  it("is inverted by localOffset", () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: BLOCK_VOXELS - 1 }), (offset) => {
        return localOffset(origin, voxelCoordinate(origin, offset)) === offset;
      })
    );
    expect(localOffset(origin, { x: 63, y: 128, z: -64 })).toBe(-1);
  });

  it("maps voxels back to their block", () => {
    expect(blockOfVoxel({ x: 127, y: 191, z: -1 })).toEqual({ x: 1, y: 2, z: -1 });
    expect(blockOfVoxel({ x: 0, y: 63, z: -64 })).toEqual({ x: 0, y: 0, z: -1 });
  });
});
