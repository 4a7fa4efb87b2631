import { describe, expect, it } from "vitest";
import { MalformedBlockDataError, encodeBlockKey } from "@bodysample/core";
import { buildBlockIndex, decodeLabelIndex, encodeLabelIndex } from "../src/index.js";

describe("decodeLabelIndex", () => {
  it("reads blocks, supervoxel counts and metadata", () => {
    const key = encodeBlockKey({ x: 2, y: -1, z: 5 });
    const bytes = encodeLabelIndex({
      label: 42n,
      lastMutId: 7n,
      lastModTime: "2025-01-01T00:00:00Z",
      lastModUser: "test_user",
      lastModApp: "test_app",
      blocks: new Map([[key, new Map([[100n, 30], [101n, 12]])]])
    });

    const decoded = decodeLabelIndex(bytes);
    expect(decoded.label).toBe(42n);
    expect(decoded.lastMutId).toBe(7n);
    expect(decoded.lastModTime).toBe("2025-01-01T00:00:00Z");
    expect(decoded.lastModUser).toBe("test_user");
    expect(decoded.lastModApp).toBe("test_app");
    expect(decoded.blocks.get(key)?.get(100n)).toBe(30);
    expect(decoded.blocks.get(key)?.get(101n)).toBe(12);
    expect(buildBlockIndex(decoded.blocks).totalVoxels).toBe(42);
  });

  it("keeps 64-bit keys exact", () => {
    const key = encodeBlockKey({ x: -1048575, y: 1048575, z: -1048575 });
    const supervoxel = (1n << 62n) + 12345n;
    const decoded = decodeLabelIndex(
      encodeLabelIndex({ label: 1n, blocks: new Map([[key, new Map([[supervoxel, 9]])]]) })
    );
    expect([...decoded.blocks.keys()]).toEqual([key]);
    expect([...(decoded.blocks.get(key)?.keys() ?? [])]).toEqual([supervoxel]);
  });

  it("fills defaults for an empty message", () => {
    const decoded = decodeLabelIndex(new Uint8Array(0));
    expect(decoded.blocks.size).toBe(0);
    expect(decoded.label).toBe(0n);
    expect(decoded.lastModUser).toBe("");
  });

  it("rejects truncated bytes", () => {
    expect(() => decodeLabelIndex(Uint8Array.from([0x0a, 0x05]))).toThrow(MalformedBlockDataError);
  });
});
