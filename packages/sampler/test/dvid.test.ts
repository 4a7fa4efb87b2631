import { describe, expect, it, vi } from "vitest";
import { LabelNotFoundError, InvalidDensityError, encodeBlockKey } from "@bodysample/core";
import type { FetchLike } from "@bodysample/dvid-client";
import { encodeLabelIndex } from "@bodysample/label-index";
import { encodeRles } from "@bodysample/loaders-rles";
import { parseLabelId, sample, sampleWithReport } from "../src/index.js";
import { blockVoxels, runsOf } from "./fixtures.js";

const a = blockVoxels({ x: 0, y: 0, z: 0 }, 6, 2);
const b = blockVoxels({ x: 0, y: 1, z: 0 }, 4);

function dvidStub(): FetchLike {
  return vi.fn(async (url: string) => {
    const parsed = new URL(url);
    if (parsed.pathname === "/api/node/abc123/segmentation/index/42") {
      const body = encodeLabelIndex({
        label: 42n,
        blocks: new Map([
          [encodeBlockKey({ x: 0, y: 0, z: 0 }), new Map([[1n, 2], [2n, 4]])],
          [encodeBlockKey({ x: 0, y: 1, z: 0 }), new Map([[1n, 4]])]
        ])
      });
      return new Response(body, { status: 200 });
    }
    if (parsed.pathname === "/api/node/abc123/segmentation/sparsevol/42") {
      const miny = Number(parsed.searchParams.get("miny"));
      return new Response(encodeRles(runsOf(miny === 0 ? a : b)), { status: 200 });
    }
    return new Response("not found", { status: 404 });
  });
}

describe("sample", () => {
  it("samples a label end to end through the DVID client", async () => {
    const fetch = dvidStub();
    const points = await sample({ server: "test-server", uuid: "abc123", labelId: 42, density: 1, fetch });
    expect(points).toEqual([...a, ...b]);
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it("reports what was fetched", async () => {
    const { report } = await sampleWithReport({
      server: "http://test-server/",
      uuid: "abc123",
      labelId: "42",
      density: 0.5,
      fetch: dvidStub()
    });
    expect(report.stats.totalVoxels).toBe(10);
    expect(report.stats.points).toBe(5);
    expect(report.stats.blocksFetched + report.stats.blocksSkipped).toBe(2);
  });

  it("surfaces an unknown label", async () => {
    await expect(
      sample({ server: "test-server", uuid: "abc123", labelId: 99n, density: 0.5, fetch: dvidStub() })
    ).rejects.toBeInstanceOf(LabelNotFoundError);
  });

  it("rejects a bad density before any request", async () => {
    const fetch = dvidStub();
    await expect(sample({ server: "test-server", uuid: "abc123", labelId: 42, density: 2, fetch })).rejects.toBeInstanceOf(
      InvalidDensityError
    );
    expect(fetch).not.toHaveBeenCalled();
  });
});

describe("parseLabelId", () => {
  it("accepts integers in any form", () => {
    expect(parseLabelId(42)).toBe(42n);
    expect(parseLabelId(" 18446744073709551615 ")).toBe(18446744073709551615n);
    expect(parseLabelId(7n)).toBe(7n);
  });

  it("rejects negatives and non-integers", () => {
    expect(() => parseLabelId(-1)).toThrow(RangeError);
    expect(() => parseLabelId(1.5)).toThrow(RangeError);
    expect(() => parseLabelId("12a")).toThrow(RangeError);
    expect(() => parseLabelId(-3n)).toThrow(RangeError);
  });
});
