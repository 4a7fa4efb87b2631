import { createHash } from "node:crypto";
import type { Point, PointCloudHashResult } from "./types.js";

export function comparePoints(a: Point, b: Point): number {
  // z-major, then y, then x
  if (a.z !== b.z) return a.z - b.z;
  if (a.y !== b.y) return a.y - b.y;
  return a.x - b.x;
}

export function sortPoints(points: readonly Point[]): Point[] {
  return [...points].sort(comparePoints);
}

// Canonical bytes store each coordinate as an i32.
function assertInt32Points(points: readonly Point[]): void {
  for (const p of points) {
    for (const v of [p.x, p.y, p.z]) {
      if (!Number.isInteger(v) || v < -0x80000000 || v > 0x7fffffff) {
        throw new RangeError(`Point (${p.x},${p.y},${p.z}) is not an i32 voxel coordinate`);
      }
    }
  }
}

function writeI32LE(target: number[], value: number): void {
  const u = value >>> 0;
  target.push(u & 0xff, (u >>> 8) & 0xff, (u >>> 16) & 0xff, (u >>> 24) & 0xff);
}

export function encodeCanonicalBytes(points: readonly Point[]): Uint8Array {
  assertInt32Points(points);
  const bytes: number[] = [];

  // Magic BS01
  bytes.push(0x42, 0x53, 0x30, 0x31);
  writeI32LE(bytes, points.length);
  for (const p of sortPoints(points)) {
    writeI32LE(bytes, p.x);
    writeI32LE(bytes, p.y);
    writeI32LE(bytes, p.z);
  }

  return Uint8Array.from(bytes);
}

/** Fingerprint of a point cloud's content; independent of emission order. */
export function hashPointCloud(points: readonly Point[]): PointCloudHashResult {
  const canonicalBytes = encodeCanonicalBytes(points);
  const sha256 = createHash("sha256").update(canonicalBytes).digest("hex");
  return { sha256, canonicalBytes };
}
