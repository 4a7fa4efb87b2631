import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { hashPointCloud, type Point } from "@bodysample/core";
import type { SampleReport } from "@bodysample/sampler";
import type { OutputFormat } from "./config.js";

export type Triplet = [number, number, number];

/** Inclusive corners of the sampled points; null for an empty cloud. */
export interface PointCloudExtent {
  min: Triplet;
  max: Triplet;
}

export interface PointCloudDocument {
  label: string;
  density: number;
  count: number;
  sha256: string;
  bounds: PointCloudExtent | null;
  points: Triplet[];
}

export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true });
}

export function extentOf(points: readonly Point[]): PointCloudExtent | null {
  const [first, ...rest] = points;
  if (first === undefined) return null;
  const min: Triplet = [first.x, first.y, first.z];
  const max: Triplet = [first.x, first.y, first.z];
  for (const p of rest) {
    min[0] = Math.min(min[0], p.x);
    min[1] = Math.min(min[1], p.y);
    min[2] = Math.min(min[2], p.z);
    max[0] = Math.max(max[0], p.x);
    max[1] = Math.max(max[1], p.y);
    max[2] = Math.max(max[2], p.z);
  }
  return { min, max };
}

export function formatCsv(points: readonly Point[]): string {
  const lines = ["x,y,z"];
  for (const p of points) {
    lines.push(`${p.x},${p.y},${p.z}`);
  }
  return `${lines.join("\n")}\n`;
}

export function buildDocument(label: string, density: number, points: readonly Point[]): PointCloudDocument {
  return {
    label,
    density,
    count: points.length,
    sha256: hashPointCloud(points).sha256,
    bounds: extentOf(points),
    points: points.map((p): Triplet => [p.x, p.y, p.z])
  };
}

export function formatJson(label: string, density: number, points: readonly Point[]): string {
  return `${JSON.stringify(buildDocument(label, density, points))}\n`;
}

export function formatPoints(format: OutputFormat, label: string, density: number, points: readonly Point[]): string {
  return format === "json" ? formatJson(label, density, points) : formatCsv(points);
}

/** Writes to `out`, creating parent directories. Returns the resolved path. */
export function writeOutputFile(out: string, text: string): string {
  const path = resolve(out);
  ensureDir(dirname(path));
  writeFileSync(path, text, "utf8");
  return path;
}

export function summaryLine(report: SampleReport, sha256: string): string {
  const { stats } = report;
  return (
    `label ${report.labelId}: ${stats.points} points of ${stats.totalVoxels} voxels, ` +
    `blocks fetched=${stats.blocksFetched} skipped=${stats.blocksSkipped}, sha256=${sha256}`
  );
}
