export interface Point {
  x: number;
  y: number;
  z: number;
}

/** Signed block indices; one unit is one 64³ block. */
export interface BlockCoordinate {
  x: number;
  y: number;
  z: number;
}

export type PointCloud = Point[];

/** Contiguous same-label voxels inside one block's local linear index. */
export interface RunLengthSpan {
  start: number;
  length: number;
}

export interface PointCloudHashResult {
  sha256: string;
  canonicalBytes: Uint8Array;
}
