import type { BlockCoordinate } from "./types.js";

export type SamplerErrorCode =
  | "INVALID_DENSITY"
  | "EMPTY_VOLUME"
  | "BLOCK_FETCH_FAILED"
  | "MALFORMED_BLOCK_DATA"
  | "LABEL_NOT_FOUND"
  | "LABEL_INDEX_FETCH_FAILED"
  | "UNSUPPORTED_MODE";

export class SamplerError extends Error {
  public readonly code: SamplerErrorCode;

  public constructor(code: SamplerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidDensityError extends SamplerError {
  public constructor(public readonly density: number) {
    super("INVALID_DENSITY", `Density must be in (0, 1], got ${density}`);
  }
}

/** Raised when a label has no voxels. Callers of the sampler see an empty cloud instead. */
export class EmptyVolumeError extends SamplerError {
  public constructor(public readonly labelId?: bigint) {
    super("EMPTY_VOLUME", labelId === undefined ? "Label has no voxels" : `Label ${labelId} has no voxels`);
  }
}

export class BlockFetchError extends SamplerError {
  public constructor(
    public readonly block: BlockCoordinate,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super("BLOCK_FETCH_FAILED", `Block (${block.x},${block.y},${block.z}): ${message}`, options);
    this.status = options?.status;
  }

  public readonly status: number | undefined;
}

export class MalformedBlockDataError extends SamplerError {
  public constructor(message: string, public readonly block?: BlockCoordinate) {
    super(
      "MALFORMED_BLOCK_DATA",
      block === undefined ? message : `Block (${block.x},${block.y},${block.z}): ${message}`
    );
  }
}

export class LabelNotFoundError extends SamplerError {
  public constructor(public readonly labelId: bigint) {
    super("LABEL_NOT_FOUND", `Label ${labelId} not found`);
  }
}

export class LabelIndexFetchError extends SamplerError {
  public constructor(
    public readonly labelId: bigint,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super("LABEL_INDEX_FETCH_FAILED", `Label ${labelId} index: ${message}`, options);
    this.status = options?.status;
  }

  public readonly status: number | undefined;
}

export class UnsupportedSamplingModeError extends SamplerError {
  public constructor(public readonly mode: string) {
    super("UNSUPPORTED_MODE", `Unsupported sampling mode: ${mode}`);
  }
}

export function isSamplerError(value: unknown): value is SamplerError {
  return value instanceof SamplerError;
}
