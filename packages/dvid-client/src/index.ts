import {
  BLOCK_SIZE,
  BlockFetchError,
  LabelIndexFetchError,
  LabelNotFoundError,
  blockOrigin,
  type BlockCoordinate
} from "@bodysample/core";
import { decodeLabelIndex, type LabelIndexMessage } from "@bodysample/label-index";

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export interface DvidClientOptions {
  server: string;
  uuid: string;
  instance?: string;
  /** Per-request timeout covering headers and body; 0 disables it. */
  timeoutMs?: number;
  fetch?: FetchLike;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

interface HttpResult {
  status: number;
  bytes: Uint8Array;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const DEFAULT_INSTANCE = "segmentation";
export const DEFAULT_TIMEOUT_MS = 60_000;

export function normalizeServer(server: string): string {
  const trimmed = server.trim();
  if (!trimmed) {
    throw new Error("DVID server address is empty.");
  }
  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  return withScheme.replace(/\/+$/, "");
}

export class DvidClient {
  public readonly server: string;
  public readonly uuid: string;
  public readonly instance: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly controller = new AbortController();
  private closed = false;

  public constructor(options: DvidClientOptions) {
    this.server = normalizeServer(options.server);
    this.uuid = options.uuid;
    this.instance = options.instance ?? DEFAULT_INSTANCE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    if (!this.uuid) {
      throw new Error("DVID node uuid is empty.");
    }
  }

  private nodeUrl(): string {
    return `${this.server}/api/node/${encodeURIComponent(this.uuid)}/${encodeURIComponent(this.instance)}`;
  }

  public labelIndexUrl(labelId: bigint): string {
    return `${this.nodeUrl()}/index/${labelId}`;
  }

  /** Sparse volume of one label restricted to the inclusive voxel bounds of one block. */
  public blockSparseVolUrl(labelId: bigint, block: BlockCoordinate): string {
    const origin = blockOrigin(block);
    const params = new URLSearchParams({
      format: "rles",
      minx: String(origin.x),
      maxx: String(origin.x + BLOCK_SIZE - 1),
      miny: String(origin.y),
      maxy: String(origin.y + BLOCK_SIZE - 1),
      minz: String(origin.z),
      maxz: String(origin.z + BLOCK_SIZE - 1)
    });
    return `${this.nodeUrl()}/sparsevol/${labelId}?${params.toString()}`;
  }

  public async getLabelIndex(labelId: bigint, options: RequestOptions = {}): Promise<LabelIndexMessage> {
    let result: HttpResult;
    try {
      result = await this.get(this.labelIndexUrl(labelId), options.signal);
    } catch (error) {
      options.signal?.throwIfAborted();
      throw new LabelIndexFetchError(labelId, messageOf(error), { cause: error });
    }
    if (result.status === 404) {
      throw new LabelNotFoundError(labelId);
    }
    if (result.status < 200 || result.status >= 300) {
      throw new LabelIndexFetchError(labelId, `HTTP ${result.status}`, { status: result.status });
    }
    return decodeLabelIndex(result.bytes);
  }

  public async getBlockPayload(
    labelId: bigint,
    block: BlockCoordinate,
    options: RequestOptions = {}
  ): Promise<Uint8Array> {
    let result: HttpResult;
    try {
      result = await this.get(this.blockSparseVolUrl(labelId, block), options.signal);
    } catch (error) {
      options.signal?.throwIfAborted();
      throw new BlockFetchError(block, messageOf(error), { cause: error });
    }
    if (result.status < 200 || result.status >= 300) {
      throw new BlockFetchError(block, `HTTP ${result.status}`, { status: result.status });
    }
    return result.bytes;
  }

  private async get(url: string, external?: AbortSignal): Promise<HttpResult> {
    if (this.closed) {
      throw new Error("DVID client is closed.");
    }

    const request = new AbortController();
    const forward = (signal: AbortSignal) => () => request.abort(signal.reason);
    const onClose = forward(this.controller.signal);
    const onExternal = external ? forward(external) : undefined;
    this.controller.signal.addEventListener("abort", onClose, { once: true });
    if (external && onExternal) {
      if (external.aborted) request.abort(external.reason);
      external.addEventListener("abort", onExternal, { once: true });
    }
    const timer =
      this.timeoutMs > 0
        ? setTimeout(() => request.abort(new Error(`Request timed out after ${this.timeoutMs} ms`)), this.timeoutMs)
        : undefined;

    try {
      const response = await this.fetchImpl(url, { signal: request.signal });
      const bytes = new Uint8Array(await response.arrayBuffer());
      return { status: response.status, bytes };
    } finally {
      clearTimeout(timer);
      this.controller.signal.removeEventListener("abort", onClose);
      if (external && onExternal) external.removeEventListener("abort", onExternal);
    }
  }

  /** Aborts in-flight requests; later requests fail. */
  public close(): void {
    if (this.closed) return;
    this.closed = true;
    this.controller.abort(new Error("DVID client closed."));
  }
}

export async function withDvidClient<T>(options: DvidClientOptions, fn: (client: DvidClient) => Promise<T>): Promise<T> {
  const client = new DvidClient(options);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
