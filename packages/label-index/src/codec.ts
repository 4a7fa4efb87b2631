import { fileURLToPath } from "node:url";
import protobuf from "protobufjs";
import { MalformedBlockDataError } from "@bodysample/core";
import type { LabelIndexCounts, LabelIndexMessage, SupervoxelCounts } from "./types.js";

const PROTO_PATH = fileURLToPath(new URL("../proto/labelindex.proto", import.meta.url));
const root = protobuf.loadSync(PROTO_PATH);
const LabelIndexType = root.lookupType("labelindex.LabelIndex");

const CONVERSION: protobuf.IConversionOptions = {
  longs: String,
  defaults: true,
  arrays: true
};

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function entriesOf(value: unknown, field: string): PlainObject[] {
  if (!Array.isArray(value)) {
    throw new MalformedBlockDataError(`INDEX_FIELD_NOT_REPEATED ${field}`);
  }
  return value.filter(isPlainObject);
}

function uint64Of(value: unknown, field: string): bigint {
  if (typeof value === "string" && /^\d+$/.test(value)) return BigInt(value);
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) return BigInt(value);
  throw new MalformedBlockDataError(`INDEX_BAD_UINT64 ${field}=${String(value)}`);
}

function stringOf(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function readSupervoxelCounts(value: unknown): SupervoxelCounts {
  const counts = new Map<bigint, number>();
  if (!isPlainObject(value)) return counts;
  for (const entry of entriesOf(value.counts, "counts")) {
    const count = entry.value;
    if (typeof count !== "number") {
      throw new MalformedBlockDataError(`INDEX_BAD_UINT32 counts.value=${String(count)}`);
    }
    counts.set(uint64Of(entry.key, "counts.key"), count);
  }
  return counts;
}

export function decodeLabelIndex(input: Uint8Array): LabelIndexMessage {
  let decoded: PlainObject;
  try {
    decoded = LabelIndexType.toObject(LabelIndexType.decode(input), CONVERSION);
  } catch (error) {
    throw new MalformedBlockDataError(`INDEX_UNDECODABLE: ${error instanceof Error ? error.message : String(error)}`);
  }

  const blocks = new Map<bigint, SupervoxelCounts>();
  for (const entry of entriesOf(decoded.blocks, "blocks")) {
    blocks.set(uint64Of(entry.key, "blocks.key"), readSupervoxelCounts(entry.value));
  }

  return {
    blocks,
    label: uint64Of(decoded.label, "label"),
    lastMutId: uint64Of(decoded.lastMutId, "lastMutId"),
    lastModTime: stringOf(decoded.lastModTime),
    lastModUser: stringOf(decoded.lastModUser),
    lastModApp: stringOf(decoded.lastModApp)
  };
}

export interface EncodeLabelIndexInput {
  blocks: LabelIndexCounts;
  label: bigint;
  lastMutId?: bigint;
  lastModTime?: string;
  lastModUser?: string;
  lastModApp?: string;
}

export function encodeLabelIndex(input: EncodeLabelIndexInput): Uint8Array {
  const blocks = [...input.blocks].map(([key, supervoxels]) => ({
    key: key.toString(),
    value: {
      counts: [...supervoxels].map(([sv, count]) => ({ key: sv.toString(), value: count }))
    }
  }));
  const message = LabelIndexType.fromObject({
    blocks,
    label: input.label.toString(),
    lastMutId: (input.lastMutId ?? 0n).toString(),
    lastModTime: input.lastModTime ?? "",
    lastModUser: input.lastModUser ?? "",
    lastModApp: input.lastModApp ?? ""
  });
  return LabelIndexType.encode(message).finish();
}
