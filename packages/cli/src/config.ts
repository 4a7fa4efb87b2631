import { readFileSync } from "node:fs";
import YAML from "js-yaml";
import minimist from "minimist";
import { MAX_SEED } from "@bodysample/sampler";

export type OutputFormat = "csv" | "json";

export interface SampleConfig {
  server: string;
  uuid: string;
  instance: string;
  density: number;
  seed?: number;
  timeoutMs: number;
  format: OutputFormat;
  out?: string;
  verifyCounts: boolean;
}

export type PartialSampleConfig = Partial<SampleConfig>;

export const DEFAULT_CONFIG: Pick<SampleConfig, "instance" | "format" | "timeoutMs" | "verifyCounts"> = {
  instance: "segmentation",
  format: "csv",
  timeoutMs: 60_000,
  verifyCounts: true
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asString(key: string, value: unknown): string {
  if (typeof value === "number") return String(value);
  if (typeof value !== "string" || !value.trim()) {
    throw new Error(`Config "${key}" must be a non-empty string.`);
  }
  return value.trim();
}

function asNumber(key: string, value: unknown): number {
  const n = typeof value === "string" && value.trim() ? Number(value) : value;
  if (typeof n !== "number" || !Number.isFinite(n)) {
    throw new Error(`Config "${key}" must be a number, got ${JSON.stringify(value)}.`);
  }
  return n;
}

function asInteger(key: string, value: unknown, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const n = asNumber(key, value);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new Error(`Config "${key}" must be an integer in [${min}, ${max}], got ${n}.`);
  }
  return n;
}

function asBoolean(key: string, value: unknown): boolean {
  if (value === true || value === "true") return true;
  if (value === false || value === "false") return false;
  throw new Error(`Config "${key}" must be true or false, got ${JSON.stringify(value)}.`);
}

function asFormat(value: unknown): OutputFormat {
  if (value === "csv" || value === "json") return value;
  throw new Error(`Config "format" must be csv or json, got ${JSON.stringify(value)}.`);
}

function setEntry(out: PartialSampleConfig, key: string, value: unknown): void {
  switch (key) {
    case "server":
    case "uuid":
    case "instance":
    case "out":
      out[key] = asString(key, value);
      return;
    case "density":
      out.density = asNumber(key, value);
      return;
    case "seed":
      out.seed = asInteger(key, value, 0, MAX_SEED);
      return;
    case "timeoutMs":
      out.timeoutMs = asInteger(key, value, 0);
      return;
    case "format":
      out.format = asFormat(value);
      return;
    case "verifyCounts":
      out.verifyCounts = asBoolean(key, value);
      return;
    default:
      throw new Error(`Unknown config key "${key}".`);
  }
}

export function parseConfigDocument(raw: string): PartialSampleConfig {
  const parsed = YAML.load(raw);
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new Error("Config file must hold a mapping of keys to values.");
  }
  const out: PartialSampleConfig = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (value === null) continue;
    setEntry(out, key, value);
  }
  return out;
}

export function loadConfigFile(path: string): PartialSampleConfig {
  return parseConfigDocument(readFileSync(path, "utf8"));
}

// Repeated flags arrive as arrays; the last one wins.
function lastFlag(value: unknown): unknown {
  return Array.isArray(value) ? value[value.length - 1] : value;
}

const FLAG_KEYS: Record<string, string> = {
  server: "server",
  uuid: "uuid",
  instance: "instance",
  density: "density",
  seed: "seed",
  "timeout-ms": "timeoutMs",
  format: "format",
  out: "out",
  "verify-counts": "verifyCounts"
};

export function parseArgv(args: string[]): minimist.ParsedArgs {
  return minimist(args, {
    boolean: ["verbose", "help"],
    string: ["_", "server", "uuid", "instance", "density", "seed", "format", "out", "config", "timeout-ms"],
    alias: { h: "help" }
  });
}

export function configFromArgv(argv: minimist.ParsedArgs): PartialSampleConfig {
  const out: PartialSampleConfig = {};
  for (const [flag, key] of Object.entries(FLAG_KEYS)) {
    const value = lastFlag(argv[flag]);
    if (value === undefined) continue;
    setEntry(out, key, value);
  }
  return out;
}

/** Flags win over the config file, the file wins over the defaults. */
export function resolveConfig(file: PartialSampleConfig, flags: PartialSampleConfig): SampleConfig {
  const merged: PartialSampleConfig = { ...DEFAULT_CONFIG };
  for (const layer of [file, flags]) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) setEntry(merged, key, value);
    }
  }

  const { server, uuid, density } = merged;
  if (server === undefined) throw new Error('Config "server" is required (--server or config file).');
  if (uuid === undefined) throw new Error('Config "uuid" is required (--uuid or config file).');
  if (density === undefined) throw new Error('Config "density" is required (--density or config file).');

  return {
    server,
    uuid,
    instance: merged.instance ?? DEFAULT_CONFIG.instance,
    density,
    seed: merged.seed,
    timeoutMs: merged.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    format: merged.format ?? DEFAULT_CONFIG.format,
    out: merged.out,
    verifyCounts: merged.verifyCounts ?? DEFAULT_CONFIG.verifyCounts
  };
}
