#!/usr/bin/env node
import { resolve } from "node:path";
import { hashPointCloud, isSamplerError } from "@bodysample/core";
import { mulberry32, sampleWithReport } from "@bodysample/sampler";
import { configFromArgv, loadConfigFile, parseArgv, resolveConfig } from "./config.js";
import { formatPoints, summaryLine, writeOutputFile } from "./output.js";

function printHelp(): void {
  console.log(`bodysample

Usage:
  npm run cli -- sample <label> --server <host:port> --uuid <node> --density 0.01
  npm run cli -- help

Options:
  --server <url>           DVID server address (http:// is assumed when missing)
  --uuid <uuid>            Version node to read from
  --instance <name>        Labelmap instance (default: segmentation)
  --density <d>            Fraction of the label's voxels to keep, in (0, 1]
  --seed <n>               Seed for reproducible samples
  --format <fmt>           csv | json (default: csv)
  --out <file>             Write points to a file instead of stdout
  --config <file>          YAML file supplying any of the options above
  --timeout-ms <n>         Per-request timeout, 0 disables it (default: 60000)
  --no-verify-counts       Stop decoding a block once its sampled voxels are found
  --verbose                Print the sampling report to stderr
`);
}

function log(message: string): void {
  console.error(`[bodysample] ${message}`);
}

async function run(): Promise<void> {
  const argv = parseArgv(process.argv.slice(2));

  const command = argv._[0];
  if (!command || command === "help" || argv.help) {
    printHelp();
    return;
  }
  if (command !== "sample") {
    throw new Error(`Unknown command: ${command}`);
  }

  const label = argv._[1];
  if (!label) {
    throw new Error("Missing label argument.");
  }

  const configPath: unknown = argv.config;
  const fileConfig = typeof configPath === "string" && configPath ? loadConfigFile(resolve(configPath)) : {};
  const config = resolveConfig(fileConfig, configFromArgv(argv));

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort(new Error("Interrupted.")));

  const { points, report } = await sampleWithReport({
    server: config.server,
    uuid: config.uuid,
    instance: config.instance,
    labelId: label,
    density: config.density,
    timeoutMs: config.timeoutMs,
    verifyCounts: config.verifyCounts,
    random: config.seed === undefined ? undefined : mulberry32(config.seed),
    signal: controller.signal
  });

  const text = formatPoints(config.format, report.labelId, config.density, points);
  if (config.out) {
    log(`wrote ${writeOutputFile(config.out, text)}`);
  } else {
    process.stdout.write(text);
  }

  log(summaryLine(report, hashPointCloud(points).sha256));
  if (argv.verbose) {
    console.error(JSON.stringify(report, null, 2));
  }
}

run().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  log(isSamplerError(error) ? `${error.code}: ${message}` : message);
  if (error instanceof Error && typeof error.stack === "string" && error.stack.trim()) {
    console.error(error.stack);
  }
  process.exit(1);
});
