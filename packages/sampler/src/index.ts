export * from "./types.js";
export * from "./select.js";
export * from "./random.js";
export * from "./orchestrator.js";
export * from "./sample.js";
