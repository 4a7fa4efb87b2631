export * from "./types.js";
export * from "./block-index.js";
export * from "./codec.js";
