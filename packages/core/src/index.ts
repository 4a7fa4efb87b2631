export * from "./types.js";
export * from "./errors.js";
export * from "./block-coords.js";
export * from "./hash.js";
