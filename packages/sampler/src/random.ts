import type { RandomSource } from "./select.js";

export const MAX_SEED = 0xffffffff;

// mulberry32: small seeded PRNG for reproducible samples. Seeds are 32-bit.
export function mulberry32(seed: number): RandomSource {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new RangeError(`Seed must be an integer in [0, ${MAX_SEED}], got ${seed}`);
  }
  let a = seed | 0;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
