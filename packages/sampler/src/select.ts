import { InvalidDensityError } from "@bodysample/core";

export type RandomSource = () => number;

/** Above this fraction of N the selector switches from rejection to a partial shuffle. */
export const REJECTION_MAX_FRACTION = 1 / 8;

export function assertDensity(density: number): void {
  if (!(density > 0 && density <= 1)) {
    throw new InvalidDensityError(density);
  }
}

export function sampleSize(total: number, density: number): number {
  assertDensity(density);
  if (!Number.isSafeInteger(total) || total < 0) {
    throw new RangeError(`Total voxel count must be a non-negative safe integer, got ${total}`);
  }
  if (density >= 1) return total;
  return Math.min(total, Math.max(0, Math.round(total * density)));
}

const TWO_POW_32 = 2 ** 32;

// A 32-bit source cannot reach every ordinal above 2^32; two draws give 53 bits.
function randomBelow(random: RandomSource, n: number): number {
  if (n <= TWO_POW_32) return Math.floor(random() * n);
  const hi = Math.floor(random() * TWO_POW_32);
  const lo = Math.floor(random() * TWO_POW_32) >>> 11;
  return Math.floor(((hi * 2 ** 21 + lo) / 2 ** 53) * n);
}

// Expected O(k) draws and O(k) memory; N never enters the cost.
function rejectionSample(total: number, k: number, random: RandomSource): number[] {
  const picked = new Set<number>();
  while (picked.size < k) {
    picked.add(randomBelow(random, total));
  }
  return [...picked];
}

// O(N) time and memory; used only when k is a sizeable fraction of N.
function partialShuffle(total: number, k: number, random: RandomSource): number[] {
  const slots = total <= 0xffffffff ? new Uint32Array(total) : new Float64Array(total);
  for (let i = 0; i < total; i++) slots[i] = i;
  const out = new Array<number>(k);
  for (let i = 0; i < k; i++) {
    const j = i + randomBelow(random, total - i);
    const picked = slots[j];
    slots[j] = slots[i];
    slots[i] = picked;
    out[i] = picked;
  }
  return out;
}

/**
 * Draws round(total * density) distinct ordinals from [0, total), sorted ascending.
 * density = 1 enumerates every ordinal without consuming randomness.
 */
export function selectOrdinals(total: number, density: number, random: RandomSource = Math.random): number[] {
  const k = sampleSize(total, density);
  if (k === 0) return [];
  if (k === total) {
    return Array.from({ length: total }, (_, i) => i);
  }

  const picked =
    k <= total * REJECTION_MAX_FRACTION ? rejectionSample(total, k, random) : partialShuffle(total, k, random);
  return picked.sort((a, b) => a - b);
}
