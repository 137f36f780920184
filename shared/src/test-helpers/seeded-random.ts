import type { RandomSource } from "../types.js";

/** mulberry32: small deterministic PRNG for statistical tests. */
export const createSeededRandom = (seed: number): RandomSource => {
  let state = seed >>> 0;

  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export const countDraws = (draws: readonly string[]): Map<string, number> => {
  const counts = new Map<string, number>();
  for (const draw of draws) {
    counts.set(draw, (counts.get(draw) ?? 0) + 1);
  }

  return counts;
};
