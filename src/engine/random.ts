/**
 * Seeded PRNG for track generation.
 *
 * The engine never calls Math.random: every run is reproducible from its seed,
 * which keeps generation testable and lets the headless bridge replay episodes.
 */

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

const DEFAULT_SEED = 1;

function normalizeSeed(seed: number): number {
  if (!Number.isFinite(seed)) return DEFAULT_SEED;
  const normalized = seed >>> 0;
  return normalized === 0 ? DEFAULT_SEED : normalized;
}

/** mulberry32: small, fast, good enough for gameplay randomness. */
export function mulberry32(seed: number): RandomSource {
  let state = normalizeSeed(seed);
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = Math.imul(state ^ (state >>> 15), state | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform float in [min, max). */
export function randomRange(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random();
}
