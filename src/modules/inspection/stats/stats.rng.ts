/**
 * Seeded pseudo-random generation.
 *
 * Every randomized call site receives its own generator built from an
 * explicit seed; nothing reads Math.random or shared generator state, so
 * sweep points and seeds can run in any order or in parallel.
 */

export type Rng = () => number;

/** mulberry32: 32-bit state, uniform doubles in [0, 1). */
export function makeRng(seed: number): Rng {
  let s = seed >>> 0;
  return () => {
    s = (s + 0x6d2b79f5) >>> 0;
    let t = s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform integer in [0, n). */
export function randomInt(rnd: Rng, n: number): number {
  return Math.floor(rnd() * n);
}

/**
 * k distinct indices from [0, n) via a partial Fisher–Yates shuffle.
 * Returned in draw order.
 */
export function sampleWithoutReplacement(rnd: Rng, n: number, k: number): number[] {
  const pool = Array.from({ length: n }, (_, i) => i);
  const take = Math.min(k, n);
  for (let i = 0; i < take; i++) {
    const j = i + randomInt(rnd, n - i);
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  return pool.slice(0, take);
}
