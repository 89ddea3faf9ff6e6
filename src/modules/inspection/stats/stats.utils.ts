/**
 * Descriptive statistics over plain number arrays.
 */

export function sum(xs: readonly number[]): number {
  let s = 0;
  for (const x of xs) s += x;
  return s;
}

export function mean(xs: readonly number[]): number {
  if (!xs.length) return NaN;
  return sum(xs) / xs.length;
}

/** Sample variance (n − 1 denominator). */
export function variance(xs: readonly number[]): number {
  if (xs.length < 2) return NaN;
  const m = mean(xs);
  let acc = 0;
  for (const x of xs) acc += (x - m) * (x - m);
  return acc / (xs.length - 1);
}

/** Population standard deviation (n denominator). */
export function stdevPopulation(xs: readonly number[]): number {
  if (!xs.length) return NaN;
  const m = mean(xs);
  let acc = 0;
  for (const x of xs) acc += (x - m) * (x - m);
  return Math.sqrt(acc / xs.length);
}

export function sortAscending(xs: readonly number[]): number[] {
  return xs.slice().sort((a, b) => a - b);
}

/**
 * Linear-interpolated percentile of an ascending array, p in [0, 1].
 * Matches the "linear" definition: rank (n − 1)·p between neighbours.
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return NaN;
  const idx = (sorted.length - 1) * p;
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  if (lo === hi) return sorted[lo];
  const w = idx - lo;
  return sorted[lo] * (1 - w) + sorted[hi] * w;
}

/** Equality within a relative band: |a − b| ≤ tol · max(1, |a|, |b|). */
export function approxEqual(a: number, b: number, tol: number): boolean {
  return Math.abs(a - b) <= tol * Math.max(1, Math.abs(a), Math.abs(b));
}

/**
 * ⌊fraction · n⌋ for count targets. The 1e-9 nudge keeps products such as
 * 0.29 · 100 = 28.999… on the intended integer.
 */
export function floorCount(fraction: number, n: number): number {
  return Math.floor(fraction * n + 1e-9);
}
