/**
 * Classical two-sample and contingency tests.
 *
 * Each function returns null for a degenerate input instead of throwing;
 * callers turn that into an INSUFFICIENT_DATA result.
 */

import { mean, variance, sortAscending } from './stats.utils.js';
import {
  studentTTwoSided,
  chiSquare1Survival,
  kolmogorovSurvival,
  ksExactSurvival,
  logChoose,
  clamp01,
} from './stats.distributions.js';

export type Table2x2 = readonly [readonly [number, number], readonly [number, number]];

export interface TTestStat {
  t: number;
  df: number;
  pValue: number;
  meanA: number;
  meanB: number;
  pooledSd: number;
}

/**
 * Pooled-variance Student t-test, two-sided.
 * null when a sample is empty, df < 1, or the pooled variance is zero.
 */
export function studentTTest(a: readonly number[], b: readonly number[]): TTestStat | null {
  const n1 = a.length;
  const n2 = b.length;
  if (n1 === 0 || n2 === 0) return null;
  const df = n1 + n2 - 2;
  if (df < 1) return null;

  const v1 = n1 > 1 ? variance(a) : 0;
  const v2 = n2 > 1 ? variance(b) : 0;
  const pooledVar = ((n1 - 1) * v1 + (n2 - 1) * v2) / df;
  if (!Number.isFinite(pooledVar) || pooledVar <= 0) return null;

  const meanA = mean(a);
  const meanB = mean(b);
  const se = Math.sqrt(pooledVar * (1 / n1 + 1 / n2));
  const t = (meanA - meanB) / se;

  return { t, df, pValue: studentTTwoSided(t, df), meanA, meanB, pooledSd: Math.sqrt(pooledVar) };
}

export function expectedCounts(table: Table2x2): [[number, number], [number, number]] {
  const [[a, b], [c, d]] = table;
  const n = a + b + c + d;
  const r1 = a + b;
  const r2 = c + d;
  const c1 = a + c;
  const c2 = b + d;
  return [
    [(r1 * c1) / n, (r1 * c2) / n],
    [(r2 * c1) / n, (r2 * c2) / n],
  ];
}

/** true when some row or column total is zero, so no expected count exists. */
export function hasEmptyMargin(table: Table2x2): boolean {
  const [[a, b], [c, d]] = table;
  return a + b === 0 || c + d === 0 || a + c === 0 || b + d === 0;
}

/**
 * Pearson chi-square with Yates continuity correction (1 df).
 * Each |O − E| is reduced by min(0.5, |O − E|).
 */
export function chiSquareYates(table: Table2x2): { statistic: number; pValue: number } | null {
  if (hasEmptyMargin(table)) return null;
  const expected = expectedCounts(table);
  let statistic = 0;
  for (let i = 0; i < 2; i++) {
    for (let j = 0; j < 2; j++) {
      const diff = Math.abs(table[i][j] - expected[i][j]);
      const corrected = diff - Math.min(0.5, diff);
      statistic += (corrected * corrected) / expected[i][j];
    }
  }
  return { statistic, pValue: chiSquare1Survival(statistic) };
}

/**
 * Fisher exact test, two-sided: sums hypergeometric probabilities of every
 * table with the same margins that is no more likely than the observed one.
 */
export function fisherExact(table: Table2x2): { pValue: number } | null {
  if (hasEmptyMargin(table)) return null;
  const [[a, b], [c, d]] = table;
  const r1 = a + b;
  const c1 = a + c;
  const n = a + b + c + d;
  const lo = Math.max(0, r1 + c1 - n);
  const hi = Math.min(r1, c1);

  const logDenom = logChoose(n, r1);
  const prob = (x: number) => Math.exp(logChoose(c1, x) + logChoose(n - c1, r1 - x) - logDenom);

  const pObserved = prob(a);
  // relative tolerance for ties in floating point
  const threshold = pObserved * (1 + 1e-7);
  let p = 0;
  for (let x = lo; x <= hi; x++) {
    const px = prob(x);
    if (px <= threshold) p += px;
  }
  return { pValue: clamp01(p) };
}

/** McNemar test with continuity correction on discordant counts b and c. */
export function mcnemar(b: number, c: number): { statistic: number; pValue: number } {
  if (b + c === 0) return { statistic: 0, pValue: 1 };
  const diff = Math.abs(b - c) - 1;
  const statistic = (diff * diff) / (b + c);
  return { statistic, pValue: chiSquare1Survival(statistic) };
}

/** Two-sample Kolmogorov–Smirnov statistic D = sup |F_a − F_b|. */
export function ksStatistic(a: readonly number[], b: readonly number[]): number {
  const xs = sortAscending(a);
  const ys = sortAscending(b);
  const n1 = xs.length;
  const n2 = ys.length;
  let i = 0;
  let j = 0;
  let d = 0;
  while (i < n1 && j < n2) {
    const v = Math.min(xs[i], ys[j]);
    while (i < n1 && xs[i] === v) i++;
    while (j < n2 && ys[j] === v) j++;
    d = Math.max(d, Math.abs(i / n1 - j / n2));
  }
  return d;
}

/** Below this n1·n2 the KS p-value comes from the exact null distribution. */
export const KS_EXACT_MAX_PRODUCT = 10_000;

/**
 * KS two-sample test, two-sided. Exact p-value when n1·n2 < KS_EXACT_MAX_PRODUCT;
 * otherwise the asymptotic Q((√ne + 0.12 + 0.11/√ne) · D), ne = n1·n2 / (n1 + n2).
 */
export function ksTwoSample(
  a: readonly number[],
  b: readonly number[]
): { statistic: number; pValue: number; method: 'exact' | 'asymptotic' } | null {
  const n1 = a.length;
  const n2 = b.length;
  if (n1 === 0 || n2 === 0) return null;
  const statistic = ksStatistic(a, b);
  if (n1 * n2 < KS_EXACT_MAX_PRODUCT) {
    return { statistic, pValue: ksExactSurvival(n1, n2, statistic), method: 'exact' };
  }
  const en = Math.sqrt((n1 * n2) / (n1 + n2));
  const pValue = kolmogorovSurvival((en + 0.12 + 0.11 / en) * statistic);
  return { statistic, pValue, method: 'asymptotic' };
}
