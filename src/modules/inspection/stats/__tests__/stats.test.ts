import { describe, it, expect } from 'vitest';
import { approxEqual, floorCount, mean, percentile, stdevPopulation, variance } from '../stats.utils.js';
import { makeRng, sampleWithoutReplacement } from '../stats.rng.js';
import { chiSquareYates, fisherExact, ksTwoSample, mcnemar, studentTTest } from '../stats.tests.js';

describe('stats utils', () => {
  it('computes mean and sample variance', () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5);
    expect(variance([1, 2, 3, 4])).toBeCloseTo(5 / 3, 12);
    expect(stdevPopulation([2, 4])).toBe(1);
  });

  it('interpolates percentiles linearly', () => {
    expect(percentile([1, 2, 3, 4], 0.5)).toBe(2.5);
    expect(percentile([10, 20, 30], 0.25)).toBe(15);
    expect(percentile([10, 20, 30], 1)).toBe(30);
    expect(Number.isNaN(percentile([], 0.5))).toBe(true);
  });

  it('compares within a relative tolerance band', () => {
    expect(approxEqual(0.1 + 0.2, 0.3, 1e-9)).toBe(true);
    expect(approxEqual(1e9, 1e9 + 0.5, 1e-9)).toBe(true);
    expect(approxEqual(1, 1.001, 1e-9)).toBe(false);
  });

  it('floors count targets without float drift', () => {
    expect(floorCount(0.29, 100)).toBe(29);
    expect(floorCount(0.2, 200)).toBe(40);
    expect(floorCount(0.1, 5)).toBe(0);
  });
});

describe('seeded rng', () => {
  it('replays the same sequence for the same seed', () => {
    const a = makeRng(42);
    const b = makeRng(42);
    const xs = Array.from({ length: 5 }, () => a());
    const ys = Array.from({ length: 5 }, () => b());
    expect(xs).toEqual(ys);
    for (const x of xs) {
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  it('samples distinct indices', () => {
    const picked = sampleWithoutReplacement(makeRng(3), 50, 20);
    expect(picked).toHaveLength(20);
    expect(new Set(picked).size).toBe(20);
    expect(picked.every(i => i >= 0 && i < 50)).toBe(true);
  });
});

describe('hypothesis tests', () => {
  it('student t on separated samples', () => {
    const r = studentTTest([1, 2, 3], [4, 5, 6]);
    expect(r).not.toBeNull();
    expect(r?.t).toBeCloseTo(-3.674235, 5);
    expect(r?.df).toBe(4);
    expect(r?.pValue).toBeCloseTo(0.021312, 4);
    expect(r?.pooledSd).toBe(1);
  });

  it('student t is undefined for zero pooled variance', () => {
    expect(studentTTest([1, 1], [1, 1])).toBeNull();
    expect(studentTTest([], [1, 2])).toBeNull();
  });

  it('chi-square with Yates correction', () => {
    const r = chiSquareYates([
      [4, 36],
      [30, 10],
    ]);
    // expected counts 17/23, each |O − E| = 13 → 12.5 after correction
    expect(r?.statistic).toBeCloseTo(2 * (156.25 / 17) + 2 * (156.25 / 23), 9);
    expect(r?.pValue).toBeLessThan(1e-6);
  });

  it('chi-square is undefined with an empty margin', () => {
    expect(
      chiSquareYates([
        [0, 5],
        [0, 7],
      ])
    ).toBeNull();
  });

  it('fisher exact two-sided', () => {
    // hypergeometric weights 5, 30, 30, 5 over C(8,4) = 70
    const r = fisherExact([
      [1, 3],
      [4, 0],
    ]);
    expect(r?.pValue).toBeCloseTo(10 / 70, 9);
  });

  it('mcnemar without discordant pairs', () => {
    expect(mcnemar(0, 0)).toEqual({ statistic: 0, pValue: 1 });
  });

  it('mcnemar with one-sided discordance', () => {
    const r = mcnemar(10, 0);
    expect(r.statistic).toBeCloseTo(8.1, 12);
    expect(r.pValue).toBeCloseTo(0.0044265, 5);
  });

  it('mcnemar with balanced discordance keeps the corrected statistic', () => {
    const r = mcnemar(2, 2);
    expect(r.statistic).toBe(0.25);
    expect(r.pValue).toBeCloseTo(0.6170751, 6);
  });

  it('kolmogorov-smirnov on disjoint samples uses the exact tail', () => {
    const r = ksTwoSample([1, 2, 3], [4, 5, 6]);
    expect(r?.statistic).toBe(1);
    expect(r?.method).toBe('exact');
    expect(r?.pValue).toBeCloseTo(0.1, 12);
  });

  it('kolmogorov-smirnov exact tail with unequal sample sizes', () => {
    const r = ksTwoSample([1, 2], [3, 4, 5, 6]);
    expect(r?.statistic).toBe(1);
    expect(r?.pValue).toBeCloseTo(2 / 15, 12);
  });

  it('kolmogorov-smirnov switches to the asymptotic tail at n1·n2 = 10000', () => {
    const a = Array.from({ length: 100 }, (_, i) => i);
    const b = Array.from({ length: 100 }, (_, i) => i + 0.5);
    const r = ksTwoSample(a, b);
    expect(r?.method).toBe('asymptotic');
    expect(r?.statistic).toBeCloseTo(0.01, 12);
    expect(r?.pValue).toBeGreaterThan(0.99);
    expect(ksTwoSample(a.slice(1), b)?.method).toBe('exact');
  });

  it('kolmogorov-smirnov on identical samples', () => {
    expect(ksTwoSample([1, 2, 3], [1, 2, 3])).toEqual({ statistic: 0, pValue: 1, method: 'exact' });
  });
});
