import { describe, it, expect } from 'vitest';
import { DataIntegrityError } from '../../../../common/errors.js';
import { makeRng } from '../../stats/stats.rng.js';
import { PROXY_CAVEAT, checkProxyPlausibility } from '../proxy.checker.js';

function uniform(seed: number, n: number, offset = 0): number[] {
  const rnd = makeRng(seed);
  return Array.from({ length: n }, () => rnd() + offset);
}

describe('checkProxyPlausibility', () => {
  it('passes three-point disjoint samples on the exact distribution', () => {
    const v = checkProxyPlausibility([1, 2, 3], [4, 5, 6]);
    expect(v.ksStatistic).toBe(1);
    expect(v.pValue).toBeCloseTo(0.1, 12);
    expect(v.pValueMethod).toBe('exact');
    expect(v.status).toBe('PASSED_PLAUSIBILITY');
    expect(v.nA).toBe(3);
    expect(v.nB).toBe(3);
  });

  it('passes a partial separation that the asymptotic tail would reject', () => {
    const v = checkProxyPlausibility([1, 2, 3, 4, 10], [5, 6, 7, 8, 9]);
    expect(v.ksStatistic).toBeCloseTo(0.8, 12);
    expect(v.pValue).toBeCloseTo(10 / 126, 10);
    expect(v.status).toBe('PASSED_PLAUSIBILITY');
  });

  it('fails six-point disjoint samples', () => {
    const v = checkProxyPlausibility([1, 2, 3, 4, 5, 6], [7, 8, 9, 10, 11, 12]);
    expect(v.pValue).toBeCloseTo(2 / 924, 12);
    expect(v.pValueMethod).toBe('exact');
    expect(v.status).toBe('FAILED_PLAUSIBILITY');
  });

  it('passes identical samples and labels the evidence as correlational', () => {
    const v = checkProxyPlausibility([0.1, 0.4, 0.9], [0.1, 0.4, 0.9]);
    expect(v).toEqual({
      test: 'kolmogorov_smirnov',
      ksStatistic: 0,
      pValue: 1,
      pValueMethod: 'exact',
      status: 'PASSED_PLAUSIBILITY',
      evidence: 'CORRELATIONAL',
      caveat: PROXY_CAVEAT,
      nA: 3,
      nB: 3,
    });
  });

  it('passes same-distribution samples with high probability', () => {
    let passed = 0;
    for (let i = 0; i < 20; i++) {
      const v = checkProxyPlausibility(uniform(100 + i, 500), uniform(200 + i, 500));
      if (v.status === 'PASSED_PLAUSIBILITY') passed++;
    }
    expect(passed).toBeGreaterThanOrEqual(15);
  });

  it('fails a large mean offset', () => {
    const v = checkProxyPlausibility(uniform(1, 200), uniform(2, 200, 0.5));
    expect(v.status).toBe('FAILED_PLAUSIBILITY');
    expect(v.pValueMethod).toBe('asymptotic');
    expect(v.pValue).toBeLessThan(1e-6);
  });

  it('rejects empty or non-finite input', () => {
    expect(() => checkProxyPlausibility([], [1])).toThrow(DataIntegrityError);
    expect(() => checkProxyPlausibility([1], [])).toThrow(DataIntegrityError);
    expect(() => checkProxyPlausibility([1, Number.NaN], [1])).toThrow(DataIntegrityError);
  });
});
