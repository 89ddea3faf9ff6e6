import { describe, it, expect } from 'vitest';
import { DataIntegrityError } from '../../../../common/errors.js';
import { labelHighRisk } from '../../labeling/risk.labeler.js';
import { randomSelection } from '../../selection/selection.random.js';
import { ruleBasedSelection } from '../../selection/selection.rule-based.js';
import {
  ComparativeValidator,
  categoricalDetection,
  interpretCohensD,
  mcnemarCorrectness,
  tTestYields,
} from '../comparative.validator.js';
import { mockLogger, uniformRecords } from '../../__tests__/test.fixtures.js';

describe('tTestYields', () => {
  it('reports Cohen d with its magnitude', () => {
    const r = tTestYields([1, 2, 3], [4, 5, 6]);
    expect(r.status).toBe('OK');
    if (r.status !== 'OK') return;
    expect(r.cohensD).toBe(-3);
    expect(r.effectSize).toBe('large');
    expect(r.degreesOfFreedom).toBe(4);
    expect(r.significant).toBe(true);
    expect(r.baselineMean).toBe(2);
    expect(r.candidateMean).toBe(5);
  });

  it('returns insufficient data for empty or constant samples', () => {
    expect(tTestYields([], [1, 2])).toEqual({
      test: 't_test_yields',
      status: 'INSUFFICIENT_DATA',
      reason: 'empty selected subset',
    });
    expect(tTestYields([0.5, 0.5], [0.5, 0.5]).status).toBe('INSUFFICIENT_DATA');
    expect(tTestYields([0.5], [0.7]).status).toBe('INSUFFICIENT_DATA');
  });

  it('labels effect magnitudes', () => {
    expect(interpretCohensD(0.1)).toBe('negligible');
    expect(interpretCohensD(-0.3)).toBe('small');
    expect(interpretCohensD(0.6)).toBe('medium');
    expect(interpretCohensD(0.8)).toBe('large');
  });
});

describe('categoricalDetection', () => {
  it('uses chi-square with Yates correction for large expected counts', () => {
    const r = categoricalDetection({ tp: 4, fn: 36 }, { tp: 30, fn: 10 });
    expect(r.status).toBe('OK');
    if (r.status !== 'OK') return;
    expect(r.method).toBe('chi_square_yates');
    expect(r.statistic).toBeCloseTo(31.9693, 3);
    expect(r.significant).toBe(true);
    expect(r.expected).toEqual([
      [17, 23],
      [17, 23],
    ]);
    expect(r.baselineRecall).toBe(0.1);
    expect(r.candidateRecall).toBe(0.75);
    expect(r.oddsRatio).toBeCloseTo((4 * 10) / (36 * 30), 12);
  });

  it('falls back to Fisher exact when an expected count is below five', () => {
    const r = categoricalDetection({ tp: 1, fn: 3 }, { tp: 4, fn: 0 });
    expect(r.status).toBe('OK');
    if (r.status !== 'OK') return;
    expect(r.method).toBe('fisher_exact');
    expect(r.pValue).toBeCloseTo(10 / 70, 9);
    expect(r.significant).toBe(false);
    expect(r.oddsRatio).toBe(0);
    expect(r.baselineRecall).toBe(0.25);
    expect(r.candidateRecall).toBe(1);
  });

  it('returns insufficient data for an empty margin', () => {
    expect(categoricalDetection({ tp: 0, fn: 0 }, { tp: 0, fn: 0 }).status).toBe('INSUFFICIENT_DATA');
    expect(categoricalDetection({ tp: 0, fn: 5 }, { tp: 0, fn: 5 }).status).toBe('INSUFFICIENT_DATA');
  });
});

describe('mcnemarCorrectness', () => {
  it('counts discordant correctness pairs', () => {
    const r = mcnemarCorrectness([true, true, false, false], [true, false, false, false], [true, true, true, false]);
    expect(r.status).toBe('OK');
    if (r.status !== 'OK') return;
    expect(r.b).toBe(1);
    expect(r.c).toBe(1);
    expect(r.statistic).toBe(0.5);
    expect(r.pValue).toBeCloseTo(0.4795001, 6);
    expect(r.significant).toBe(false);
  });

  it('is not significant without discordance', () => {
    const r = mcnemarCorrectness([true, false], [true, false], [true, false]);
    expect(r).toMatchObject({ status: 'OK', b: 0, c: 0, statistic: 0, pValue: 1, significant: false });
  });
});

describe('ComparativeValidator', () => {
  const records = uniformRecords(200);
  const { mask } = labelHighRisk(records, { quantile: 0.2 });

  it('finds every test significant for a perfect candidate against random', () => {
    const logger = mockLogger();
    const validator = new ComparativeValidator(logger);
    const report = validator.compare({
      records,
      mask,
      baseline: randomSelection(records, { rate: 0.2, seed: 3 }),
      candidate: ruleBasedSelection(records, { rate: 0.2, riskColumn: 'risk_score' }),
      baselineName: 'random',
      candidateName: 'framework',
      unitCost: 1,
      bootstrap: { iterations: 500, seed: 1, metric: 'recall' },
    });

    expect(report.baseline).toBe('random');
    expect(report.candidate).toBe('framework');
    expect(report.alpha).toBe(0.05);
    expect(report.nHighRisk).toBe(40);
    expect(report.summary.significantTests).toEqual(['t_test_yields', 'categorical_detection', 'bootstrap_ci', 'mcnemar']);
    expect(report.summary.insufficientTests).toEqual([]);
    expect(report.deltas.deltaRecall).toBeGreaterThan(0.5);
    expect(report.deltas.deltaCostPct).toBe(0);
    expect(logger.info).toHaveBeenCalledWith(expect.objectContaining({ baseline: 'random' }), '[Compare] Comparison complete');
  });

  it('reports identical policies as indistinguishable', () => {
    const sel = randomSelection(records, { rate: 0.2, seed: 8 });
    const report = new ComparativeValidator(mockLogger()).compare({
      records,
      mask,
      baseline: sel,
      candidate: sel,
      unitCost: 1,
      bootstrap: { iterations: 200, seed: 2, metric: 'cost' },
    });
    expect(report.summary.significantTests).toEqual([]);
    expect(report.tests.bootstrap).toMatchObject({ status: 'OK', ciLower: 0, ciUpper: 0, significant: false });
    expect(report.tests.mcnemar).toMatchObject({ status: 'OK', b: 0, c: 0, pValue: 1 });
    expect(report.deltas).toEqual({ deltaRecall: 0, deltaCostPct: 0 });
    expect(report.baseline).toBe('random');
  });

  it('keeps the other tests when one degenerates', () => {
    const empty = randomSelection(records, { rate: 0.001, seed: 1 });
    const report = new ComparativeValidator(mockLogger()).compare({
      records,
      mask,
      baseline: empty,
      candidate: ruleBasedSelection(records, { rate: 0.2, riskColumn: 'risk_score' }),
      unitCost: 1,
      bootstrap: { iterations: 200, seed: 2 },
    });
    expect(empty.nSelected).toBe(0);
    expect(report.tests.tTest.status).toBe('INSUFFICIENT_DATA');
    expect(report.summary.insufficientTests).toEqual(['t_test_yields']);
    expect(report.tests.categorical.status).toBe('OK');
    expect(report.deltas.deltaCostPct).toBeNull();
  });

  it('rejects a mask of the wrong length', () => {
    const sel = randomSelection(records, { rate: 0.2, seed: 1 });
    expect(() =>
      new ComparativeValidator(mockLogger()).compare({ records, mask: [true], baseline: sel, candidate: sel, unitCost: 1 })
    ).toThrow(DataIntegrityError);
  });
});
