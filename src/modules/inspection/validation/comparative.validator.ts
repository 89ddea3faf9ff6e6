/**
 * Comparative Validator
 *
 * Baseline vs candidate selection, both evaluated on the identical record set
 * and ground truth. Runs four independent tests; a degenerate input turns
 * one test into INSUFFICIENT_DATA without affecting the others.
 *
 * | Test                  | Question                                      |
 * |-----------------------|-----------------------------------------------|
 * | t_test_yields         | do the two selections pick different yields?  |
 * | categorical_detection | do the detection counts (tp, fn) differ?      |
 * | bootstrap_ci          | CI on the cost or recall difference           |
 * | mcnemar               | paired per-record correctness                 |
 */

import { DataIntegrityError } from '../../../common/errors.js';
import {
  ALPHA,
  DEFAULT_BOOTSTRAP_ITERATIONS,
  type BootstrapMetric,
  type BootstrapResult,
  type CategoricalResult,
  type ComparisonReport,
  type ComparisonTestName,
  type CostForm,
  type EffectMagnitude,
  type McNemarResult,
  type SelectionResult,
  type TTestResult,
  type WaferRecord,
} from '../contracts/inspection.contracts.js';
import { confusionCounts } from '../evaluation/evaluation.metrics.js';
import { selectionFlags } from '../selection/selection.rows.js';
import {
  chiSquareYates,
  expectedCounts,
  fisherExact,
  hasEmptyMargin,
  mcnemar,
  studentTTest,
  type Table2x2,
} from '../stats/stats.tests.js';
import { defaultLogger, type Logger } from '../runtime/inspection.host.deps.js';
import { bootstrapDifferenceCI } from './bootstrap.ci.js';

/** Below this expected count the 2×2 test switches to Fisher exact. */
export const MIN_EXPECTED_COUNT = 5;

export interface CompareInput {
  records: readonly WaferRecord[];
  mask: readonly boolean[];
  baseline: SelectionResult;
  candidate: SelectionResult;
  baselineName?: string;
  candidateName?: string;
  unitCost: number;
  bootstrap?: {
    iterations?: number;
    seed?: number;
    metric?: BootstrapMetric;
    form?: CostForm;
  };
}

export function interpretCohensD(d: number): EffectMagnitude {
  const a = Math.abs(d);
  if (a < 0.2) return 'negligible';
  if (a < 0.5) return 'small';
  if (a < 0.8) return 'medium';
  return 'large';
}

export function tTestYields(baselineYields: readonly number[], candidateYields: readonly number[]): TTestResult {
  if (baselineYields.length === 0 || candidateYields.length === 0) {
    return { test: 't_test_yields', status: 'INSUFFICIENT_DATA', reason: 'empty selected subset' };
  }
  const stat = studentTTest(baselineYields, candidateYields);
  if (!stat) {
    return { test: 't_test_yields', status: 'INSUFFICIENT_DATA', reason: 'degenerate sample variance' };
  }
  const cohensD = (stat.meanA - stat.meanB) / stat.pooledSd;
  return {
    test: 't_test_yields',
    status: 'OK',
    statistic: stat.t,
    pValue: stat.pValue,
    significant: stat.pValue < ALPHA,
    degreesOfFreedom: stat.df,
    cohensD,
    effectSize: interpretCohensD(cohensD),
    baselineMean: stat.meanA,
    candidateMean: stat.meanB,
    nBaseline: baselineYields.length,
    nCandidate: candidateYields.length,
  };
}

function recall(tp: number, fn: number): number {
  return tp + fn > 0 ? tp / (tp + fn) : 0;
}

export function categoricalDetection(
  baseline: { tp: number; fn: number },
  candidate: { tp: number; fn: number }
): CategoricalResult {
  const table: Table2x2 = [
    [baseline.tp, baseline.fn],
    [candidate.tp, candidate.fn],
  ];
  if (hasEmptyMargin(table)) {
    return { test: 'categorical_detection', status: 'INSUFFICIENT_DATA', reason: 'empty contingency margin' };
  }
  const expected = expectedCounts(table);
  const small = expected.some(row => row.some(e => e < MIN_EXPECTED_COUNT));

  // sample odds ratio (baseline tp · candidate fn) / (baseline fn · candidate tp)
  const oddsRatio =
    baseline.fn > 0 && candidate.tp > 0
      ? (baseline.tp * candidate.fn) / (baseline.fn * candidate.tp)
      : Infinity;

  const outcome = small ? fisherExact(table) : chiSquareYates(table);
  if (!outcome) {
    return { test: 'categorical_detection', status: 'INSUFFICIENT_DATA', reason: 'empty contingency margin' };
  }
  // Fisher has no test statistic of its own; report the odds ratio
  const statistic = 'statistic' in outcome ? outcome.statistic : oddsRatio;
  const pValue = outcome.pValue;

  return {
    test: 'categorical_detection',
    status: 'OK',
    method: small ? 'fisher_exact' : 'chi_square_yates',
    statistic,
    pValue,
    significant: pValue < ALPHA,
    table: [
      [baseline.tp, baseline.fn],
      [candidate.tp, candidate.fn],
    ],
    expected,
    oddsRatio,
    baselineRecall: recall(baseline.tp, baseline.fn),
    candidateRecall: recall(candidate.tp, candidate.fn),
  };
}

/** Paired test on per-record correctness (selected === high-risk). */
export function mcnemarCorrectness(
  mask: readonly boolean[],
  baselineSelected: readonly boolean[],
  candidateSelected: readonly boolean[]
): McNemarResult {
  if (mask.length === 0) {
    return { test: 'mcnemar', status: 'INSUFFICIENT_DATA', reason: 'empty record set' };
  }
  let b = 0;
  let c = 0;
  for (let i = 0; i < mask.length; i++) {
    const baseRight = baselineSelected[i] === mask[i];
    const candRight = candidateSelected[i] === mask[i];
    if (baseRight && !candRight) b++;
    else if (!baseRight && candRight) c++;
  }
  const { statistic, pValue } = mcnemar(b, c);
  return {
    test: 'mcnemar',
    status: 'OK',
    statistic,
    pValue,
    significant: pValue < ALPHA,
    b,
    c,
  };
}

function yieldsOf(records: readonly WaferRecord[], flags: readonly boolean[]): number[] {
  const out: number[] = [];
  records.forEach((r, i) => {
    if (flags[i]) out.push(r.outcome);
  });
  return out;
}

export class ComparativeValidator {
  constructor(private readonly logger: Logger = defaultLogger) {}

  compare(input: CompareInput): ComparisonReport {
    const { records, mask, unitCost } = input;
    if (mask.length !== records.length) {
      throw new DataIntegrityError(`mask length ${mask.length} does not match ${records.length} records`);
    }
    const baselineName = input.baselineName ?? input.baseline.policy;
    const candidateName = input.candidateName ?? input.candidate.policy;

    const baseSel = selectionFlags(records, input.baseline);
    const candSel = selectionFlags(records, input.candidate);
    const baseCounts = confusionCounts(mask, baseSel);
    const candCounts = confusionCounts(mask, candSel);

    const tTest = tTestYields(yieldsOf(records, baseSel), yieldsOf(records, candSel));
    const categorical = categoricalDetection(baseCounts, candCounts);
    const bootstrap: BootstrapResult = bootstrapDifferenceCI({
      baselineSelected: baseSel,
      candidateSelected: candSel,
      mask,
      unitCost,
      metric: input.bootstrap?.metric ?? 'recall',
      form: input.bootstrap?.form ?? 'normalized',
      iterations: input.bootstrap?.iterations ?? DEFAULT_BOOTSTRAP_ITERATIONS,
      seed: input.bootstrap?.seed ?? 0,
    });
    const mcnemarResult = mcnemarCorrectness(mask, baseSel, candSel);

    const tests = { tTest, categorical, bootstrap, mcnemar: mcnemarResult };
    const all = Object.values(tests);
    const significantTests: ComparisonTestName[] = all
      .filter(t => t.status === 'OK' && t.significant)
      .map(t => t.test);
    const insufficientTests: ComparisonTestName[] = all
      .filter(t => t.status === 'INSUFFICIENT_DATA')
      .map(t => t.test);

    const nHighRisk = baseCounts.tp + baseCounts.fn;
    const baseRecall = recall(baseCounts.tp, baseCounts.fn);
    const candRecall = recall(candCounts.tp, candCounts.fn);
    const baseSpend = (baseCounts.tp + baseCounts.fp) * unitCost;
    const candSpend = (candCounts.tp + candCounts.fp) * unitCost;

    this.logger.info(
      {
        baseline: baselineName,
        candidate: candidateName,
        significant: significantTests,
        insufficient: insufficientTests,
      },
      '[Compare] Comparison complete'
    );

    return {
      baseline: baselineName,
      candidate: candidateName,
      alpha: ALPHA,
      nTotal: records.length,
      nHighRisk,
      tests,
      deltas: {
        deltaRecall: candRecall - baseRecall,
        deltaCostPct: baseSpend > 0 ? ((candSpend - baseSpend) / baseSpend) * 100 : null,
      },
      summary: { significantTests, insufficientTests },
    };
  }
}
