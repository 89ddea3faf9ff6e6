/**
 * Paired bootstrap confidence interval on the difference of a metric
 * between two selections evaluated on the same records.
 *
 * Each draw resamples record indices with replacement and recomputes both
 * methods' metric on that resample. The interval is the empirical
 * (α/2, 1 − α/2) percentile pair; it is significant when it excludes zero.
 */

import { ConfigurationError, DataIntegrityError } from '../../../common/errors.js';
import {
  MAX_BOOTSTRAP_ITERATIONS,
  type BootstrapMetric,
  type BootstrapResult,
  type CostForm,
} from '../contracts/inspection.contracts.js';
import { makeRng, randomInt } from '../stats/stats.rng.js';
import { percentile, sortAscending } from '../stats/stats.utils.js';
import { assertSeed, assertUnitCost } from '../selection/selection.params.js';

export interface BootstrapParams {
  baselineSelected: readonly boolean[];
  candidateSelected: readonly boolean[];
  mask: readonly boolean[];
  unitCost: number;
  metric: BootstrapMetric;
  iterations: number;
  seed: number;
  /** Cost only. Normalized reports the percentage reduction alone. */
  form?: CostForm;
  confidenceLevel?: number;
}

export function assertIterations(iterations: number): void {
  if (!Number.isInteger(iterations) || iterations < 1 || iterations > MAX_BOOTSTRAP_ITERATIONS) {
    throw new ConfigurationError(
      `bootstrap iterations must be an integer in [1, ${MAX_BOOTSTRAP_ITERATIONS}], got ${iterations}`
    );
  }
}

function pctReduction(baselineTotal: number, candidateTotal: number): number {
  return baselineTotal > 0 ? ((baselineTotal - candidateTotal) / baselineTotal) * 100 : 0;
}

function recallOf(tp: number, highRisk: number): number {
  return highRisk > 0 ? tp / highRisk : 0;
}

export function bootstrapDifferenceCI(params: BootstrapParams): BootstrapResult {
  const form = params.form ?? 'normalized';
  const confidenceLevel = params.confidenceLevel ?? 0.95;
  assertIterations(params.iterations);
  assertSeed(params.seed);
  assertUnitCost(params.unitCost);
  if (!(confidenceLevel > 0 && confidenceLevel < 1)) {
    throw new ConfigurationError(`confidenceLevel must be in (0, 1), got ${confidenceLevel}`);
  }

  const n = params.mask.length;
  if (params.baselineSelected.length !== n || params.candidateSelected.length !== n) {
    throw new DataIntegrityError('Bootstrap columns must have the same length');
  }
  if (n === 0) {
    return { test: 'bootstrap_ci', status: 'INSUFFICIENT_DATA', reason: 'empty record set' };
  }

  const base = params.baselineSelected;
  const cand = params.candidateSelected;
  const mask = params.mask;
  const rnd = makeRng(params.seed);

  const diffs = new Array<number>(params.iterations);
  const absDiffs = new Array<number>(params.iterations);

  for (let it = 0; it < params.iterations; it++) {
    let bSel = 0;
    let cSel = 0;
    let hr = 0;
    let bTp = 0;
    let cTp = 0;
    for (let draw = 0; draw < n; draw++) {
      const i = randomInt(rnd, n);
      if (base[i]) bSel++;
      if (cand[i]) cSel++;
      if (mask[i]) {
        hr++;
        if (base[i]) bTp++;
        if (cand[i]) cTp++;
      }
    }
    if (params.metric === 'cost') {
      const b = bSel * params.unitCost;
      const c = cSel * params.unitCost;
      diffs[it] = pctReduction(b, c);
      absDiffs[it] = b - c;
    } else {
      diffs[it] = recallOf(cTp, hr) - recallOf(bTp, hr);
    }
  }

  const alpha = (1 - confidenceLevel) / 2;
  const sorted = sortAscending(diffs);
  const ciLower = percentile(sorted, alpha);
  const ciUpper = percentile(sorted, 1 - alpha);

  let bSelAll = 0;
  let cSelAll = 0;
  let hrAll = 0;
  let bTpAll = 0;
  let cTpAll = 0;
  for (let i = 0; i < n; i++) {
    if (base[i]) bSelAll++;
    if (cand[i]) cSelAll++;
    if (mask[i]) {
      hrAll++;
      if (base[i]) bTpAll++;
      if (cand[i]) cTpAll++;
    }
  }

  const baselineTotal = bSelAll * params.unitCost;
  const candidateTotal = cSelAll * params.unitCost;
  const observedDiff =
    params.metric === 'cost'
      ? pctReduction(baselineTotal, candidateTotal)
      : recallOf(cTpAll, hrAll) - recallOf(bTpAll, hrAll);

  const result = {
    test: 'bootstrap_ci' as const,
    status: 'OK' as const,
    metric: params.metric,
    form: params.metric === 'cost' ? form : 'normalized' as const,
    iterations: params.iterations,
    seed: params.seed,
    confidenceLevel,
    observedDiff,
    ciLower,
    ciUpper,
    significant: ciLower > 0 || ciUpper < 0,
  };

  if (params.metric === 'cost' && form === 'absolute') {
    const sortedAbs = sortAscending(absDiffs);
    return {
      ...result,
      absolute: {
        observedBaselineTotal: baselineTotal,
        observedCandidateTotal: candidateTotal,
        observedDiff: baselineTotal - candidateTotal,
        ciLower: percentile(sortedAbs, alpha),
        ciUpper: percentile(sortedAbs, 1 - alpha),
      },
    };
  }
  return result;
}
