/**
 * Cross-source plausibility check.
 *
 * Two score arrays from independently sourced datasets can only be compared
 * distributionally. A PASS means the distributions are not distinguishable
 * at α; it is never evidence that one source predicts the other.
 */

import { DataIntegrityError } from '../../../common/errors.js';
import { ALPHA, type ProxyVerdict } from '../contracts/inspection.contracts.js';
import { ksTwoSample } from '../stats/stats.tests.js';

export const PROXY_CAVEAT =
  'Distributional plausibility only: sources are not linked record-by-record, so no causal or predictive claim follows.';

function assertFiniteSample(xs: readonly number[], name: string): void {
  if (xs.length === 0) {
    throw new DataIntegrityError(`${name} is empty`);
  }
  const bad = xs.findIndex(x => !Number.isFinite(x));
  if (bad >= 0) {
    throw new DataIntegrityError(`${name}[${bad}] is not a finite number`);
  }
}

export function checkProxyPlausibility(sourceA: readonly number[], sourceB: readonly number[]): ProxyVerdict {
  assertFiniteSample(sourceA, 'sourceA');
  assertFiniteSample(sourceB, 'sourceB');

  const ks = ksTwoSample(sourceA, sourceB);
  if (!ks) {
    throw new DataIntegrityError('KS test needs two non-empty samples');
  }

  const verdict: ProxyVerdict = {
    test: 'kolmogorov_smirnov',
    ksStatistic: ks.statistic,
    pValue: ks.pValue,
    pValueMethod: ks.method,
    status: ks.pValue <= ALPHA ? 'FAILED_PLAUSIBILITY' : 'PASSED_PLAUSIBILITY',
    evidence: 'CORRELATIONAL',
    caveat: PROXY_CAVEAT,
    nA: sourceA.length,
    nB: sourceB.length,
  };
  return Object.freeze(verdict);
}
