/**
 * Random sampling baseline.
 *
 * Draws ⌊N·rate⌋ records without replacement from a generator built from the
 * caller's seed. Same (seed, rate, N) → same index set.
 */

import { assertRecordSet } from '../contracts/record.schema.js';
import { REASON } from '../contracts/inspection.contracts.js';
import type { SelectionResult, WaferRecord } from '../contracts/inspection.contracts.js';
import { makeRng, sampleWithoutReplacement } from '../stats/stats.rng.js';
import { floorCount } from '../stats/stats.utils.js';
import { assertRate, assertSeed, assertUnitCost } from './selection.params.js';
import { buildFlagSelection } from './selection.rows.js';

export interface RandomSelectionParams {
  rate: number;
  seed: number;
  unitCost?: number;
}

/** Indices only; used directly by the multi-seed sweep. */
export function randomIndices(n: number, rate: number, seed: number): number[] {
  const k = floorCount(rate, n);
  return sampleWithoutReplacement(makeRng(seed), n, k).sort((a, b) => a - b);
}

export function randomSelection(records: readonly WaferRecord[], params: RandomSelectionParams): SelectionResult {
  const unitCost = params.unitCost ?? 1;
  assertRate(params.rate);
  assertSeed(params.seed);
  assertUnitCost(unitCost);
  assertRecordSet(records);

  const picked = new Set(randomIndices(records.length, params.rate, params.seed));
  return buildFlagSelection('random', records, picked, unitCost, REASON.RANDOM);
}
