/**
 * Parameter checks shared by the selection policies.
 * All of them throw ConfigurationError and run before any selection work.
 */

import { ConfigurationError } from '../../../common/errors.js';
import { requireFlagColumn } from '../contracts/record.schema.js';
import type { MandatoryPredicate, WaferRecord } from '../contracts/inspection.contracts.js';

export function assertRate(rate: number, name = 'rate'): void {
  if (!Number.isFinite(rate) || rate <= 0 || rate > 1) {
    throw new ConfigurationError(`${name} must be in (0, 1], got ${rate}`);
  }
}

export function assertUnitCost(unitCost: number): void {
  if (!Number.isFinite(unitCost) || unitCost <= 0) {
    throw new ConfigurationError(`unitCost must be a positive number, got ${unitCost}`);
  }
}

/** Seeds map one-to-one onto generator states. */
export const MAX_SEED = 2 ** 32 - 1;

export function assertSeed(seed: number): void {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new ConfigurationError(`seed must be an integer in [0, ${MAX_SEED}], got ${seed}`);
  }
}

/**
 * ⌊totalBudget / unitCost⌋, except that a quotient within rounding error
 * below an integer (0.3 / 0.1 = 2.9999999999999996) counts as that integer.
 */
function affordableUnits(totalBudget: number, unitCost: number): number {
  const units = totalBudget / unitCost;
  const up = Math.ceil(units);
  return up - units <= 2 * Number.EPSILON * Math.max(1, units) ? up : Math.floor(units);
}

export interface CapParams {
  unitCost: number;
  totalBudget?: number | null;
  maxCount?: number | null;
}

/**
 * Effective cap: ⌊totalBudget / unitCost⌋, min'ed with maxCount when both
 * are supplied. null means unbounded.
 */
export function resolveCap(params: CapParams): number | null {
  assertUnitCost(params.unitCost);
  const { totalBudget, maxCount } = params;

  let cap: number | null = null;
  if (totalBudget !== undefined && totalBudget !== null) {
    if (!Number.isFinite(totalBudget) || totalBudget < 0) {
      throw new ConfigurationError(`totalBudget must be a non-negative number, got ${totalBudget}`);
    }
    cap = affordableUnits(totalBudget, params.unitCost);
  }
  if (maxCount !== undefined && maxCount !== null) {
    if (!Number.isInteger(maxCount) || maxCount < 0) {
      throw new ConfigurationError(`maxCount must be a non-negative integer, got ${maxCount}`);
    }
    cap = cap === null ? maxCount : Math.min(cap, maxCount);
  }
  return cap;
}

/**
 * Ordered predicates over named boolean flags. When records are given,
 * every flag must be present on every record.
 */
export function flagPredicates(
  names: readonly string[],
  records?: readonly WaferRecord[]
): MandatoryPredicate[] {
  const seen = new Set<string>();
  for (const name of names) {
    if (!name) throw new ConfigurationError('Mandatory predicate names must be non-empty');
    if (seen.has(name)) throw new ConfigurationError(`Mandatory predicate '${name}' is listed twice`);
    seen.add(name);
    if (records) requireFlagColumn(records, name);
  }
  return names.map(name => ({
    name,
    test: (record: WaferRecord) => record.flags[name] === true,
  }));
}
