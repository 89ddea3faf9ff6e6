/**
 * Ground-truth high-risk labeling.
 *
 * Fixed-k bottom-quantile rule: rank records by (outcome asc, id asc) and
 * mark exactly k = ⌊q·N⌋ of them. The mask depends on the outcome column
 * alone, never on a score column.
 */

import { createHash } from 'crypto';
import { ConfigurationError } from '../../../common/errors.js';
import { assertRecordSet } from '../contracts/record.schema.js';
import { floorCount } from '../stats/stats.utils.js';
import type {
  WaferRecord,
  HighRiskDefinition,
  HighRiskLabeling,
} from '../contracts/inspection.contracts.js';

export interface LabelOptions {
  quantile: number;
}

/** Binary (UTF-16 code unit) comparison; locale-independent. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function assertQuantile(q: number): void {
  if (!Number.isFinite(q) || q <= 0 || q > 1) {
    throw new ConfigurationError(`quantile must be in (0, 1], got ${q}`);
  }
}

/** SHA-256 over the ascending outcomes, six decimals, comma-joined. */
export function hashOutcomes(records: readonly WaferRecord[]): string {
  const joined = records
    .map(r => r.outcome)
    .sort((a, b) => a - b)
    .map(v => v.toFixed(6))
    .join(',');
  return createHash('sha256').update(joined).digest('hex');
}

export function labelHighRisk(records: readonly WaferRecord[], options: LabelOptions): HighRiskLabeling {
  assertQuantile(options.quantile);
  assertRecordSet(records);

  const n = records.length;
  const k = floorCount(options.quantile, n);

  const order = records
    .map((r, idx) => ({ idx, outcome: r.outcome, id: r.id }))
    .sort((a, b) => a.outcome - b.outcome || compareIds(a.id, b.id));

  const mask = new Array<boolean>(n).fill(false);
  for (let rank = 0; rank < k; rank++) mask[order[rank].idx] = true;

  const thresholdYieldAtK = k > 0 ? order[k - 1].outcome : null;
  const thresholdYieldNext = k > 0 ? (k < n ? order[k].outcome : thresholdYieldAtK) : null;

  const definition: HighRiskDefinition = Object.freeze({
    method: 'bottom_quantile_fixed_k',
    quantile: options.quantile,
    n,
    k,
    actualRate: k / n,
    thresholdYieldAtK,
    thresholdYieldNext,
    tieBreaker: 'id_ascending',
    sourceHash: hashOutcomes(records),
  });

  return { mask: Object.freeze(mask), definition };
}

export function countHighRisk(mask: readonly boolean[]): number {
  let k = 0;
  for (const m of mask) if (m) k++;
  return k;
}
