/**
 * Rule-based baseline: top ⌊N·rate⌋ records by a risk score column,
 * descending, ties broken by original row order.
 */

import { assertRecordSet, requireScoreColumn } from '../contracts/record.schema.js';
import { REASON } from '../contracts/inspection.contracts.js';
import type { SelectionResult, WaferRecord } from '../contracts/inspection.contracts.js';
import { floorCount } from '../stats/stats.utils.js';
import { assertRate, assertUnitCost } from './selection.params.js';
import { buildFlagSelection } from './selection.rows.js';

export interface RuleBasedSelectionParams {
  rate: number;
  riskColumn: string;
  unitCost?: number;
}

export function topIndicesByScore(scores: readonly number[], k: number): number[] {
  return scores
    .map((score, idx) => ({ score, idx }))
    .sort((a, b) => b.score - a.score || a.idx - b.idx)
    .slice(0, k)
    .map(e => e.idx);
}

export function ruleBasedSelection(records: readonly WaferRecord[], params: RuleBasedSelectionParams): SelectionResult {
  const unitCost = params.unitCost ?? 1;
  assertRate(params.rate);
  assertUnitCost(unitCost);
  assertRecordSet(records);
  const scores = requireScoreColumn(records, params.riskColumn);

  const k = floorCount(params.rate, records.length);
  const picked = new Set(topIndicesByScore(scores, k));
  return buildFlagSelection('rule_based', records, picked, unitCost, REASON.RULE_BASED);
}
