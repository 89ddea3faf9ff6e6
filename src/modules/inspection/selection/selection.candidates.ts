/**
 * Candidate pool for the costly follow-up measurement.
 *
 * Records at or above the (1 − topFraction) severity quantile become
 * candidates. Records predicted as physical damage are routed away: they go
 * to a separate list and never reach the follow-up budget.
 */

import { requireScoreColumn } from '../contracts/record.schema.js';
import { REASON, type SelectionRow, type WaferRecord } from '../contracts/inspection.contracts.js';
import { percentile, sortAscending } from '../stats/stats.utils.js';
import { assertRate } from './selection.params.js';

export interface CandidatePoolParams {
  severityColumn: string;
  topFraction: number;
  physicalDamageLabel?: string | null;
}

export interface CandidatePool {
  readonly threshold: number;
  /** Severity descending. */
  readonly candidates: readonly WaferRecord[];
  readonly physicalDamage: readonly WaferRecord[];
  /** Routed records as rows: not selected, cost 0, reason physical_damage_route. */
  readonly routedRows: readonly SelectionRow[];
}

export function buildCandidatePool(records: readonly WaferRecord[], params: CandidatePoolParams): CandidatePool {
  assertRate(params.topFraction, 'topFraction');
  if (records.length === 0) {
    return Object.freeze({ threshold: NaN, candidates: [], physicalDamage: [], routedRows: [] });
  }
  const severities = requireScoreColumn(records, params.severityColumn);
  const threshold = percentile(sortAscending(severities), 1 - params.topFraction);

  const top = records
    .map((record, i) => ({ record, severity: severities[i] }))
    .filter(e => e.severity >= threshold)
    .sort((a, b) => b.severity - a.severity)
    .map(e => e.record);

  const label = params.physicalDamageLabel ?? null;
  const physicalDamage = label === null ? [] : top.filter(r => r.predictedLabel === label);
  const candidates = label === null ? top : top.filter(r => r.predictedLabel !== label);

  return Object.freeze({
    threshold,
    candidates: Object.freeze(candidates),
    physicalDamage: Object.freeze(physicalDamage),
    routedRows: Object.freeze(
      physicalDamage.map(r => ({ id: r.id, selected: false, cost: 0, reason: REASON.PHYSICAL_DAMAGE }))
    ),
  });
}
