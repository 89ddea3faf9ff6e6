/**
 * Budget-constrained follow-up selection with mandatory override.
 *
 * Mandatory candidates are never dropped to fit a budget: if they alone
 * reach the cap, exactly the mandatory subset is selected and the result is
 * flagged budgetOverrun. Pure: returns a new frozen (selected, remainder)
 * pair and never mutates its inputs.
 */

import { requireScoreColumn } from '../contracts/record.schema.js';
import { MANDATORY_REASON_PREFIX, REASON } from '../contracts/inspection.contracts.js';
import type {
  BudgetedSelectionResult,
  MandatoryPredicate,
  SelectionRow,
  WaferRecord,
} from '../contracts/inspection.contracts.js';
import { resolveCap } from './selection.params.js';

export interface BudgetedSelectionParams {
  severityColumn: string;
  predicates: readonly MandatoryPredicate[];
  unitCost: number;
  totalBudget?: number | null;
  maxCount?: number | null;
}

interface Candidate {
  record: WaferRecord;
  severity: number;
  fired: string[];
}

function dedupeById(records: readonly WaferRecord[]): WaferRecord[] {
  const seen = new Set<string>();
  const out: WaferRecord[] = [];
  for (const r of records) {
    if (seen.has(r.id)) continue;
    seen.add(r.id);
    out.push(r);
  }
  return out;
}

function bySeverityDesc(a: Candidate, b: Candidate): number {
  return b.severity - a.severity;
}

function selectedRow(c: Candidate, unitCost: number): SelectionRow {
  const reason = c.fired.length
    ? c.fired.map(name => `${MANDATORY_REASON_PREFIX}${name}`).join(',')
    : REASON.HIGH_SEVERITY;
  return Object.freeze({ id: c.record.id, selected: true, cost: unitCost, reason });
}

function remainderRow(c: Candidate): SelectionRow {
  return Object.freeze({ id: c.record.id, selected: false, cost: 0, reason: REASON.NOT_SELECTED_BUDGET });
}

export function selectBudgetedMandatory(
  candidatePool: readonly WaferRecord[],
  params: BudgetedSelectionParams
): BudgetedSelectionResult {
  const cap = resolveCap(params);
  const unique = dedupeById(candidatePool);
  const severities = requireScoreColumn(unique, params.severityColumn);

  // stable sort keeps pool order among equal severities
  const candidates: Candidate[] = unique
    .map((record, i) => ({
      record,
      severity: severities[i],
      fired: params.predicates.filter(p => p.test(record)).map(p => p.name),
    }))
    .sort(bySeverityDesc);

  const mandatory = candidates.filter(c => c.fired.length > 0);
  const optional = candidates.filter(c => c.fired.length === 0);

  let chosen: Candidate[];
  let budgetOverrun: boolean;

  if (cap === null) {
    chosen = candidates;
    budgetOverrun = false;
  } else if (mandatory.length >= cap) {
    chosen = mandatory;
    budgetOverrun = true;
  } else {
    chosen = [...mandatory, ...optional.slice(0, cap - mandatory.length)];
    budgetOverrun = false;
  }

  const chosenIds = new Set(chosen.map(c => c.record.id));
  const selected = chosen.slice().sort(bySeverityDesc).map(c => selectedRow(c, params.unitCost));
  const remainder = candidates.filter(c => !chosenIds.has(c.record.id)).map(remainderRow);

  return Object.freeze({
    policy: 'budgeted_mandatory',
    rows: Object.freeze(selected),
    remainder: Object.freeze(remainder),
    selectedIds: Object.freeze(selected.map(r => r.id)),
    mandatoryIds: Object.freeze(mandatory.map(c => c.record.id)),
    nSelected: selected.length,
    cap,
    budgetOverrun,
  });
}
