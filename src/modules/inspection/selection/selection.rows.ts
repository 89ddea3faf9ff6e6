import { REASON } from '../contracts/inspection.contracts.js';
import type {
  SelectionPolicyName,
  SelectionResult,
  SelectionRow,
  WaferRecord,
} from '../contracts/inspection.contracts.js';

/** One row per record in input order; selected rows cost unitCost. */
export function buildFlagSelection(
  policy: SelectionPolicyName,
  records: readonly WaferRecord[],
  pickedIndices: ReadonlySet<number>,
  unitCost: number,
  reason: string
): SelectionResult {
  const rows: SelectionRow[] = records.map((r, i) => {
    const selected = pickedIndices.has(i);
    return Object.freeze({
      id: r.id,
      selected,
      cost: selected ? unitCost : 0,
      reason: selected ? reason : REASON.NOT_SELECTED,
    });
  });
  const selectedIds = rows.filter(r => r.selected).map(r => r.id);

  return Object.freeze({
    policy,
    rows: Object.freeze(rows),
    selectedIds: Object.freeze(selectedIds),
    nSelected: selectedIds.length,
    cap: pickedIndices.size,
    budgetOverrun: false,
  });
}

/** Per-record selected flags aligned with `records`. */
export function selectionFlags(records: readonly WaferRecord[], selection: Pick<SelectionResult, 'selectedIds'>): boolean[] {
  const ids = new Set(selection.selectedIds);
  return records.map(r => ids.has(r.id));
}
