/**
 * Evaluator: confusion matrix, detection rates, cost aggregates and yield
 * summaries for any (records, ground truth, selection) triple.
 *
 * Rates are 0 (never NaN) when their denominator is 0. cost_per_catch is
 * +Infinity when nothing high-risk was caught.
 */

import { DataIntegrityError } from '../../../common/errors.js';
import type {
  ConfusionCounts,
  Metrics,
  NormalizedMetrics,
  SelectionResult,
  WaferRecord,
} from '../contracts/inspection.contracts.js';
import { selectionFlags } from '../selection/selection.rows.js';
import { assertUnitCost } from '../selection/selection.params.js';
import { mean } from '../stats/stats.utils.js';

export interface EvaluateOptions {
  unitCost: number;
}

export function safeRatio(num: number, den: number): number {
  return den > 0 ? num / den : 0;
}

export function confusionCounts(mask: readonly boolean[], selected: readonly boolean[]): ConfusionCounts {
  let tp = 0;
  let fp = 0;
  let fn = 0;
  let tn = 0;
  for (let i = 0; i < mask.length; i++) {
    if (mask[i]) {
      if (selected[i]) tp++;
      else fn++;
    } else if (selected[i]) fp++;
    else tn++;
  }
  return { tp, fp, fn, tn };
}

function meanOrNull(xs: number[]): number | null {
  return xs.length ? mean(xs) : null;
}

export function evaluateSelection(
  records: readonly WaferRecord[],
  mask: readonly boolean[],
  selected: readonly boolean[],
  options: EvaluateOptions
): Metrics {
  assertUnitCost(options.unitCost);
  if (mask.length !== records.length || selected.length !== records.length) {
    throw new DataIntegrityError(
      `Column length mismatch: records=${records.length}, mask=${mask.length}, selected=${selected.length}`
    );
  }

  const { tp, fp, fn, tn } = confusionCounts(mask, selected);
  const nTotal = records.length;
  const nHighRisk = tp + fn;
  const nSelected = tp + fp;

  const recall = safeRatio(tp, tp + fn);
  const precision = safeRatio(tp, tp + fp);
  const f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;

  const totalCost = nSelected * options.unitCost;

  const yieldsSelected: number[] = [];
  const yieldsUnselected: number[] = [];
  records.forEach((r, i) => (selected[i] ? yieldsSelected : yieldsUnselected).push(r.outcome));

  return Object.freeze({
    tp,
    fp,
    fn,
    tn,
    nTotal,
    nHighRisk,
    nSelected,
    selectionRate: safeRatio(nSelected, nTotal),
    recall,
    precision,
    f1,
    specificity: safeRatio(tn, tn + fp),
    falsePositiveRate: safeRatio(fp, fp + tn),
    unitCost: options.unitCost,
    totalCost,
    costPerCatch: tp > 0 ? totalCost / tp : Infinity,
    meanYieldSelected: meanOrNull(yieldsSelected),
    meanYieldUnselected: meanOrNull(yieldsUnselected),
    meanYieldAll: mean(records.map(r => r.outcome)),
  });
}

/** Evaluate a SelectionResult by matching its selected ids against the records. */
export function evaluatePolicy(
  records: readonly WaferRecord[],
  mask: readonly boolean[],
  selection: Pick<SelectionResult, 'selectedIds'>,
  options: EvaluateOptions
): Metrics {
  return evaluateSelection(records, mask, selectionFlags(records, selection), options);
}

/** Drops every currency amount; keeps unit counts, ratios and percentages. */
export function normalizeMetrics(m: Metrics): NormalizedMetrics {
  return Object.freeze({
    tp: m.tp,
    fp: m.fp,
    fn: m.fn,
    tn: m.tn,
    nTotal: m.nTotal,
    nHighRisk: m.nHighRisk,
    unitsSelected: m.nSelected,
    selectionRate: m.selectionRate,
    recall: m.recall,
    precision: m.precision,
    f1: m.f1,
    specificity: m.specificity,
    falsePositiveRate: m.falsePositiveRate,
    inspectionsPerCatch: m.tp > 0 ? m.nSelected / m.tp : Infinity,
    costSharePct: safeRatio(m.nSelected, m.nTotal) * 100,
    meanYieldSelected: m.meanYieldSelected,
    meanYieldUnselected: m.meanYieldUnselected,
    meanYieldAll: m.meanYieldAll,
  });
}

export interface MethodComparisonRow {
  method: string;
  unitsSelected: number;
  selectionRate: number;
  recall: number;
  precision: number;
  f1: number;
  falsePositiveRate: number;
  missedHighRisk: number;
  /** Relative to the first method; null for the first row or a zero-spend reference. */
  deltaCostPct: number | null;
  deltaRecall: number | null;
}

/** Side-by-side table; deltas are taken against the first method. */
export function compareMethods(metricsByMethod: ReadonlyArray<readonly [string, Metrics]>): MethodComparisonRow[] {
  if (metricsByMethod.length === 0) return [];
  const [, reference] = metricsByMethod[0];

  return metricsByMethod.map(([method, m], i) => ({
    method,
    unitsSelected: m.nSelected,
    selectionRate: m.selectionRate,
    recall: m.recall,
    precision: m.precision,
    f1: m.f1,
    falsePositiveRate: m.falsePositiveRate,
    missedHighRisk: m.fn,
    deltaCostPct:
      i === 0 || reference.totalCost === 0
        ? null
        : ((m.totalCost - reference.totalCost) / reference.totalCost) * 100,
    deltaRecall: i === 0 ? null : m.recall - reference.recall,
  }));
}
