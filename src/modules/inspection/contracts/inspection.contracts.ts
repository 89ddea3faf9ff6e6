/**
 * Inspection Selection Contracts
 *
 * Value objects shared by labeling, selection, evaluation and validation.
 * Everything here is produced by pure functions from a record set plus
 * configuration and is treated as read-only once built.
 */

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

/** Significance level for every test in the core. Not configurable. */
export const ALPHA = 0.05;

export const DEFAULT_BOOTSTRAP_ITERATIONS = 10_000;
export const MAX_BOOTSTRAP_ITERATIONS = 100_000;

export const DEFAULT_COST_RATIO_GRID = [1, 2, 3, 5, 7, 10] as const;

/** Reason codes attached to selection rows. */
export const REASON = {
  RANDOM: 'random_sample',
  RULE_BASED: 'top_risk_score',
  HIGH_SEVERITY: 'high_severity',
  NOT_SELECTED: 'not_selected',
  NOT_SELECTED_BUDGET: 'not_selected_budget',
  PHYSICAL_DAMAGE: 'physical_damage_route',
} as const;

export const MANDATORY_REASON_PREFIX = 'mandatory_';

// ═══════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════

export interface WaferRecord {
  readonly id: string;
  /** Continuous outcome measure (yield). Lower is worse. */
  readonly outcome: number;
  /** Named continuous risk / severity scores. */
  readonly scores: Readonly<Record<string, number>>;
  /** Named boolean mandatory-override flags. */
  readonly flags: Readonly<Record<string, boolean>>;
  readonly predictedLabel: string;
  readonly lotId?: string;
}

/**
 * A named record-level condition that forces inclusion in the follow-up
 * selection regardless of budget ranking.
 */
export interface MandatoryPredicate {
  readonly name: string;
  test(record: WaferRecord): boolean;
}

/** Black-box prediction model. Training happens elsewhere. */
export interface RiskModel {
  readonly name: string;
  predict(records: readonly WaferRecord[]): number[];
}

// ═══════════════════════════════════════════════════════════════
// GROUND TRUTH
// ═══════════════════════════════════════════════════════════════

export interface HighRiskDefinition {
  readonly method: 'bottom_quantile_fixed_k';
  readonly quantile: number;
  readonly n: number;
  readonly k: number;
  readonly actualRate: number;
  readonly thresholdYieldAtK: number | null;
  readonly thresholdYieldNext: number | null;
  readonly tieBreaker: 'id_ascending';
  readonly sourceHash: string;
}

export interface HighRiskLabeling {
  /** Aligned with the input record order. */
  readonly mask: readonly boolean[];
  readonly definition: HighRiskDefinition;
}

// ═══════════════════════════════════════════════════════════════
// SELECTION
// ═══════════════════════════════════════════════════════════════

export type SelectionPolicyName = 'random' | 'rule_based' | 'budgeted_mandatory';

export interface SelectionRow {
  readonly id: string;
  readonly selected: boolean;
  readonly cost: number;
  readonly reason: string;
}

export interface SelectionResult {
  readonly policy: SelectionPolicyName;
  /**
   * Random and rule-based: one row per input record, in input order.
   * Budgeted: selected rows only, severity descending.
   */
  readonly rows: readonly SelectionRow[];
  readonly selectedIds: readonly string[];
  readonly nSelected: number;
  /** Effective cap; null when unbounded. */
  readonly cap: number | null;
  readonly budgetOverrun: boolean;
}

export interface BudgetedSelectionResult extends SelectionResult {
  readonly policy: 'budgeted_mandatory';
  /** Unselected candidates, cost 0, reason not_selected_budget. */
  readonly remainder: readonly SelectionRow[];
  readonly mandatoryIds: readonly string[];
}

// ═══════════════════════════════════════════════════════════════
// METRICS
// ═══════════════════════════════════════════════════════════════

export interface ConfusionCounts {
  readonly tp: number;
  readonly fp: number;
  readonly fn: number;
  readonly tn: number;
}

export interface Metrics extends ConfusionCounts {
  readonly nTotal: number;
  readonly nHighRisk: number;
  readonly nSelected: number;
  readonly selectionRate: number;
  readonly recall: number;
  readonly precision: number;
  readonly f1: number;
  readonly specificity: number;
  readonly falsePositiveRate: number;
  readonly unitCost: number;
  readonly totalCost: number;
  /** +Infinity when nothing high-risk was caught. */
  readonly costPerCatch: number;
  readonly meanYieldSelected: number | null;
  readonly meanYieldUnselected: number | null;
  readonly meanYieldAll: number;
}

/** Metrics safe for external reports: no currency amounts. */
export interface NormalizedMetrics extends ConfusionCounts {
  readonly nTotal: number;
  readonly nHighRisk: number;
  readonly unitsSelected: number;
  readonly selectionRate: number;
  readonly recall: number;
  readonly precision: number;
  readonly f1: number;
  readonly specificity: number;
  readonly falsePositiveRate: number;
  /** Inspections spent per high-risk unit caught; +Infinity when tp = 0. */
  readonly inspectionsPerCatch: number;
  /** Spend as a percentage of inspecting every unit. */
  readonly costSharePct: number;
  readonly meanYieldSelected: number | null;
  readonly meanYieldUnselected: number | null;
  readonly meanYieldAll: number;
}

export type CostForm = 'normalized' | 'absolute';

// ═══════════════════════════════════════════════════════════════
// COMPARISON
// ═══════════════════════════════════════════════════════════════

export type ComparisonTestName = 't_test_yields' | 'categorical_detection' | 'bootstrap_ci' | 'mcnemar';

export interface InsufficientData {
  readonly test: ComparisonTestName;
  readonly status: 'INSUFFICIENT_DATA';
  readonly reason: string;
}

interface TestOutcome {
  readonly status: 'OK';
  readonly statistic: number;
  readonly pValue: number;
  readonly significant: boolean;
}

export type EffectMagnitude = 'negligible' | 'small' | 'medium' | 'large';

export interface TTestOutcome extends TestOutcome {
  readonly test: 't_test_yields';
  readonly degreesOfFreedom: number;
  readonly cohensD: number;
  readonly effectSize: EffectMagnitude;
  readonly baselineMean: number;
  readonly candidateMean: number;
  readonly nBaseline: number;
  readonly nCandidate: number;
}

export interface CategoricalOutcome extends TestOutcome {
  readonly test: 'categorical_detection';
  readonly method: 'chi_square_yates' | 'fisher_exact';
  /** [[baselineTp, baselineFn], [candidateTp, candidateFn]] */
  readonly table: readonly [readonly [number, number], readonly [number, number]];
  readonly expected: readonly [readonly [number, number], readonly [number, number]];
  readonly oddsRatio: number;
  readonly baselineRecall: number;
  readonly candidateRecall: number;
}

export type BootstrapMetric = 'cost' | 'recall';

export interface BootstrapOutcome {
  readonly test: 'bootstrap_ci';
  readonly status: 'OK';
  readonly metric: BootstrapMetric;
  readonly form: CostForm;
  readonly iterations: number;
  readonly seed: number;
  readonly confidenceLevel: number;
  /**
   * recall: candidate − baseline (absolute recall points).
   * cost: (baseline − candidate) / baseline × 100, a percentage reduction.
   */
  readonly observedDiff: number;
  readonly ciLower: number;
  readonly ciUpper: number;
  readonly significant: boolean;
  /** Present only for cost in absolute form. */
  readonly absolute?: {
    readonly observedBaselineTotal: number;
    readonly observedCandidateTotal: number;
    readonly observedDiff: number;
    readonly ciLower: number;
    readonly ciUpper: number;
  };
}

export interface McNemarOutcome extends TestOutcome {
  readonly test: 'mcnemar';
  /** Baseline right, candidate wrong. */
  readonly b: number;
  /** Baseline wrong, candidate right. */
  readonly c: number;
}

export type TTestResult = TTestOutcome | InsufficientData;
export type CategoricalResult = CategoricalOutcome | InsufficientData;
export type BootstrapResult = BootstrapOutcome | InsufficientData;
export type McNemarResult = McNemarOutcome | InsufficientData;

export interface ComparisonReport {
  readonly baseline: string;
  readonly candidate: string;
  readonly alpha: number;
  readonly nTotal: number;
  readonly nHighRisk: number;
  readonly tests: {
    readonly tTest: TTestResult;
    readonly categorical: CategoricalResult;
    readonly bootstrap: BootstrapResult;
    readonly mcnemar: McNemarResult;
  };
  readonly deltas: {
    /** candidate − baseline */
    readonly deltaRecall: number;
    /** (candidate − baseline) / baseline × 100; null when baseline spends nothing. */
    readonly deltaCostPct: number | null;
  };
  readonly summary: {
    readonly significantTests: ComparisonTestName[];
    readonly insufficientTests: ComparisonTestName[];
  };
}

// ═══════════════════════════════════════════════════════════════
// PLAUSIBILITY
// ═══════════════════════════════════════════════════════════════

export type ProxyStatus = 'PASSED_PLAUSIBILITY' | 'FAILED_PLAUSIBILITY';

export interface ProxyVerdict {
  readonly test: 'kolmogorov_smirnov';
  readonly ksStatistic: number;
  readonly pValue: number;
  /** Exact null distribution for small samples, asymptotic otherwise. */
  readonly pValueMethod: 'exact' | 'asymptotic';
  readonly status: ProxyStatus;
  readonly evidence: 'CORRELATIONAL';
  readonly caveat: string;
  readonly nA: number;
  readonly nB: number;
}

// ═══════════════════════════════════════════════════════════════
// SWEEPS
// ═══════════════════════════════════════════════════════════════

export type DominanceType = 'recall_dominance' | 'cost_dominance' | 'none';

export interface SensitivityRow {
  readonly r: number;
  readonly method: string;
  readonly comparator: string | null;
  readonly recall: number;
  readonly primaryUnits: number;
  readonly secondaryUnits: number;
  readonly normalizedCost: number;
  /** null when nothing was caught */
  readonly costPerCatch: number | null;
  /** Set on framework rows only. */
  readonly dominanceType: DominanceType | null;
}

export interface SensitivitySweepResult {
  readonly grid: readonly number[];
  readonly tolerance: number;
  readonly rows: readonly SensitivityRow[];
  readonly tally: Readonly<Record<DominanceType, number>>;
  readonly byComparator: Readonly<Record<string, Readonly<Record<DominanceType, number>>>>;
}

export interface SeedRun {
  readonly seed: number;
  readonly tp: number;
  readonly fn: number;
  readonly recall: number;
}

export interface MultiSeedSweepResult {
  readonly nSeeds: number;
  readonly baseSeed: number;
  readonly rate: number;
  readonly nTotal: number;
  readonly nHighRisk: number;
  readonly nSelectedPerRun: number;
  readonly runs: readonly SeedRun[];
  readonly recall: {
    readonly mean: number;
    readonly std: number;
    readonly p05: number;
    readonly p50: number;
    readonly p95: number;
  };
}
