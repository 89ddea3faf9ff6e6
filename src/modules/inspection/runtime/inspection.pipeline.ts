/**
 * Evaluation pipeline: one end-to-end run over a record set.
 *
 *   labels → random / rule-based / framework inline selections
 *          → framework follow-up (candidate pool → budgeted mandatory)
 *          → metrics → comparisons → sweeps → plausibility
 *
 * Every parameter is validated before the first selection is computed.
 */

import { ConfigurationError } from '../../../common/errors.js';
import type {
  BudgetedSelectionResult,
  ComparisonReport,
  HighRiskDefinition,
  Metrics,
  MultiSeedSweepResult,
  NormalizedMetrics,
  ProxyVerdict,
  RiskModel,
  SelectionResult,
  SelectionRow,
  SensitivitySweepResult,
  WaferRecord,
} from '../contracts/inspection.contracts.js';
import { assertRecordSet, attachModelScores, requireScoreColumn } from '../contracts/record.schema.js';
import { compareMethods, evaluatePolicy, normalizeMetrics, type MethodComparisonRow } from '../evaluation/evaluation.metrics.js';
import { labelHighRisk } from '../labeling/risk.labeler.js';
import {
  buildCandidatePool,
  flagPredicates,
  randomSelection,
  resolveCap,
  ruleBasedSelection,
  selectBudgetedMandatory,
} from '../selection/index.js';
import { MultiSeedSweepService } from '../sim/sweep.multi-seed.service.js';
import { SensitivitySweepService } from '../sim/sweep.sensitivity.service.js';
import { ComparativeValidator } from '../validation/comparative.validator.js';
import { checkProxyPlausibility } from '../validation/proxy.checker.js';
import { defaultLogger, type Logger } from './inspection.host.deps.js';
import type { BudgetConfig, RunConfig } from './inspection.config.js';

export const METHOD = {
  RANDOM: 'random',
  RULE_BASED: 'rule_based',
  FRAMEWORK: 'framework',
} as const;

export type MethodName = (typeof METHOD)[keyof typeof METHOD];

export interface ProxyInput {
  sourceA: readonly number[];
  sourceB: readonly number[];
}

export interface RunInput {
  records: readonly WaferRecord[];
  config: RunConfig;
  /** When given, its predictions become the framework score column. */
  model?: RiskModel;
  proxy?: ProxyInput;
}

export interface SelectionSummary {
  policy: SelectionResult['policy'];
  nSelected: number;
  selectedIds: readonly string[];
}

export interface FollowUpSummary {
  candidatePoolSize: number;
  severityThreshold: number;
  physicalDamageIds: string[];
  cap: number | null;
  budgetOverrun: boolean;
  nSelected: number;
  selected: { id: string; reason: string }[];
  mandatoryIds: readonly string[];
  remainderIds: string[];
  /** Currency amount; absolute form only. */
  totalCost?: number;
}

export interface RunReport {
  definition: HighRiskDefinition;
  costForm: RunConfig['costForm'];
  nTotal: number;
  nHighRisk: number;
  selections: Record<MethodName, SelectionSummary>;
  followUp: FollowUpSummary;
  metrics: Record<MethodName, Metrics | NormalizedMetrics>;
  methodTable: MethodComparisonRow[];
  comparisons: ComparisonReport[];
  sensitivity: SensitivitySweepResult;
  multiSeed: MultiSeedSweepResult;
  /** Correlational only; never merged with ground-truth metrics. */
  plausibility: ProxyVerdict | null;
}

export interface FollowUpResult {
  selection: BudgetedSelectionResult;
  candidatePoolSize: number;
  severityThreshold: number;
  /** Routed away before budgeting; reason physical_damage_route. */
  physicalDamage: readonly SelectionRow[];
}

/** Candidate pool routing followed by the budgeted mandatory selection. */
export function runFollowUpSelection(records: readonly WaferRecord[], config: BudgetConfig): FollowUpResult {
  const predicates = flagPredicates(config.mandatoryPredicates, records);
  const pool = buildCandidatePool(records, {
    severityColumn: config.severityColumn,
    topFraction: config.candidateTopFraction,
    physicalDamageLabel: config.physicalDamageLabel,
  });
  const selection = selectBudgetedMandatory(pool.candidates, {
    severityColumn: config.severityColumn,
    predicates,
    unitCost: config.followUpUnitCost,
    totalBudget: config.totalBudget,
    maxCount: config.maxCount,
  });
  return {
    selection,
    candidatePoolSize: pool.candidates.length,
    severityThreshold: pool.threshold,
    physicalDamage: pool.routedRows,
  };
}

function summarize(selection: SelectionResult): SelectionSummary {
  return { policy: selection.policy, nSelected: selection.nSelected, selectedIds: selection.selectedIds };
}

/** Column and parameter checks that must pass before any selection. */
function preflight(records: readonly WaferRecord[], config: RunConfig, hasModel: boolean): void {
  assertRecordSet(records);
  if (!hasModel) requireScoreColumn(records, config.frameworkScoreColumn);
  requireScoreColumn(records, config.baselineScoreColumn);
  requireScoreColumn(records, config.severityColumn);
  flagPredicates(config.mandatoryPredicates, records);
  resolveCap({
    unitCost: config.followUpUnitCost,
    totalBudget: config.totalBudget,
    maxCount: config.maxCount,
  });
  if (hasModel && config.frameworkScoreColumn === config.baselineScoreColumn) {
    throw new ConfigurationError('frameworkScoreColumn must differ from baselineScoreColumn when a model is injected');
  }
}

export function runEvaluation(input: RunInput, logger: Logger = defaultLogger): RunReport {
  const { config } = input;
  preflight(input.records, config, input.model !== undefined);

  const records = input.model
    ? attachModelScores(input.records, input.model, config.frameworkScoreColumn)
    : input.records;

  // ─── Ground truth ──────────────────────────────────────────
  const { mask, definition } = labelHighRisk(records, { quantile: config.quantile });

  // ─── Inline selections ─────────────────────────────────────
  const random = randomSelection(records, {
    rate: config.selectionRate,
    seed: config.seed,
    unitCost: config.unitCost,
  });
  const ruleBased = ruleBasedSelection(records, {
    rate: config.selectionRate,
    riskColumn: config.baselineScoreColumn,
    unitCost: config.unitCost,
  });
  const framework = ruleBasedSelection(records, {
    rate: config.selectionRate,
    riskColumn: config.frameworkScoreColumn,
    unitCost: config.unitCost,
  });

  // ─── Framework follow-up ───────────────────────────────────
  const frameworkIds = new Set(framework.selectedIds);
  const followUp = runFollowUpSelection(
    records.filter(r => frameworkIds.has(r.id)),
    config
  );

  // ─── Metrics ───────────────────────────────────────────────
  const opts = { unitCost: config.unitCost };
  const raw: Record<MethodName, Metrics> = {
    random: evaluatePolicy(records, mask, random, opts),
    rule_based: evaluatePolicy(records, mask, ruleBased, opts),
    framework: evaluatePolicy(records, mask, framework, opts),
  };
  const absolute = config.costForm === 'absolute';
  const metrics: Record<MethodName, Metrics | NormalizedMetrics> = absolute
    ? raw
    : {
        random: normalizeMetrics(raw.random),
        rule_based: normalizeMetrics(raw.rule_based),
        framework: normalizeMetrics(raw.framework),
      };
  const methodTable = compareMethods([
    [METHOD.RANDOM, raw.random],
    [METHOD.RULE_BASED, raw.rule_based],
    [METHOD.FRAMEWORK, raw.framework],
  ]);

  // ─── Comparisons ───────────────────────────────────────────
  const validator = new ComparativeValidator(logger);
  const bootstrap = { ...config.bootstrap, form: config.costForm };
  const comparisons = [random, ruleBased].map((baseline, i) =>
    validator.compare({
      records,
      mask,
      baseline,
      candidate: framework,
      baselineName: i === 0 ? METHOD.RANDOM : METHOD.RULE_BASED,
      candidateName: METHOD.FRAMEWORK,
      unitCost: config.unitCost,
      bootstrap,
    })
  );

  // ─── Sweeps ────────────────────────────────────────────────
  const sensitivity = new SensitivitySweepService(logger).run({
    framework: {
      name: METHOD.FRAMEWORK,
      recall: raw.framework.recall,
      tp: raw.framework.tp,
      primaryUnits: raw.framework.nSelected,
      secondaryUnits: followUp.selection.nSelected,
    },
    baselines: [
      { name: METHOD.RANDOM, recall: raw.random.recall, tp: raw.random.tp, primaryUnits: raw.random.nSelected, secondaryUnits: 0 },
      {
        name: METHOD.RULE_BASED,
        recall: raw.rule_based.recall,
        tp: raw.rule_based.tp,
        primaryUnits: raw.rule_based.nSelected,
        secondaryUnits: 0,
      },
    ],
    grid: config.costRatioGrid,
  });

  const multiSeed = new MultiSeedSweepService(logger).run({
    mask,
    rate: config.selectionRate,
    nSeeds: config.multiSeed.nSeeds,
    baseSeed: config.multiSeed.baseSeed,
  });

  const plausibility = input.proxy ? checkProxyPlausibility(input.proxy.sourceA, input.proxy.sourceB) : null;

  const sel = followUp.selection;
  const followUpSummary: FollowUpSummary = {
    candidatePoolSize: followUp.candidatePoolSize,
    severityThreshold: followUp.severityThreshold,
    physicalDamageIds: followUp.physicalDamage.map(r => r.id),
    cap: sel.cap,
    budgetOverrun: sel.budgetOverrun,
    nSelected: sel.nSelected,
    selected: sel.rows.map(r => ({ id: r.id, reason: r.reason })),
    mandatoryIds: sel.mandatoryIds,
    remainderIds: sel.remainder.map(r => r.id),
  };
  if (absolute) {
    followUpSummary.totalCost = sel.rows.reduce((acc, r) => acc + r.cost, 0);
  }

  logger.info(
    {
      n: records.length,
      k: definition.k,
      recall: { random: raw.random.recall, rule_based: raw.rule_based.recall, framework: raw.framework.recall },
      followUp: sel.nSelected,
      overrun: sel.budgetOverrun,
    },
    '[Pipeline] Evaluation complete'
  );
  if (sel.budgetOverrun) {
    logger.warn({ cap: sel.cap, mandatory: sel.mandatoryIds.length }, '[Pipeline] Mandatory follow-up exceeds budget');
  }

  return {
    definition,
    costForm: config.costForm,
    nTotal: records.length,
    nHighRisk: definition.k,
    selections: {
      random: summarize(random),
      rule_based: summarize(ruleBased),
      framework: summarize(framework),
    },
    followUp: followUpSummary,
    metrics,
    methodTable,
    comparisons,
    sensitivity,
    multiSeed,
    plausibility,
  };
}
