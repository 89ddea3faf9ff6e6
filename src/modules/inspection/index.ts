/**
 * Inspection Module Public API
 */

export { registerInspectionModule } from './runtime/inspection.module.js';
export { InspectionService } from './runtime/inspection.service.js';
export type { InspectionHostDeps, Logger, Clock } from './runtime/inspection.host.deps.js';
export { runEvaluation, runFollowUpSelection, METHOD, type RunReport, type RunInput } from './runtime/inspection.pipeline.js';
export { parseRunConfig, parseBudgetConfig, type RunConfig, type BudgetConfig } from './runtime/inspection.config.js';
export * from './contracts/inspection.contracts.js';
export { parseRecordSet, assertRecordSet, attachModelScores } from './contracts/record.schema.js';
export { labelHighRisk } from './labeling/risk.labeler.js';
export * from './selection/index.js';
export { evaluateSelection, evaluatePolicy, normalizeMetrics, compareMethods } from './evaluation/evaluation.metrics.js';
export { ComparativeValidator } from './validation/comparative.validator.js';
export { bootstrapDifferenceCI } from './validation/bootstrap.ci.js';
export { checkProxyPlausibility } from './validation/proxy.checker.js';
export { SensitivitySweepService, classifyDominance } from './sim/sweep.sensitivity.service.js';
export { MultiSeedSweepService } from './sim/sweep.multi-seed.service.js';
export {
  InMemoryDefinitionStore,
  MongoDefinitionStore,
  type DefinitionStore,
  type StoredDefinition,
} from './storage/definition.store.js';
