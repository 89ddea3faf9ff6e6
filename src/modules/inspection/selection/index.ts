/**
 * Selection policies: random, rule-based top-k, budgeted with mandatory override.
 */

export { randomSelection, randomIndices, type RandomSelectionParams } from './selection.random.js';
export { ruleBasedSelection, topIndicesByScore, type RuleBasedSelectionParams } from './selection.rule-based.js';
export { selectBudgetedMandatory, type BudgetedSelectionParams } from './selection.budgeted.js';
export { buildCandidatePool, type CandidatePool, type CandidatePoolParams } from './selection.candidates.js';
export { resolveCap, flagPredicates, assertRate, assertUnitCost, assertSeed, MAX_SEED } from './selection.params.js';
export { selectionFlags } from './selection.rows.js';
