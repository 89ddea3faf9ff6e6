/**
 * Run configuration schema.
 *
 * Everything a single evaluation run needs beyond the record set. Parsed
 * once, before any labeling or selection work; a bad value is a
 * ConfigurationError.
 */

import { z } from 'zod';
import { ConfigurationError } from '../../../common/errors.js';
import {
  DEFAULT_BOOTSTRAP_ITERATIONS,
  DEFAULT_COST_RATIO_GRID,
  MAX_BOOTSTRAP_ITERATIONS,
} from '../contracts/inspection.contracts.js';
import { MAX_SEED } from '../selection/selection.params.js';

const fraction = z.number().gt(0).lte(1);
const positive = z.number().finite().positive();
const seed = z.number().int().min(0).max(MAX_SEED);

export const BudgetConfigSchema = z.object({
  severityColumn: z.string().min(1).default('severity'),
  mandatoryPredicates: z.array(z.string().min(1)).default([]),
  /** Cost of one follow-up measurement. */
  followUpUnitCost: positive.default(1),
  totalBudget: z.number().finite().nonnegative().nullable().default(null),
  maxCount: z.number().int().nonnegative().nullable().default(null),
  candidateTopFraction: fraction.default(1),
  physicalDamageLabel: z.string().min(1).nullable().default(null),
});

export const RunConfigSchema = BudgetConfigSchema.extend({
  quantile: fraction.default(0.2),
  selectionRate: fraction.default(0.1),
  /** Cost of one inline inspection. */
  unitCost: positive.default(1),
  frameworkScoreColumn: z.string().min(1).default('risk_score'),
  baselineScoreColumn: z.string().min(1).default('rule_score'),
  seed: seed.default(0),
  bootstrap: z
    .object({
      iterations: z.number().int().min(1).max(MAX_BOOTSTRAP_ITERATIONS).default(DEFAULT_BOOTSTRAP_ITERATIONS),
      seed: seed.default(0),
      metric: z.enum(['recall', 'cost']).default('recall'),
    })
    .default({}),
  costRatioGrid: z.array(positive).min(1).default([...DEFAULT_COST_RATIO_GRID]),
  multiSeed: z
    .object({
      nSeeds: z.number().int().min(1).max(10_000).default(50),
      baseSeed: seed.default(0),
    })
    .default({}),
  costForm: z.enum(['normalized', 'absolute']).default('normalized'),
});

export type BudgetConfig = z.infer<typeof BudgetConfigSchema>;
export type RunConfig = z.infer<typeof RunConfigSchema>;

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.infer<T> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Invalid ${what}: ${issues.join('; ')}`, parsed.error.issues);
  }
  return parsed.data;
}

export function parseRunConfig(input: unknown): RunConfig {
  return parseWith(RunConfigSchema, input, 'run configuration');
}

export function parseBudgetConfig(input: unknown): BudgetConfig {
  return parseWith(BudgetConfigSchema, input, 'budget configuration');
}
