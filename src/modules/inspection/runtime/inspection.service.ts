/**
 * Inspection Service
 *
 * Request-level operations behind the HTTP routes. Parses raw bodies,
 * runs the pure core and persists high-risk definitions for audit.
 */

import { z } from 'zod';
import { ConfigurationError, NotFoundError } from '../../../common/errors.js';
import type { HighRiskLabeling, ProxyVerdict } from '../contracts/inspection.contracts.js';
import { parseRecordSet } from '../contracts/record.schema.js';
import { labelHighRisk } from '../labeling/risk.labeler.js';
import type { StoredDefinition } from '../storage/definition.store.js';
import { checkProxyPlausibility } from '../validation/proxy.checker.js';
import { parseBudgetConfig, parseRunConfig } from './inspection.config.js';
import type { InspectionHostDeps } from './inspection.host.deps.js';
import { runEvaluation, runFollowUpSelection, type RunReport } from './inspection.pipeline.js';

const RunBody = z.object({
  records: z.unknown(),
  config: z.unknown().optional(),
  proxy: z
    .object({
      sourceA: z.array(z.number()),
      sourceB: z.array(z.number()),
    })
    .optional(),
});

const LabelBody = z.object({
  records: z.unknown(),
  quantile: z.number(),
});

const BudgetedBody = z.object({
  records: z.unknown(),
  config: z.unknown().optional(),
});

const ProxyBody = z.object({
  sourceA: z.array(z.number()),
  sourceB: z.array(z.number()),
});

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Invalid request body: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export interface RunResponse {
  runId: string;
  createdAt: string;
  report: RunReport;
}

export interface BudgetedResponse {
  cap: number | null;
  budgetOverrun: boolean;
  candidatePoolSize: number;
  severityThreshold: number;
  selected: { id: string; cost: number; reason: string }[];
  remainder: { id: string; cost: number; reason: string }[];
  mandatoryIds: readonly string[];
  physicalDamage: { id: string; cost: number; reason: string }[];
}

export class InspectionService {
  constructor(private readonly deps: InspectionHostDeps) {}

  async createRun(body: unknown): Promise<RunResponse> {
    const { records: rawRecords, config: rawConfig, proxy } = parseBody(RunBody, body);
    const config = parseRunConfig(rawConfig);
    const records = parseRecordSet(rawRecords);

    const report = runEvaluation({ records, config, proxy }, this.deps.logger);
    const runId = this.deps.newRunId();
    const stored = await this.deps.store.save(runId, report.definition, this.deps.clock.now());

    this.deps.logger.info({ runId, sourceHash: report.definition.sourceHash }, '[Inspection] Run stored');
    return { runId, createdAt: stored.createdAt, report };
  }

  async getDefinition(runId: string): Promise<StoredDefinition> {
    const stored = await this.deps.store.get(runId);
    if (!stored) throw new NotFoundError(`No definition stored for run ${runId}`);
    return stored;
  }

  label(body: unknown): HighRiskLabeling {
    const { records: rawRecords, quantile } = parseBody(LabelBody, body);
    return labelHighRisk(parseRecordSet(rawRecords), { quantile });
  }

  selectBudgeted(body: unknown): BudgetedResponse {
    const { records: rawRecords, config: rawConfig } = parseBody(BudgetedBody, body);
    const config = parseBudgetConfig(rawConfig);
    const records = parseRecordSet(rawRecords);
    const result = runFollowUpSelection(records, config);
    const sel = result.selection;
    return {
      cap: sel.cap,
      budgetOverrun: sel.budgetOverrun,
      candidatePoolSize: result.candidatePoolSize,
      severityThreshold: result.severityThreshold,
      selected: sel.rows.map(r => ({ ...r })),
      remainder: sel.remainder.map(r => ({ ...r })),
      mandatoryIds: sel.mandatoryIds,
      physicalDamage: result.physicalDamage.map(r => ({ ...r })),
    };
  }

  proxy(body: unknown): ProxyVerdict {
    const { sourceA, sourceB } = parseBody(ProxyBody, body);
    return checkProxyPlausibility(sourceA, sourceB);
  }
}
