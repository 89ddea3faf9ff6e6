/**
 * Audit store for high-risk definitions.
 *
 * Definitions are write-once: saving a run id twice is an error.
 */

import { AppError } from '../../../common/errors.js';
import type { HighRiskDefinition } from '../contracts/inspection.contracts.js';
import { InspectionDefinitionModel, type IInspectionDefinition } from './inspection-definition.model.js';

export interface StoredDefinition {
  runId: string;
  createdAt: string;
  definition: HighRiskDefinition;
}

export interface DefinitionStore {
  save(runId: string, definition: HighRiskDefinition, createdAt: number): Promise<StoredDefinition>;
  get(runId: string): Promise<StoredDefinition | null>;
}

export class DuplicateRunError extends AppError {
  constructor(runId: string) {
    super('DUPLICATE_RUN', `Definition for run ${runId} already stored`, 409);
  }
}

// ═══════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════

export class InMemoryDefinitionStore implements DefinitionStore {
  private readonly items = new Map<string, StoredDefinition>();

  async save(runId: string, definition: HighRiskDefinition, createdAt: number): Promise<StoredDefinition> {
    if (this.items.has(runId)) throw new DuplicateRunError(runId);
    const stored: StoredDefinition = {
      runId,
      createdAt: new Date(createdAt).toISOString(),
      definition,
    };
    this.items.set(runId, stored);
    return stored;
  }

  async get(runId: string): Promise<StoredDefinition | null> {
    return this.items.get(runId) ?? null;
  }

  get size(): number {
    return this.items.size;
  }
}

// ═══════════════════════════════════════════════════════════════
// MONGO
// ═══════════════════════════════════════════════════════════════

function toStored(doc: IInspectionDefinition): StoredDefinition {
  return {
    runId: doc.runId,
    createdAt: doc.createdAt.toISOString(),
    definition: {
      method: 'bottom_quantile_fixed_k',
      quantile: doc.quantile,
      n: doc.n,
      k: doc.k,
      actualRate: doc.actualRate,
      thresholdYieldAtK: doc.thresholdYieldAtK,
      thresholdYieldNext: doc.thresholdYieldNext,
      tieBreaker: 'id_ascending',
      sourceHash: doc.sourceHash,
    },
  };
}

export class MongoDefinitionStore implements DefinitionStore {
  async save(runId: string, definition: HighRiskDefinition, createdAt: number): Promise<StoredDefinition> {
    const existing = await InspectionDefinitionModel.exists({ runId });
    if (existing) throw new DuplicateRunError(runId);
    const doc: IInspectionDefinition = {
      runId,
      ...definition,
      createdAt: new Date(createdAt),
    };
    await InspectionDefinitionModel.create(doc);
    return toStored(doc);
  }

  async get(runId: string): Promise<StoredDefinition | null> {
    const doc = await InspectionDefinitionModel.findOne({ runId }).lean<IInspectionDefinition | null>();
    return doc ? toStored(doc) : null;
  }
}
