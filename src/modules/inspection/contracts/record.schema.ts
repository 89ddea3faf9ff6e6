/**
 * Record set parsing and integrity checks.
 *
 * Raw JSON rows go through the zod schema; the resulting WaferRecord[] is
 * then checked for the invariants the core relies on (non-empty, unique ids,
 * finite outcomes). Column-level checks run per operation, before any
 * selection is computed.
 */

import { z } from 'zod';
import { ConfigurationError, DataIntegrityError } from '../../../common/errors.js';
import type { WaferRecord, RiskModel } from './inspection.contracts.js';

export const RawRecordSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(v => String(v)),
  outcome: z.number(),
  scores: z.record(z.number()).default({}),
  flags: z.record(z.boolean()).default({}),
  predictedLabel: z.string().default(''),
  lotId: z.string().optional(),
});

export const RawRecordSetSchema = z.array(RawRecordSchema);

/** Parse unknown JSON into a validated, frozen record set. */
export function parseRecordSet(input: unknown): WaferRecord[] {
  const parsed = RawRecordSetSchema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new DataIntegrityError(
      `Malformed record at ${first.path.join('.')}: ${first.message}`,
      parsed.error.issues.slice(0, 20)
    );
  }
  const records = parsed.data.map(r => Object.freeze({ ...r }));
  assertRecordSet(records);
  return records;
}

export function assertRecordSet(records: readonly WaferRecord[]): void {
  if (records.length === 0) {
    throw new DataIntegrityError('Record set is empty (N = 0)');
  }
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const r of records) {
    if (seen.has(r.id)) duplicates.push(r.id);
    seen.add(r.id);
    if (!Number.isFinite(r.outcome)) {
      throw new DataIntegrityError(`Record ${r.id} has a non-finite outcome`);
    }
  }
  if (duplicates.length) {
    throw new DataIntegrityError(
      `Duplicate record identifiers: ${duplicates.slice(0, 10).join(', ')}`,
      { duplicates }
    );
  }
}

/**
 * Score column accessor. Missing column → ConfigurationError,
 * non-finite value → DataIntegrityError.
 */
export function requireScoreColumn(records: readonly WaferRecord[], column: string): number[] {
  const missing = records.filter(r => !Object.hasOwn(r.scores, column));
  if (missing.length) {
    throw new ConfigurationError(
      `Score column '${column}' is missing on ${missing.length} record(s), e.g. ${missing[0].id}`
    );
  }
  return records.map(r => {
    const v = r.scores[column];
    if (!Number.isFinite(v)) {
      throw new DataIntegrityError(`Record ${r.id} has a non-finite '${column}' score`);
    }
    return v;
  });
}

export function requireFlagColumn(records: readonly WaferRecord[], flag: string): void {
  const missing = records.find(r => !Object.hasOwn(r.flags, flag) || typeof r.flags[flag] !== 'boolean');
  if (missing) {
    throw new ConfigurationError(`Mandatory flag '${flag}' is missing on record ${missing.id}`);
  }
}

/** Returns new records with the model's predictions stored under `column`. */
export function attachModelScores(
  records: readonly WaferRecord[],
  model: RiskModel,
  column: string
): WaferRecord[] {
  const predictions = model.predict(records);
  if (predictions.length !== records.length) {
    throw new DataIntegrityError(
      `Model '${model.name}' returned ${predictions.length} predictions for ${records.length} records`
    );
  }
  return records.map((r, i) => {
    const p = predictions[i];
    if (!Number.isFinite(p)) {
      throw new DataIntegrityError(`Model '${model.name}' returned a non-finite score for ${r.id}`);
    }
    return Object.freeze({ ...r, scores: { ...r.scores, [column]: p } });
  });
}
