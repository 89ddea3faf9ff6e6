/**
 * Multi-Seed Null Sweep
 *
 * Random selection at a fixed rate across seeds baseSeed … baseSeed + n − 1.
 * The recall band is the reference a real selection policy must beat.
 */

import { ConfigurationError, DataIntegrityError } from '../../../common/errors.js';
import type { MultiSeedSweepResult, SeedRun } from '../contracts/inspection.contracts.js';
import { defaultLogger, type Logger } from '../runtime/inspection.host.deps.js';
import { randomIndices } from '../selection/selection.random.js';
import { assertRate, assertSeed } from '../selection/selection.params.js';
import { mean, percentile, sortAscending, stdevPopulation } from '../stats/stats.utils.js';

export const MAX_SWEEP_SEEDS = 10_000;

export interface MultiSeedSweepParams {
  mask: readonly boolean[];
  rate: number;
  nSeeds: number;
  baseSeed?: number;
}

export class MultiSeedSweepService {
  constructor(private readonly logger: Logger = defaultLogger) {}

  run(params: MultiSeedSweepParams): MultiSeedSweepResult {
    const baseSeed = params.baseSeed ?? 0;
    assertRate(params.rate);
    assertSeed(baseSeed);
    if (!Number.isInteger(params.nSeeds) || params.nSeeds < 1 || params.nSeeds > MAX_SWEEP_SEEDS) {
      throw new ConfigurationError(`nSeeds must be an integer in [1, ${MAX_SWEEP_SEEDS}], got ${params.nSeeds}`);
    }
    assertSeed(baseSeed + params.nSeeds - 1);
    const n = params.mask.length;
    if (n === 0) {
      throw new DataIntegrityError('multi-seed sweep needs at least one record');
    }

    const nHighRisk = params.mask.filter(Boolean).length;
    const runs: SeedRun[] = [];
    let nSelectedPerRun = 0;

    for (let s = 0; s < params.nSeeds; s++) {
      const seed = baseSeed + s;
      const picked = randomIndices(n, params.rate, seed);
      nSelectedPerRun = picked.length;
      let tp = 0;
      for (const i of picked) if (params.mask[i]) tp++;
      const fn = nHighRisk - tp;
      runs.push({ seed, tp, fn, recall: nHighRisk > 0 ? tp / nHighRisk : 0 });
    }

    const recalls = runs.map(r => r.recall);
    const sorted = sortAscending(recalls);
    const recall = {
      mean: mean(recalls),
      std: stdevPopulation(recalls),
      p05: percentile(sorted, 0.05),
      p50: percentile(sorted, 0.5),
      p95: percentile(sorted, 0.95),
    };

    this.logger.info(
      { nSeeds: params.nSeeds, baseSeed, rate: params.rate, p05: recall.p05, p50: recall.p50, p95: recall.p95 },
      '[Sweep] Multi-seed sweep complete'
    );

    return {
      nSeeds: params.nSeeds,
      baseSeed,
      rate: params.rate,
      nTotal: n,
      nHighRisk,
      nSelectedPerRun,
      runs,
      recall,
    };
  }
}
