import { describe, it, expect } from 'vitest';
import { ConfigurationError, DataIntegrityError } from '../../../../common/errors.js';
import { labelHighRisk } from '../../labeling/risk.labeler.js';
import { MultiSeedSweepService } from '../sweep.multi-seed.service.js';
import { mockLogger, uniformRecords } from '../../__tests__/test.fixtures.js';

describe('MultiSeedSweepService', () => {
  const { mask } = labelHighRisk(uniformRecords(200), { quantile: 0.2 });

  it('reports a recall band around the selection rate', () => {
    const result = new MultiSeedSweepService(mockLogger()).run({ mask, rate: 0.1, nSeeds: 50 });
    expect(result.runs).toHaveLength(50);
    expect(result.runs.map(r => r.seed)).toEqual(Array.from({ length: 50 }, (_, i) => i));
    expect(result.nSelectedPerRun).toBe(20);
    expect(result.nHighRisk).toBe(40);
    expect(result.runs.every(r => r.tp + r.fn === 40)).toBe(true);
    expect(result.recall.p05).toBeLessThanOrEqual(result.recall.p50);
    expect(result.recall.p50).toBeLessThanOrEqual(result.recall.p95);
    expect(result.recall.p50).toBeGreaterThanOrEqual(0.05);
    expect(result.recall.p50).toBeLessThanOrEqual(0.15);
    const mean = result.runs.reduce((acc, r) => acc + r.recall, 0) / 50;
    expect(result.recall.mean).toBeCloseTo(mean, 12);
  });

  it('is reproducible and honours the base seed', () => {
    const service = new MultiSeedSweepService(mockLogger());
    const a = service.run({ mask, rate: 0.2, nSeeds: 5, baseSeed: 10 });
    const b = service.run({ mask, rate: 0.2, nSeeds: 5, baseSeed: 10 });
    expect(b).toEqual(a);
    expect(a.runs.map(r => r.seed)).toEqual([10, 11, 12, 13, 14]);
  });

  it('rejects bad parameters', () => {
    const service = new MultiSeedSweepService(mockLogger());
    expect(() => service.run({ mask, rate: 0.1, nSeeds: 0 })).toThrow(ConfigurationError);
    expect(() => service.run({ mask, rate: 0, nSeeds: 5 })).toThrow(ConfigurationError);
    expect(() => service.run({ mask: [], rate: 0.1, nSeeds: 5 })).toThrow(DataIntegrityError);
    expect(() => service.run({ mask, rate: 0.1, nSeeds: 2, baseSeed: 2 ** 32 - 1 })).toThrow(ConfigurationError);
    expect(() => service.run({ mask, rate: 0.1, nSeeds: 2, baseSeed: -1 })).toThrow(ConfigurationError);
  });
});
