import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../../../common/errors.js';
import { parseBudgetConfig, parseRunConfig } from '../inspection.config.js';

describe('parseRunConfig', () => {
  it('fills defaults', () => {
    const config = parseRunConfig({});
    expect(config.quantile).toBe(0.2);
    expect(config.selectionRate).toBe(0.1);
    expect(config.costRatioGrid).toEqual([1, 2, 3, 5, 7, 10]);
    expect(config.bootstrap).toEqual({ iterations: 10_000, seed: 0, metric: 'recall' });
    expect(config.multiSeed).toEqual({ nSeeds: 50, baseSeed: 0 });
    expect(config.costForm).toBe('normalized');
    expect(config.totalBudget).toBeNull();
    expect(config.maxCount).toBeNull();
    expect(config.mandatoryPredicates).toEqual([]);
  });

  it('treats a missing body as all defaults', () => {
    expect(parseRunConfig(undefined)).toEqual(parseRunConfig({}));
  });

  it('rejects values outside their domain', () => {
    expect(() => parseRunConfig({ quantile: 0 })).toThrow(ConfigurationError);
    expect(() => parseRunConfig({ selectionRate: 1.01 })).toThrow(ConfigurationError);
    expect(() => parseRunConfig({ unitCost: 0 })).toThrow(ConfigurationError);
    expect(() => parseRunConfig({ maxCount: 1.5 })).toThrow(ConfigurationError);
    expect(() => parseRunConfig({ totalBudget: -5 })).toThrow(ConfigurationError);
    expect(() => parseRunConfig({ bootstrap: { iterations: 0 } })).toThrow(ConfigurationError);
    expect(() => parseRunConfig({ bootstrap: { iterations: 100_001 } })).toThrow(ConfigurationError);
    expect(() => parseRunConfig({ costRatioGrid: [] })).toThrow(ConfigurationError);
    expect(() => parseRunConfig({ seed: -1 })).toThrow(ConfigurationError);
    expect(() => parseRunConfig({ bootstrap: { seed: 2 ** 32 } })).toThrow(ConfigurationError);
  });

  it('names the offending field', () => {
    expect(() => parseRunConfig({ quantile: 2 })).toThrow(/quantile/);
  });
});

describe('parseBudgetConfig', () => {
  it('keeps budget fields', () => {
    const config = parseBudgetConfig({ maxCount: 10, mandatoryPredicates: ['edge'], physicalDamageLabel: 'scratch' });
    expect(config).toEqual({
      severityColumn: 'severity',
      mandatoryPredicates: ['edge'],
      followUpUnitCost: 1,
      totalBudget: null,
      maxCount: 10,
      candidateTopFraction: 1,
      physicalDamageLabel: 'scratch',
    });
  });
});
