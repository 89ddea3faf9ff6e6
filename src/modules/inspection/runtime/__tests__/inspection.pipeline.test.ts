import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../../../common/errors.js';
import type { NormalizedMetrics, RiskModel, WaferRecord } from '../../contracts/inspection.contracts.js';
import { parseRunConfig } from '../inspection.config.js';
import { runEvaluation, runFollowUpSelection } from '../inspection.pipeline.js';
import { mockLogger, uniformRecords } from '../../__tests__/test.fixtures.js';

const records = uniformRecords(100);
const byId = new Map(records.map(r => [r.id, r]));

const baseConfig = {
  quantile: 0.2,
  selectionRate: 0.2,
  maxCount: 5,
  mandatoryPredicates: ['edge'],
  physicalDamageLabel: 'scratch',
  bootstrap: { iterations: 200, seed: 1 },
  multiSeed: { nSeeds: 10 },
};

function isNormalized(m: object): m is NormalizedMetrics {
  return 'inspectionsPerCatch' in m;
}

describe('runEvaluation', () => {
  it('produces a complete normalized report', () => {
    const logger = mockLogger();
    const report = runEvaluation({ records, config: parseRunConfig(baseConfig) }, logger);

    expect(report.definition.k).toBe(20);
    expect(report.nHighRisk).toBe(20);
    expect(report.costForm).toBe('normalized');
    expect(report.selections.framework.nSelected).toBe(20);
    expect(report.selections.random.nSelected).toBe(20);

    const fw = report.metrics.framework;
    expect(isNormalized(fw)).toBe(true);
    expect(fw.recall).toBe(1);
    expect('totalCost' in fw).toBe(false);

    expect(report.methodTable.map(r => r.method)).toEqual(['random', 'rule_based', 'framework']);
    expect(report.comparisons.map(c => [c.baseline, c.candidate])).toEqual([
      ['random', 'framework'],
      ['rule_based', 'framework'],
    ]);
    expect(report.sensitivity.rows).toHaveLength(6 * 4);
    expect(report.multiSeed.nSeeds).toBe(10);
    expect(report.plausibility).toBeNull();
    expect(report.followUp.totalCost).toBeUndefined();
    expect(logger.info).toHaveBeenCalledWith(expect.any(Object), '[Pipeline] Evaluation complete');
  });

  it('routes the framework selection through the budgeted follow-up', () => {
    const report = runEvaluation({ records, config: parseRunConfig(baseConfig) }, mockLogger());
    const fu = report.followUp;
    const frameworkIds = new Set(report.selections.framework.selectedIds);
    const selectedIds = fu.selected.map(s => s.id);

    for (const id of [...selectedIds, ...fu.remainderIds, ...fu.physicalDamageIds]) {
      expect(frameworkIds.has(id)).toBe(true);
    }
    for (const id of fu.physicalDamageIds) {
      expect(byId.get(id)?.predictedLabel).toBe('scratch');
      expect(selectedIds).not.toContain(id);
    }
    for (const id of fu.mandatoryIds) expect(selectedIds).toContain(id);
    expect(fu.candidatePoolSize + fu.physicalDamageIds.length).toBe(20);
    expect(fu.nSelected + fu.remainderIds.length).toBe(fu.candidatePoolSize);
    if (fu.budgetOverrun) {
      expect(fu.nSelected).toBe(fu.mandatoryIds.length);
    } else {
      expect(fu.nSelected).toBe(Math.min(5, fu.candidatePoolSize));
    }

    const fwRow = report.sensitivity.rows.find(r => r.method === 'framework');
    expect(fwRow?.secondaryUnits).toBe(fu.nSelected);
    expect(fwRow?.primaryUnits).toBe(20);
  });

  it('keeps currency figures in absolute form', () => {
    const report = runEvaluation(
      { records, config: parseRunConfig({ ...baseConfig, costForm: 'absolute', unitCost: 4, followUpUnitCost: 30 }) },
      mockLogger()
    );
    const fw = report.metrics.framework;
    expect(isNormalized(fw)).toBe(false);
    expect('totalCost' in fw && fw.totalCost).toBe(80);
    expect(report.followUp.totalCost).toBe(report.followUp.nSelected * 30);
  });

  it('scores records with an injected model', () => {
    const model: RiskModel = {
      name: 'inverse-yield',
      predict: (rs: readonly WaferRecord[]) => rs.map(r => -r.outcome),
    };
    const stripped = records.map(r => ({ ...r, scores: { rule_score: r.scores.rule_score, severity: r.scores.severity } }));
    const report = runEvaluation(
      { records: stripped, config: parseRunConfig({ ...baseConfig, frameworkScoreColumn: 'model_score' }), model },
      mockLogger()
    );
    expect(report.metrics.framework.recall).toBe(1);
  });

  it('attaches a plausibility verdict when proxy data is supplied', () => {
    const report = runEvaluation(
      {
        records,
        config: parseRunConfig(baseConfig),
        proxy: { sourceA: [1, 2, 3, 4, 5, 6], sourceB: [7, 8, 9, 10, 11, 12] },
      },
      mockLogger()
    );
    expect(report.plausibility?.status).toBe('FAILED_PLAUSIBILITY');
    expect(report.plausibility?.evidence).toBe('CORRELATIONAL');
  });

  it('fails fast on a missing column before any work is logged', () => {
    const logger = mockLogger();
    const config = parseRunConfig({ ...baseConfig, baselineScoreColumn: 'absent' });
    expect(() => runEvaluation({ records, config }, logger)).toThrow(ConfigurationError);
    expect(logger.info).not.toHaveBeenCalled();
  });

  it('fails fast on an unknown mandatory flag', () => {
    const config = parseRunConfig({ ...baseConfig, mandatoryPredicates: ['edge', 'unknown'] });
    expect(() => runEvaluation({ records, config }, mockLogger())).toThrow(ConfigurationError);
  });
});

describe('runFollowUpSelection', () => {
  it('flags an overrun when mandatory records exceed the cap', () => {
    const result = runFollowUpSelection(records, {
      severityColumn: 'severity',
      mandatoryPredicates: ['edge'],
      followUpUnitCost: 1,
      totalBudget: null,
      maxCount: 3,
      candidateTopFraction: 1,
      physicalDamageLabel: null,
    });
    // every tenth record carries the edge flag
    expect(result.selection.mandatoryIds).toHaveLength(10);
    expect(result.selection.nSelected).toBe(10);
    expect(result.selection.budgetOverrun).toBe(true);
    expect(result.candidatePoolSize).toBe(100);
  });
});
