/**
 * Cost-Ratio Sensitivity Sweep
 *
 * For each ratio r a follow-up measurement costs r inline inspections:
 *   normalizedCost = primaryUnits + r · secondaryUnits
 *
 * The framework is classified against every baseline at every grid point.
 * A single dominant point proves nothing; the tally across the grid is
 * the robustness signal.
 */

import { ConfigurationError } from '../../../common/errors.js';
import {
  DEFAULT_COST_RATIO_GRID,
  type DominanceType,
  type SensitivityRow,
  type SensitivitySweepResult,
} from '../contracts/inspection.contracts.js';
import { defaultLogger, type Logger } from '../runtime/inspection.host.deps.js';
import { approxEqual } from '../stats/stats.utils.js';

/** |a − b| ≤ tol · max(1, |a|, |b|) counts as equal. */
export const DOMINANCE_TOLERANCE = 1e-9;

export interface MethodOperatingPoint {
  name: string;
  recall: number;
  tp: number;
  /** Inline inspections. */
  primaryUnits: number;
  /** Costly follow-up measurements. */
  secondaryUnits: number;
}

export interface SensitivitySweepParams {
  framework: MethodOperatingPoint;
  baselines: MethodOperatingPoint[];
  grid?: readonly number[];
  tolerance?: number;
}

export function normalizedCost(point: MethodOperatingPoint, r: number): number {
  return point.primaryUnits + r * point.secondaryUnits;
}

export function classifyDominance(
  framework: { recall: number; cost: number },
  baseline: { recall: number; cost: number },
  tolerance = DOMINANCE_TOLERANCE
): DominanceType {
  const costEq = approxEqual(framework.cost, baseline.cost, tolerance);
  const recallEq = approxEqual(framework.recall, baseline.recall, tolerance);
  const costLe = costEq || framework.cost < baseline.cost;
  const recallGe = recallEq || framework.recall > baseline.recall;

  if (costLe && !recallEq && framework.recall > baseline.recall) return 'recall_dominance';
  if (recallGe && !costEq && framework.cost < baseline.cost) return 'cost_dominance';
  return 'none';
}

function assertGrid(grid: readonly number[]): void {
  if (grid.length === 0) {
    throw new ConfigurationError('cost ratio grid is empty');
  }
  for (const r of grid) {
    if (!Number.isFinite(r) || r <= 0) {
      throw new ConfigurationError(`cost ratio must be a positive number, got ${r}`);
    }
  }
}

function assertPoint(p: MethodOperatingPoint): void {
  const units = [p.primaryUnits, p.secondaryUnits, p.tp];
  if (units.some(u => !Number.isInteger(u) || u < 0)) {
    throw new ConfigurationError(`method ${p.name}: unit counts must be non-negative integers`);
  }
  if (!(p.recall >= 0 && p.recall <= 1)) {
    throw new ConfigurationError(`method ${p.name}: recall must be in [0, 1], got ${p.recall}`);
  }
}

function emptyTally(): Record<DominanceType, number> {
  return { recall_dominance: 0, cost_dominance: 0, none: 0 };
}

export class SensitivitySweepService {
  constructor(private readonly logger: Logger = defaultLogger) {}

  run(params: SensitivitySweepParams): SensitivitySweepResult {
    const grid = params.grid ?? DEFAULT_COST_RATIO_GRID;
    const tolerance = params.tolerance ?? DOMINANCE_TOLERANCE;
    assertGrid(grid);
    assertPoint(params.framework);
    params.baselines.forEach(assertPoint);

    const names = new Set<string>([params.framework.name]);
    for (const b of params.baselines) {
      if (names.has(b.name)) {
        throw new ConfigurationError(`duplicate method name: ${b.name}`);
      }
      names.add(b.name);
    }

    const rows: SensitivityRow[] = [];
    const tally = emptyTally();
    const byComparator: Record<string, Record<DominanceType, number>> = {};
    for (const b of params.baselines) byComparator[b.name] = emptyTally();

    const makeRow = (
      r: number,
      p: MethodOperatingPoint,
      comparator: string | null,
      dominanceType: DominanceType | null
    ): SensitivityRow => {
      const cost = normalizedCost(p, r);
      return {
        r,
        method: p.name,
        comparator,
        recall: p.recall,
        primaryUnits: p.primaryUnits,
        secondaryUnits: p.secondaryUnits,
        normalizedCost: cost,
        costPerCatch: p.tp > 0 ? cost / p.tp : null,
        dominanceType,
      };
    };

    for (const r of grid) {
      const fwCost = normalizedCost(params.framework, r);
      for (const b of params.baselines) {
        rows.push(makeRow(r, b, null, null));
      }
      for (const b of params.baselines) {
        const type = classifyDominance(
          { recall: params.framework.recall, cost: fwCost },
          { recall: b.recall, cost: normalizedCost(b, r) },
          tolerance
        );
        tally[type]++;
        byComparator[b.name][type]++;
        rows.push(makeRow(r, params.framework, b.name, type));
      }
    }

    this.logger.info(
      { gridPoints: grid.length, baselines: params.baselines.length, tally },
      '[Sweep] Sensitivity sweep complete'
    );

    return { grid: [...grid], tolerance, rows, tally, byComparator };
  }
}
