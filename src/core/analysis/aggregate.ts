import type { CommitReport } from './types';

export interface BatchSummary {
  commits: number;
  totalFunctions: number;
  withCoverage: number;
  withoutCoverage: number;
  /** Percent, unrounded. 0 when nothing changed. */
  overallCoverage: number;
  minCoverage: number | null;
  passed: boolean;
}

export function coveragePercent(covered: number, changed: number): number {
  return changed === 0 ? 0 : (covered / changed) * 100;
}

export function formatPercent(p: number): string {
  return p.toFixed(1);
}

/**
 * Sums per-commit totals. With a threshold, the batch passes when its
 * rounded coverage reaches it; a batch that changed no function passes.
 */
export function aggregateReports(reports: readonly CommitReport[], minCoverage?: number): BatchSummary {
  let totalFunctions = 0;
  let withCoverage = 0;
  for (const r of reports) {
    totalFunctions += r.totals.changed;
    withCoverage += r.totals.covered;
  }
  const overallCoverage = coveragePercent(withCoverage, totalFunctions);
  const passed = minCoverage === undefined
    || totalFunctions === 0
    || Number(formatPercent(overallCoverage)) >= minCoverage;
  return {
    commits: reports.length,
    totalFunctions,
    withCoverage,
    withoutCoverage: totalFunctions - withCoverage,
    overallCoverage,
    minCoverage: minCoverage ?? null,
    passed,
  };
}
