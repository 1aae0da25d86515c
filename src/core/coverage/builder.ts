import { CoverageMapAccumulator, type CoverageMap } from '../coverageMap';
import { CounterResetError, errorMessage } from '../errors';
import { nullLogger, type Logger } from '../log';
import type { IsolatedCoverageSession } from './recorder';
import type { TestCase, TestRunOutcome } from './types';

export interface TestRunSummary {
  test: string;
  outcome: TestRunOutcome;
  functions: number;
  skippedSymbols: number;
  /** Set when coverage could not be extracted for this test. */
  extractError?: string;
}

export interface ShardResult {
  map: CoverageMap;
  results: TestRunSummary[];
}

export interface ShardProgress {
  total: number;
  done: number;
  current?: string;
}

export interface BuildShardOptions {
  log?: Logger;
  onProgress?: (p: ShardProgress) => void;
}

/**
 * Records every test of a shard, one isolated cycle at a time, and folds the
 * results into a coverage map. A counter reset failure ends the shard; any
 * other per-test problem only costs that test's entry.
 */
export async function buildShard(
  session: IsolatedCoverageSession,
  tests: readonly TestCase[],
  opts: BuildShardOptions = {},
): Promise<ShardResult> {
  const log = opts.log ?? nullLogger;
  const acc = new CoverageMapAccumulator();
  const results: TestRunSummary[] = [];

  opts.onProgress?.({ total: tests.length, done: 0 });
  for (let i = 0; i < tests.length; i++) {
    const test = tests[i];
    try {
      const cov = await session.record(test);
      for (const id of cov.functions) acc.add(id, test.name);
      results.push({ test: test.name, outcome: cov.outcome, functions: cov.functions.length, skippedSymbols: cov.skippedSymbols });
      const level = cov.outcome.passed ? 'info' : 'warn';
      log[level]('test_recorded', {
        test: test.name,
        id: test.id,
        passed: cov.outcome.passed,
        timedOut: cov.outcome.timedOut,
        functions: cov.functions.length,
        duration_ms: cov.outcome.durationMs,
      });
    } catch (e) {
      if (e instanceof CounterResetError) throw e;
      log.warn('test_coverage_lost', { test: test.name, id: test.id, err: errorMessage(e) });
      results.push({
        test: test.name,
        outcome: { passed: false, exitCode: null, timedOut: false, durationMs: 0 },
        functions: 0,
        skippedSymbols: 0,
        extractError: errorMessage(e),
      });
    }
    opts.onProgress?.({ total: tests.length, done: i + 1, current: test.name });
  }

  return { map: acc.toMap(), results };
}
