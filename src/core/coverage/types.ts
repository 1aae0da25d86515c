import type { FunctionIdentity } from '../identity';
import type { FastcovReport } from './fastcov';

export interface TestCase {
  /** Position in the build system's own numbering (ctest's `#N`). */
  id: number;
  name: string;
}

export interface TestRunOutcome {
  passed: boolean;
  exitCode: number | null;
  timedOut: boolean;
  durationMs: number;
  error?: string;
}

/**
 * The instrumented build as seen by the recorder. One implementation per
 * build system; tests substitute an in-memory one.
 */
export interface CoverageToolchain {
  listTests(): Promise<TestCase[]>;
  /** Zeroes every coverage counter of the instrumented binary. */
  zeroCounters(): Promise<void>;
  runTest(test: TestCase, timeoutMs: number): Promise<TestRunOutcome>;
  /** Report covering everything executed since the last reset. */
  captureReport(): Promise<FastcovReport>;
}

export interface TestCoverage {
  test: TestCase;
  outcome: TestRunOutcome;
  functions: FunctionIdentity[];
  /** Hit symbols dropped because they did not demangle. */
  skippedSymbols: number;
}
