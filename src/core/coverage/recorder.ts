import type { Demangler } from '../demangle';
import { CounterResetError, errorMessage } from '../errors';
import { formatIdentityKey, type FunctionIdentity } from '../identity';
import { nullLogger, type Logger } from '../log';
import { collectHitFunctions, type HitFilter } from './fastcov';
import type { CoverageToolchain, TestCase, TestCoverage, TestRunOutcome } from './types';

export interface RecorderOptions {
  timeoutMs: number;
  filter: HitFilter;
  log?: Logger;
}

/**
 * Per-test isolated coverage capture over one instrumented binary.
 *
 * The protocol is `reset() -> run(test) -> extract()`, and each step hands
 * back the only object able to perform the next one. A session holds at most
 * one open run; a second `reset()` before `extract()` is refused, so two tests
 * can never share counters.
 */
export class IsolatedCoverageSession {
  private open = false;
  private readonly log: Logger;

  constructor(
    private readonly toolchain: CoverageToolchain,
    private readonly demangler: Demangler,
    private readonly opts: RecorderOptions,
  ) {
    this.log = opts.log ?? nullLogger;
  }

  get hasOpenRun(): boolean {
    return this.open;
  }

  async reset(): Promise<ArmedRun> {
    if (this.open) throw new Error('Previous coverage run has not been extracted; refusing to reset');
    try {
      await this.toolchain.zeroCounters();
    } catch (e) {
      if (e instanceof CounterResetError) throw e;
      throw new CounterResetError(`Failed to zero coverage counters: ${errorMessage(e)}`);
    }
    this.open = true;
    return new ArmedRun(this.toolchain, this.opts.timeoutMs, (test, outcome) => new CompletedRun(
      test,
      outcome,
      () => this.extractOpenRun(test, outcome),
    ));
  }

  /** One full isolated cycle for a single test. */
  async record(test: TestCase): Promise<TestCoverage> {
    const armed = await this.reset();
    const completed = await armed.run(test);
    return completed.extract();
  }

  private async extractOpenRun(test: TestCase, outcome: TestRunOutcome): Promise<TestCoverage> {
    try {
      const report = await this.toolchain.captureReport();
      const hits = collectHitFunctions(report, this.opts.filter);
      const demangled = await this.demangler.demangleAll(hits.map((h) => h.symbol));
      const seen = new Set<string>();
      const functions: FunctionIdentity[] = [];
      let skippedSymbols = 0;
      for (const hit of hits) {
        const signature = demangled.get(hit.symbol);
        if (signature === undefined) {
          skippedSymbols++;
          this.log.debug('symbol_not_demangled', { test: test.name, symbol: hit.symbol });
          continue;
        }
        const id: FunctionIdentity = { path: hit.path, signature, startLine: hit.startLine };
        const key = formatIdentityKey(id);
        if (seen.has(key)) continue;
        seen.add(key);
        functions.push(id);
      }
      return { test, outcome, functions, skippedSymbols };
    } finally {
      this.open = false;
    }
  }
}

/** Counters are zeroed; exactly one test may run now. */
export class ArmedRun {
  private used = false;

  constructor(
    private readonly toolchain: CoverageToolchain,
    private readonly timeoutMs: number,
    private readonly complete: (test: TestCase, outcome: TestRunOutcome) => CompletedRun,
  ) {}

  async run(test: TestCase): Promise<CompletedRun> {
    if (this.used) throw new Error('This armed run has already executed a test');
    this.used = true;
    let outcome: TestRunOutcome;
    try {
      outcome = await this.toolchain.runTest(test, this.timeoutMs);
    } catch (e) {
      // whatever was captured before the failure is still attributable to this test
      outcome = { passed: false, exitCode: null, timedOut: false, durationMs: 0, error: errorMessage(e) };
    }
    return this.complete(test, outcome);
  }
}

/** The test has finished; its coverage is waiting to be extracted. */
export class CompletedRun {
  private extracted = false;

  constructor(
    readonly test: TestCase,
    readonly outcome: TestRunOutcome,
    private readonly doExtract: () => Promise<TestCoverage>,
  ) {}

  async extract(): Promise<TestCoverage> {
    if (this.extracted) throw new Error('Coverage for this run was already extracted');
    this.extracted = true;
    return this.doExtract();
  }
}
