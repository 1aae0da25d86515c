import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { glob } from 'glob';
import { CounterResetError } from '../errors';
import { describeFailure, runTool } from '../proc';
import { parseFastcovReport, type FastcovReport } from './fastcov';
import type { CoverageToolchain, TestCase, TestRunOutcome } from './types';

const CTEST_LISTING = /^\s*Test\s+#(\d+):\s*(.+?)\s*$/;

/** Parses `ctest --show-only` output into the stable, numbered test list. */
export function parseCtestListing(stdout: string): TestCase[] {
  const tests: TestCase[] = [];
  for (const line of stdout.split('\n')) {
    const m = CTEST_LISTING.exec(line);
    if (m) tests.push({ id: Number(m[1]), name: m[2] });
  }
  return tests;
}

export interface TestSelection {
  /** 0-based, inclusive. */
  start?: number;
  /** 0-based, exclusive. */
  end?: number;
  pattern?: string;
  maxTests?: number;
}

/**
 * Applies the name filter first, then the `[start, end)` window, then the
 * cap. Out-of-range bounds are clamped so shard boundaries computed by a CI
 * matrix never fail on the last shard.
 */
export function selectTestRange(tests: readonly TestCase[], sel: TestSelection): TestCase[] {
  let picked = sel.pattern ? tests.filter((t) => t.name.includes(sel.pattern ?? '')) : [...tests];
  const start = Math.max(0, Math.min(picked.length, sel.start ?? 0));
  const end = Math.max(start, Math.min(picked.length, sel.end ?? picked.length));
  picked = picked.slice(start, end);
  if (sel.maxTests !== undefined) picked = picked.slice(0, Math.max(0, sel.maxTests));
  return picked;
}

export interface CtestFastcovOptions {
  buildDir: string;
  ctestBin: string;
  fastcovBin: string;
  gcovBin: string;
  /** Glob patterns handed to fastcov's `--exclude`. */
  excludeGlobs?: string[];
}

/** gcov-instrumented build driven through ctest, with fastcov collecting the counters. */
export class CtestFastcovToolchain implements CoverageToolchain {
  private readonly buildDir: string;
  private readonly excludeArgs: string[];

  constructor(private readonly opts: CtestFastcovOptions) {
    this.buildDir = path.resolve(opts.buildDir);
    const excludes = opts.excludeGlobs ?? ['/usr/include/*', '*/deps/*'];
    this.excludeArgs = excludes.flatMap((g) => ['--exclude', g]);
  }

  async listTests(): Promise<TestCase[]> {
    const res = runTool(this.opts.ctestBin, ['--show-only'], { cwd: this.buildDir });
    if (res.status !== 0) throw new Error(describeFailure(this.opts.ctestBin, res));
    return parseCtestListing(res.stdout);
  }

  async zeroCounters(): Promise<void> {
    const stale = await glob('**/*.gcda', { cwd: this.buildDir, absolute: true, nodir: true });
    for (const f of stale) await fs.remove(f);
    const res = runTool(this.opts.fastcovBin, [
      '--zerocounters', '--search-directory', this.buildDir, ...this.excludeArgs,
    ], { cwd: path.dirname(this.buildDir) });
    if (res.status !== 0) throw new CounterResetError(describeFailure(this.opts.fastcovBin, res));
  }

  async runTest(test: TestCase, timeoutMs: number): Promise<TestRunOutcome> {
    const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
    const res = runTool(this.opts.ctestBin, [
      '-I', `${test.id},${test.id}`, '--output-on-failure', '--timeout', String(seconds),
    ], { cwd: this.buildDir, timeoutMs: timeoutMs + 5_000 });
    // ctest reports its own timeout as a failed test with a "Timeout" marker
    const timedOut = res.timedOut || /\*\*\*Timeout/.test(res.stdout);
    return {
      passed: res.status === 0 && !timedOut,
      exitCode: res.status,
      timedOut,
      durationMs: res.durationMs,
    };
  }

  async captureReport(): Promise<FastcovReport> {
    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'covmap-fastcov-'));
    const output = path.join(tmpDir, 'fastcov.json');
    try {
      const res = runTool(this.opts.fastcovBin, [
        '--gcov', this.opts.gcovBin, '--search-directory', this.buildDir,
        '--output', output, ...this.excludeArgs,
      ], { cwd: path.dirname(this.buildDir) });
      if (res.status !== 0) throw new Error(describeFailure(this.opts.fastcovBin, res));
      const raw: unknown = await fs.readJSON(output);
      return parseFastcovReport(raw);
    } finally {
      await fs.remove(tmpDir);
    }
  }
}
