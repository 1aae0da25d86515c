import path from 'path';
import { glob } from 'glob';
import { loadConfig } from '../../core/config';
import { CtestFastcovToolchain, selectTestRange } from '../../core/coverage/ctest';
import { buildShard } from '../../core/coverage/builder';
import { IsolatedCoverageSession } from '../../core/coverage/recorder';
import {
  MERGED_MAP_FILE,
  loadCoverageMap,
  mergeCoverageMaps,
  saveCoverageMap,
  shardFileName,
  type CoverageMap,
} from '../../core/coverageMap';
import { CxxFiltDemangler } from '../../core/demangle';
import { CovmapError } from '../../core/errors';
import { resolveGitRoot } from '../../core/git';
import { createLogger, errorReason } from '../../core/log';
import type { MapBuildInput, MapMergeInput, MapStatsInput } from '../schemas/mapSchemas';
import type { CLIResult, CLIError } from '../types';
import { success, error, hintFor, ErrorReasons } from '../types';

function failure(fallbackReason: string, e: unknown): CLIError {
  const message = e instanceof Error ? e.message : String(e);
  const reason = e instanceof CovmapError ? e.reason : fallbackReason;
  return error(reason, { message, hint: hintFor(reason) });
}

export async function handleMapBuild(input: MapBuildInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'map:build' });
  const startedAt = Date.now();

  try {
    const repoRoot = await resolveGitRoot(path.resolve(input.path));
    const { coverage } = await loadConfig(repoRoot);
    const buildDir = path.resolve(repoRoot, input.buildDir ?? coverage.buildDir);

    const toolchain = new CtestFastcovToolchain({
      buildDir,
      ctestBin: coverage.ctestBin,
      fastcovBin: coverage.fastcovBin,
      gcovBin: coverage.gcovBin,
    });
    const all = await toolchain.listTests();
    const tests = selectTestRange(all, {
      start: input.start,
      end: input.end,
      pattern: input.pattern,
      maxTests: input.maxTests,
    });
    if (tests.length === 0) {
      return error(ErrorReasons.NO_TESTS, {
        message: `No tests selected out of ${all.length}`,
        hint: 'Check --start/--end/--pattern against "ctest --show-only"',
      });
    }

    const shard = input.start !== undefined || input.end !== undefined
      ? { start: input.start ?? 0, end: input.end ?? all.length }
      : null;
    const shardLog = log.child(shard ? { shard: `${shard.start}_${shard.end}` } : {});
    const session = new IsolatedCoverageSession(
      toolchain,
      new CxxFiltDemangler({ bin: coverage.cxxfiltBin }),
      {
        timeoutMs: input.timeoutMs ?? coverage.testTimeoutMs,
        filter: {
          sourceMarker: coverage.sourceMarker,
          excludedPathFragments: coverage.excludedPathFragments,
          projectRoot: repoRoot,
        },
        log: shardLog,
      },
    );
    const res = await shardLog.span('shard_recorded', { tests: tests.length }, () => buildShard(session, tests, { log: shardLog }));

    const out = path.resolve(input.out ?? (shard ? shardFileName(shard.start, shard.end) : MERGED_MAP_FILE));
    await saveCoverageMap(res.map, out);

    const failed = res.results.filter((r) => !r.outcome.passed);
    log.info('map_build', {
      ok: true,
      tests: tests.length,
      failed: failed.length,
      functions: res.map.size,
      duration_ms: Date.now() - startedAt,
    });

    return success({
      repoRoot,
      out,
      shard,
      stats: res.map.stats(),
      tests: {
        selected: tests.length,
        passed: tests.length - failed.length,
        failed: failed.map((r) => ({ test: r.test, exitCode: r.outcome.exitCode, timedOut: r.outcome.timedOut, error: r.extractError ?? r.outcome.error })),
      },
    });
  } catch (e) {
    log.error('map:build', { ok: false, reason: errorReason(e), err: e instanceof Error ? e.message : String(e) });
    return failure(ErrorReasons.MAP_BUILD_FAILED, e);
  }
}

export async function resolveMapInputs(inputs: readonly string[], pattern?: string): Promise<string[]> {
  const files = inputs.map((f) => path.resolve(f));
  if (pattern) {
    const found = await glob(pattern, { absolute: true, nodir: true });
    files.push(...found);
  }
  return Array.from(new Set(files)).sort();
}

export async function handleMapMerge(input: MapMergeInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'map:merge' });
  const startedAt = Date.now();

  try {
    const files = await resolveMapInputs(input.inputs, input.glob);
    const out = path.resolve(input.gzip && !input.out.endsWith('.gz') ? `${input.out}.gz` : input.out);
    const sources = files.filter((f) => f !== out);
    if (sources.length === 0) {
      return error(ErrorReasons.NO_INPUTS, {
        message: 'No coverage map shards to merge',
        hint: 'Pass shard files or --glob "coverage_mapping_*.json"',
      });
    }

    const maps: CoverageMap[] = [];
    for (const f of sources) maps.push(await loadCoverageMap(f));
    const merged = mergeCoverageMaps(maps);
    await saveCoverageMap(merged, out);

    log.info('map_merge', { ok: true, inputs: sources.length, functions: merged.size, duration_ms: Date.now() - startedAt });
    return success({ out, inputs: sources, stats: merged.stats() });
  } catch (e) {
    log.error('map:merge', { ok: false, reason: errorReason(e), err: e instanceof Error ? e.message : String(e) });
    return failure(ErrorReasons.MAP_MERGE_FAILED, e);
  }
}

export async function handleMapStats(input: MapStatsInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'map:stats' });
  try {
    const file = path.resolve(input.file);
    const map = await loadCoverageMap(file);
    return success({ file, stats: map.stats() });
  } catch (e) {
    log.error('map:stats', { ok: false, reason: errorReason(e), err: e instanceof Error ? e.message : String(e) });
    return failure(ErrorReasons.INTERNAL_ERROR, e);
  }
}
