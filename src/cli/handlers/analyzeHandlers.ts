import path from 'path';
import { aggregateReports } from '../../core/analysis/aggregate';
import { CommitAnalyzer } from '../../core/analysis/commitAnalyzer';
import { renderBatch } from '../../core/analysis/report';
import { loadConfig } from '../../core/config';
import { loadCoverageMap } from '../../core/coverageMap';
import { CxxFiltDemangler } from '../../core/demangle';
import { CovmapError } from '../../core/errors';
import { GitRevisionSource, resolveGitRoot } from '../../core/git';
import { ClangJsonAstDumper } from '../../core/indexer/clangAst';
import { CompileArgsResolver } from '../../core/indexer/compileDb';
import { FunctionIndexer } from '../../core/indexer/functionIndexer';
import { createLogger } from '../../core/log';
import type { AnalyzeInput } from '../schemas/analyzeSchemas';
import type { CLIResult, CLIError } from '../types';
import { success, error, hintFor, ErrorReasons, ExitCodes } from '../types';

export async function handleAnalyze(input: AnalyzeInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'analyze' });
  const startedAt = Date.now();

  try {
    const repoRoot = await resolveGitRoot(path.resolve(input.path));
    const config = await loadConfig(repoRoot);
    const analysis = {
      ...config.analysis,
      ...(input.compileDb ? { compileDbPath: input.compileDb } : {}),
      ...(input.allowMissingCompileDb ? { requireCompileDb: false } : {}),
      ...(input.rootCommits ? { rootCommitPolicy: input.rootCommits } : {}),
      ...(input.concurrency ? { concurrency: input.concurrency } : {}),
    };

    const source = new GitRevisionSource(repoRoot);
    const revs = [...input.shas];
    if (input.recent) revs.push(...await source.recentCommits(input.recent));
    if (revs.length === 0) {
      return error(ErrorReasons.NO_COMMITS, {
        message: 'No commits to analyze',
        hint: 'Pass one or more commit SHAs, or --recent <n>',
      });
    }

    const map = await loadCoverageMap(path.resolve(input.coverageMap));
    const compileArgs = await CompileArgsResolver.open(repoRoot, analysis.compileDbPath, analysis.requireCompileDb);
    if (!compileArgs.hasDatabase) log.warn('compile_db_missing', { path: analysis.compileDbPath, degraded: true });

    const indexer = new FunctionIndexer(
      new ClangJsonAstDumper({ clangBin: analysis.clangBin }),
      new CxxFiltDemangler({ bin: config.coverage.cxxfiltBin }),
      log.child({ component: 'indexer' }),
    );
    const analyzer = new CommitAnalyzer({ repoRoot, source, map, compileArgs, indexer, config: analysis, log });
    const reports = await log.span('analyze_commits', { commits: revs.length, concurrency: analysis.concurrency }, () =>
      analyzer.analyzeMany(revs, analysis.concurrency));

    const minCoverage = input.minCoverage ?? config.gate.minCoverage;
    const summary = aggregateReports(reports, input.gate ? minCoverage : undefined);

    log.info('analyze', {
      ok: true,
      commits: summary.commits,
      functions: summary.totalFunctions,
      covered: summary.withCoverage,
      passed: summary.passed,
      duration_ms: Date.now() - startedAt,
    });

    return success({
      repoRoot,
      coverageMap: path.resolve(input.coverageMap),
      reports,
      summary,
      ...(input.format === 'text' ? { textOutput: renderBatch(reports, summary) } : {}),
      exitCode: summary.passed ? ExitCodes.OK : ExitCodes.GATE_FAILED,
    });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    const reason = e instanceof CovmapError ? e.reason : ErrorReasons.ANALYSIS_FAILED;
    log.error('analyze', { ok: false, reason, err: message });
    return error(reason, { message, hint: hintFor(reason) });
  }
}
