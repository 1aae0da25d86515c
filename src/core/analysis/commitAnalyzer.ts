import path from 'path';
import type { AnalysisConfig } from '../config';
import type { CoverageMap } from '../coverageMap';
import { extractChangedLines, type ExtractedDiff } from '../diff';
import { NoParentError, ParseFailureError, errorMessage } from '../errors';
import type { CommitInfo, RevisionSource } from '../git';
import type { CompileArgs, CompileArgsResolver } from '../indexer/compileDb';
import type { FunctionIndexer } from '../indexer/functionIndexer';
import type { FunctionRecord } from '../indexer/types';
import { nullLogger, type Logger } from '../log';
import { hasExtension } from '../paths';
import { CoverageMatcher } from './matcher';
import { MoveDetector, recordStableKey, type ParentFile, type ParentView } from './moveDetector';
import { selectChangedFunctions } from './selector';
import type { ChangedFunction, CommitReport, CommitTotals, PureMove, SkippedFile } from './types';

export interface CommitAnalyzerDeps {
  repoRoot: string;
  source: RevisionSource;
  map: CoverageMap;
  compileArgs: CompileArgsResolver;
  indexer: FunctionIndexer;
  config: AnalysisConfig;
  moveDetector?: MoveDetector;
  log?: Logger;
}

type IndexOutcome =
  | { ok: true; source: string; records: FunctionRecord[] }
  | { ok: false; skip: SkippedFile };

export function emptyTotals(): CommitTotals {
  return { changed: 0, covered: 0, uncovered: 0, fuzzy: 0 };
}

export function totalsOf(functions: readonly ChangedFunction[]): CommitTotals {
  const covered = functions.filter((f) => f.match.status === 'covered').length;
  const fuzzy = functions.filter((f) => f.match.status === 'fuzzy').length;
  return { changed: functions.length, covered, uncovered: functions.length - covered, fuzzy };
}

/** Runs `fn` over `items` with at most `limit` in flight; results keep input order. */
export async function mapWithConcurrency<T, R>(items: readonly T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const i = next++;
      results[i] = await fn(items[i]);
    }
  };
  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

/**
 * Parent side of one commit, indexed lazily and at most once per path.
 * Shared by every function of the commit.
 */
class LazyParentView implements ParentView {
  private readonly cache = new Map<string, Promise<ParentFile | null>>();

  constructor(
    private readonly parent: string | null,
    private readonly touched: readonly string[],
    private readonly load: (rev: string, filePath: string) => Promise<IndexOutcome>,
  ) {}

  file(filePath: string): Promise<ParentFile | null> {
    let pending = this.cache.get(filePath);
    if (!pending) {
      pending = this.fetch(filePath);
      this.cache.set(filePath, pending);
    }
    return pending;
  }

  async touchedFiles(): Promise<ParentFile[]> {
    const out: ParentFile[] = [];
    for (const p of this.touched) {
      const pf = await this.file(p);
      if (pf) out.push(pf);
    }
    return out;
  }

  private async fetch(filePath: string): Promise<ParentFile | null> {
    if (this.parent === null) return null;
    const res = await this.load(this.parent, filePath);
    return res.ok ? { path: filePath, source: res.source, records: res.records } : null;
  }
}

/**
 * Turns one commit into a coverage report: changed lines -> enclosing
 * functions -> moves filtered out -> coverage map lookup. Nothing here
 * mutates the map, so several commits can be analyzed at once.
 */
export class CommitAnalyzer {
  private readonly log: Logger;
  private readonly matcher: CoverageMatcher;
  private readonly moves: MoveDetector;

  constructor(private readonly deps: CommitAnalyzerDeps) {
    this.log = deps.log ?? nullLogger;
    this.matcher = new CoverageMatcher(deps.map, deps.config.fuzzyCandidateLimit);
    this.moves = deps.moveDetector ?? new MoveDetector();
  }

  async analyzeMany(revs: readonly string[], concurrency = this.deps.config.concurrency): Promise<CommitReport[]> {
    return mapWithConcurrency(revs, concurrency, (rev) => this.analyze(rev));
  }

  async analyze(rev: string): Promise<CommitReport> {
    const sha = await this.deps.source.resolveCommit(rev);
    const info = await this.deps.source.commitInfo(sha);
    const log = this.log.child({ sha: sha.slice(0, 12) });

    let diff: ExtractedDiff;
    try {
      diff = await extractChangedLines(this.deps.source, sha, this.deps.config.rootCommitPolicy);
    } catch (e) {
      if (!(e instanceof NoParentError)) throw e;
      log.info('root_commit_skipped');
      return this.emptyReport(sha, null, info, 'root-commit');
    }

    const sourceFiles = Array.from(diff.changed.files)
      .filter(([file, lines]) => lines.size > 0 && hasExtension(file, this.deps.config.sourceExtensions))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    if (sourceFiles.length === 0) {
      log.info('no_source_changes', { files: diff.changed.files.size });
      return this.emptyReport(sha, diff.parent, info);
    }

    const touched = new Set<string>();
    for (const [file] of sourceFiles) touched.add(file);
    for (const old of diff.changed.oldPaths) {
      if (hasExtension(old, this.deps.config.sourceExtensions)) touched.add(old);
    }
    const currentPathOf = new Map<string, string>();
    for (const [current, old] of diff.changed.renames) currentPathOf.set(old, current);
    const parentView = new LazyParentView(diff.parent, Array.from(touched), (r, f) =>
      this.indexFile(r, f, log, this.deps.compileArgs.resolveAtParent(f, currentPathOf.get(f))));

    const changedFunctions: ChangedFunction[] = [];
    const pureMoves: PureMove[] = [];
    const skippedFiles: SkippedFile[] = [];

    for (const [file, lines] of sourceFiles) {
      const indexed = await this.indexFile(sha, file, log);
      if (!indexed.ok) {
        skippedFiles.push(indexed.skip);
        continue;
      }
      const renamedFrom = diff.changed.renames.get(file);
      for (const selected of selectChangedFunctions(lines, indexed.records)) {
        const r = selected.record;
        const key = recordStableKey(r);
        const move = await this.moves.classify(selected, { source: indexed.source, parent: parentView, renamedFrom });
        if (move.kind === 'pure-move') {
          pureMoves.push({
            path: r.path, qualifiedName: r.qualifiedName, signature: r.signature, stableKey: key,
            spanStart: r.spanStart, spanEnd: r.spanEnd, from: move.from,
          });
          continue;
        }
        const identity = { path: r.path, signature: r.signature, startLine: r.declLine };
        changedFunctions.push({
          path: r.path,
          qualifiedName: r.qualifiedName,
          signature: r.signature,
          stableKey: key,
          identity,
          spanStart: r.spanStart,
          spanEnd: r.spanEnd,
          changedLines: selected.changedLines,
          match: this.matcher.match(identity),
        });
      }
    }

    const totals = totalsOf(changedFunctions);
    log.info('commit_analyzed', { ...totals, pureMoves: pureMoves.length, skippedFiles: skippedFiles.length });
    return {
      sha,
      parent: diff.parent,
      info,
      changedFunctions,
      pureMoves,
      skippedFiles,
      totals,
      coveringTests: coveringTests(changedFunctions),
    };
  }

  private emptyReport(sha: string, parent: string | null, info: CommitInfo, skipped?: 'root-commit'): CommitReport {
    return {
      sha, parent, info,
      ...(skipped ? { skipped } : {}),
      changedFunctions: [], pureMoves: [], skippedFiles: [],
      totals: emptyTotals(),
      coveringTests: [],
    };
  }

  private async indexFile(rev: string, file: string, log: Logger, parentArgs?: CompileArgs): Promise<IndexOutcome> {
    const compile = parentArgs ?? this.deps.compileArgs.resolve(file);
    if (!compile) {
      log.warn('file_not_in_compile_db', { file, rev: rev.slice(0, 12) });
      return { ok: false, skip: { path: file, reason: 'not_in_compile_db' } };
    }
    const source = await this.deps.source.readFile(rev, file);
    if (source === null) {
      return { ok: false, skip: { path: file, reason: 'missing_at_revision' } };
    }
    try {
      const records = await this.deps.indexer.index({
        relPath: file,
        absPath: path.resolve(this.deps.repoRoot, file),
        source,
        compile,
      });
      return { ok: true, source, records };
    } catch (e) {
      if (!(e instanceof ParseFailureError)) throw e;
      log.warn('file_parse_failed', { file, rev: rev.slice(0, 12), err: errorMessage(e) });
      return { ok: false, skip: { path: file, reason: 'parse_failed', detail: e.message } };
    }
  }
}

export function coveringTests(functions: readonly ChangedFunction[]): string[] {
  const all = new Set<string>();
  for (const f of functions) {
    if (f.match.status === 'covered') for (const t of f.match.tests) all.add(t);
  }
  return Array.from(all).sort();
}
