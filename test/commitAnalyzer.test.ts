import test from 'node:test';
import assert from 'node:assert/strict';
import { CommitAnalyzer, mapWithConcurrency } from '../src/core/analysis/commitAnalyzer';
import { defaultAnalysisConfig } from '../src/core/config';
import { CoverageMap } from '../src/core/coverageMap';
import { CommitResolutionError } from '../src/core/errors';
import { CompileArgsResolver, CompileDatabase } from '../src/core/indexer/compileDb';
import { FunctionIndexer } from '../src/core/indexer/functionIndexer';
import { MemoryRevisionSource, PrefixDemangler, SourceScanningDumper, type MemoryCommit } from './support/fakes';

const ROOT = '/work/proj';

function filler(from: number, to: number): string[] {
  const out: string[] = [];
  for (let i = from; i <= to; i++) out.push(`// filler ${i}`);
  return out;
}

function file(lines: string[]): string {
  return lines.join('\n') + '\n';
}

function diffFor(filePath: string, hunks: string[]): string {
  return [`diff --git a/${filePath} b/${filePath}`, `--- a/${filePath}`, `+++ b/${filePath}`, ...hunks, ''].join('\n');
}

const FOO = ['int foo(int x) {', '  return x;', '}'];
const PARENT_A = file([...filler(1, 9), ...FOO]);

const MAP = CoverageMap.fromRecord({ 'src/a.cpp:int foo(int):10': ['testA'] });

function analyzer(commits: MemoryCommit[], compileArgs = new CompileArgsResolver(ROOT, null)) {
  const source = new MemoryRevisionSource([{ sha: 'p0', parents: [], files: { 'src/a.cpp': PARENT_A }, diff: '' }, ...commits]);
  const dumper = new SourceScanningDumper();
  const indexer = new FunctionIndexer(dumper, new PrefixDemangler());
  return {
    source,
    dumper,
    analyzer: new CommitAnalyzer({ repoRoot: ROOT, source, map: MAP, compileArgs, indexer, config: defaultAnalysisConfig() }),
  };
}

test('an edit inside a function at its mapped line is covered exactly', async () => {
  const { analyzer: a } = analyzer([{
    sha: 'c1',
    parents: ['p0'],
    files: { 'src/a.cpp': file([...filler(1, 9), 'int foo(int value) {', '  return value;', '}']) },
    diff: diffFor('src/a.cpp', ['@@ -10,2 +10,2 @@', '-int foo(int x) {', '-  return x;', '+int foo(int value) {', '+  return value;']),
  }]);
  const r = await a.analyze('c1');
  assert.equal(r.parent, 'p0');
  assert.equal(r.changedFunctions.length, 1);
  const fn = r.changedFunctions[0];
  assert.deepEqual(fn.identity, { path: 'src/a.cpp', signature: 'int foo(int)', startLine: 10 });
  assert.deepEqual(fn.changedLines, [10, 11]);
  assert.deepEqual(fn.match, {
    status: 'covered',
    matchKind: 'exact',
    tests: ['testA'],
    matched: { path: 'src/a.cpp', signature: 'int foo(int)', startLine: 10 },
  });
  assert.deepEqual(r.totals, { changed: 1, covered: 1, uncovered: 0, fuzzy: 0 });
  assert.deepEqual(r.coveringTests, ['testA']);
});

test('a function pushed down by unrelated lines is covered without its line', async () => {
  const target = file(['// filler 1', '// new 1', '// new 2', ...filler(2, 9), 'int foo(int x) {', '  return x * 2;', '}']);
  const { analyzer: a } = analyzer([{
    sha: 'c2',
    parents: ['p0'],
    files: { 'src/a.cpp': target },
    diff: diffFor('src/a.cpp', ['@@ -1,0 +2,2 @@', '+// new 1', '+// new 2', '@@ -11 +13 @@', '-  return x;', '+  return x * 2;']),
  }]);
  const r = await a.analyze('c2');
  assert.equal(r.changedFunctions.length, 1);
  assert.deepEqual(r.changedFunctions[0].changedLines, [13]);
  assert.equal(r.changedFunctions[0].identity.startLine, 12);
  assert.deepEqual(r.changedFunctions[0].match, {
    status: 'covered',
    matchKind: 'pathless',
    tests: ['testA'],
    matched: { path: 'src/a.cpp', signature: 'int foo(int)', startLine: 10 },
  });
});

test('a verbatim relocation is a pure move and not counted', async () => {
  const body = ['int foo(int x) {', ...filler(100, 108).map((l) => `  ${l}`), '}'];
  const parent = file([...filler(1, 9), ...body, ...filler(21, 50)]);
  const target = file([...filler(1, 9), ...filler(21, 50), ...body]);
  const { analyzer: a } = analyzer([
    { sha: 'm0', parents: ['p0'], files: { 'src/a.cpp': parent }, diff: '' },
    {
      sha: 'c3',
      parents: ['m0'],
      files: { 'src/a.cpp': target },
      diff: diffFor('src/a.cpp', [
        '@@ -10,11 +9,0 @@', ...body.map((l) => `-${l}`),
        '@@ -50,0 +40,11 @@', ...body.map((l) => `+${l}`),
      ]),
    },
  ]);
  const r = await a.analyze('c3');
  assert.deepEqual(r.changedFunctions, []);
  assert.deepEqual(r.pureMoves.map((m) => [m.signature, m.spanStart, m.spanEnd, m.from]), [
    ['int foo(int)', 40, 50, { path: 'src/a.cpp', spanStart: 10, spanEnd: 20 }],
  ]);
  assert.deepEqual(r.totals, { changed: 0, covered: 0, uncovered: 0, fuzzy: 0 });
});

test('a brand new function is uncovered', async () => {
  const { analyzer: a } = analyzer([{
    sha: 'c4',
    parents: ['p0'],
    files: { 'src/a.cpp': PARENT_A, 'src/c.cpp': file(['int baz(int x) {', '  return -x;', '}']) },
    diff: [
      'diff --git a/src/c.cpp b/src/c.cpp',
      'new file mode 100644',
      '--- /dev/null',
      '+++ b/src/c.cpp',
      '@@ -0,0 +1,3 @@',
      '+int baz(int x) {',
      '+  return -x;',
      '+}',
      '',
    ].join('\n'),
  }]);
  const r = await a.analyze('c4');
  assert.deepEqual(r.changedFunctions.map((f) => [f.signature, f.match.status]), [['int baz(int)', 'uncovered']]);
  assert.deepEqual(r.totals, { changed: 1, covered: 0, uncovered: 1, fuzzy: 0 });
});

test('unusable files are skipped and the rest of the commit still counts', async () => {
  const db = new CompileDatabase([
    { directory: ROOT, file: 'src/a.cpp', arguments: ['c++', '-c', 'src/a.cpp'] },
    { directory: ROOT, file: 'src/broken.cpp', arguments: ['c++', '-c', 'src/broken.cpp'] },
  ]);
  const { analyzer: a, dumper } = analyzer([{
    sha: 'c5',
    parents: ['p0'],
    files: {
      'README.md': 'hello\n',
      'src/gen.h': 'int gen();\n',
      'src/broken.cpp': '#error nope\n',
      'src/a.cpp': file([...filler(1, 9), 'int foo(int x) {', '  return x + 3;', '}']),
    },
    diff: [
      diffFor('README.md', ['@@ -0,0 +1 @@', '+hello']),
      diffFor('src/gen.h', ['@@ -0,0 +1 @@', '+int gen();']),
      diffFor('src/broken.cpp', ['@@ -0,0 +1 @@', '+#error nope']),
      diffFor('src/a.cpp', ['@@ -11 +11 @@', '-  return x;', '+  return x + 3;']),
    ].join(''),
  }], new CompileArgsResolver(ROOT, db));
  const r = await a.analyze('c5');
  assert.deepEqual(r.skippedFiles, [
    { path: 'src/broken.cpp', reason: 'parse_failed', detail: 'Failed to parse src/broken.cpp: error directive' },
    { path: 'src/gen.h', reason: 'not_in_compile_db' },
  ]);
  assert.deepEqual(r.totals, { changed: 1, covered: 1, uncovered: 0, fuzzy: 0 });
  assert.deepEqual(dumper.requests.map((q) => [q.relPath, q.source === PARENT_A, q.compile.args]), [
    ['src/a.cpp', false, []],
    ['src/a.cpp', true, []],
    ['src/broken.cpp', false, []],
  ]);
});

test('a move out of a renamed file is found when the database lists only the new path', async () => {
  const db = new CompileDatabase([
    { directory: ROOT, file: 'src/new.cpp', arguments: ['c++', '-DNEW=1', '-c', 'src/new.cpp'] },
  ]);
  const { analyzer: a, dumper } = analyzer([
    { sha: 'm1', parents: ['p0'], files: { 'src/old.cpp': file([...FOO, ...filler(4, 9)]) }, diff: '' },
    {
      sha: 'c6',
      parents: ['m1'],
      files: { 'src/new.cpp': file([...filler(4, 9), ...FOO]) },
      diff: [
        'diff --git a/src/old.cpp b/src/new.cpp',
        'similarity index 80%',
        'rename from src/old.cpp',
        'rename to src/new.cpp',
        '--- a/src/old.cpp',
        '+++ b/src/new.cpp',
        '@@ -1,3 +0,0 @@', ...FOO.map((l) => `-${l}`),
        '@@ -9,0 +7,3 @@', ...FOO.map((l) => `+${l}`),
        '',
      ].join('\n'),
    },
  ], new CompileArgsResolver(ROOT, db));
  const r = await a.analyze('c6');
  assert.deepEqual(r.changedFunctions, []);
  assert.deepEqual(r.pureMoves.map((m) => [m.path, m.spanStart, m.from]), [
    ['src/new.cpp', 7, { path: 'src/old.cpp', spanStart: 1, spanEnd: 3 }],
  ]);
  assert.deepEqual(dumper.requests.map((q) => [q.relPath, q.compile.args]), [
    ['src/new.cpp', ['-DNEW=1']],
    ['src/old.cpp', ['-DNEW=1']],
  ]);
});

test('a move out of a deleted file is found with guessed arguments', async () => {
  const db = new CompileDatabase([
    { directory: ROOT, file: 'src/keep.cpp', arguments: ['c++', '-c', 'src/keep.cpp'] },
  ]);
  const { analyzer: a, dumper } = analyzer([
    { sha: 'm2', parents: ['p0'], files: { 'src/gone.cpp': file(FOO) }, diff: '' },
    {
      sha: 'c7',
      parents: ['m2'],
      files: { 'src/keep.cpp': file([...filler(1, 2), ...FOO]) },
      diff: [
        'diff --git a/src/gone.cpp b/src/gone.cpp',
        'deleted file mode 100644',
        '--- a/src/gone.cpp',
        '+++ /dev/null',
        '@@ -1,3 +0,0 @@', ...FOO.map((l) => `-${l}`),
        'diff --git a/src/keep.cpp b/src/keep.cpp',
        'new file mode 100644',
        '--- /dev/null',
        '+++ b/src/keep.cpp',
        '@@ -0,0 +1,5 @@', '+// filler 1', '+// filler 2', ...FOO.map((l) => `+${l}`),
        '',
      ].join('\n'),
    },
  ], new CompileArgsResolver(ROOT, db));
  const r = await a.analyze('c7');
  assert.deepEqual(r.changedFunctions, []);
  assert.deepEqual(r.pureMoves.map((m) => [m.path, m.spanStart, m.from]), [
    ['src/keep.cpp', 3, { path: 'src/gone.cpp', spanStart: 1, spanEnd: 3 }],
  ]);
  const gone = dumper.requests.find((q) => q.relPath === 'src/gone.cpp');
  assert.equal(gone?.compile.degraded, true);
});

test('root commits and empty diffs yield empty reports', async () => {
  const { analyzer: a } = analyzer([{ sha: 'e1', parents: ['p0'], files: { 'src/a.cpp': PARENT_A }, diff: '' }]);
  const root = await a.analyze('p0');
  assert.equal(root.skipped, 'root-commit');
  assert.equal(root.parent, null);
  assert.deepEqual(root.totals, { changed: 0, covered: 0, uncovered: 0, fuzzy: 0 });

  const empty = await a.analyze('e1');
  assert.equal(empty.skipped, undefined);
  assert.equal(empty.parent, 'p0');
  assert.deepEqual(empty.totals, { changed: 0, covered: 0, uncovered: 0, fuzzy: 0 });
});

test('batches keep input order and unknown commits fail the batch', async () => {
  const { analyzer: a } = analyzer([{ sha: 'e1', parents: ['p0'], files: { 'src/a.cpp': PARENT_A }, diff: '' }]);
  const reports = await a.analyzeMany(['e1', 'p0', 'e1'], 2);
  assert.deepEqual(reports.map((r) => r.sha), ['e1', 'p0', 'e1']);
  await assert.rejects(a.analyzeMany(['e1', 'nope']), CommitResolutionError);
});

test('bounded concurrency never exceeds its limit', async () => {
  let active = 0;
  let peak = 0;
  const out = await mapWithConcurrency([1, 2, 3, 4, 5], 2, async (n) => {
    active++;
    peak = Math.max(peak, active);
    await new Promise((resolve) => setTimeout(resolve, 5));
    active--;
    return n * 10;
  });
  assert.deepEqual(out, [10, 20, 30, 40, 50]);
  assert.equal(peak, 2);
});
