import test from 'node:test';
import assert from 'node:assert/strict';
import { parseCtestListing, selectTestRange } from '../src/core/coverage/ctest';
import { collectHitFunctions, parseFastcovReport } from '../src/core/coverage/fastcov';

test('ctest listing keeps the numbering and full names', () => {
  const stdout = [
    'Test project /work/proj/build',
    '  Test  #1: unit_parser',
    '  Test  #2: unit lexer spaces',
    '  Test #10: regress_42',
    '',
    'Total Tests: 3',
  ].join('\n');
  assert.deepEqual(parseCtestListing(stdout), [
    { id: 1, name: 'unit_parser' },
    { id: 2, name: 'unit lexer spaces' },
    { id: 10, name: 'regress_42' },
  ]);
});

test('test selection filters, then windows, then caps', () => {
  const tests = ['a0', 'b1', 'a2', 'b3', 'a4', 'b5'].map((name, i) => ({ id: i + 1, name }));
  assert.deepEqual(selectTestRange(tests, { pattern: 'a', start: 1, end: 10 }).map((t) => t.name), ['a2', 'a4']);
  assert.deepEqual(selectTestRange(tests, { pattern: 'a', start: 1, end: 10, maxTests: 1 }).map((t) => t.name), ['a2']);
  assert.deepEqual(selectTestRange(tests, { start: 2, end: 4 }).map((t) => t.id), [3, 4]);
  assert.deepEqual(selectTestRange(tests, { start: 4, end: 2 }), []);
  assert.equal(selectTestRange(tests, {}).length, 6);
});

test('only executed project functions are collected', () => {
  const report = parseFastcovReport({
    sources: {
      '/work/proj/src/a.cpp': {
        '': {
          functions: {
            _Z3fooi: { start_line: 10, execution_count: 3 },
            _Z3barv: { start_line: 20, execution_count: 0 },
          },
        },
      },
      '/usr/include/c++/12/bits/stl_vector.h': {
        '': { functions: { _ZNSt6vectorIiED2Ev: { start_line: 5, execution_count: 9 } } },
      },
      '/work/proj/build/src/generated.cpp': {
        '': { functions: { _Z3genv: { start_line: 1, execution_count: 1 } } },
      },
    },
  });
  const hits = collectHitFunctions(report, {
    sourceMarker: 'src/',
    excludedPathFragments: ['/usr/include/', '/build/'],
    projectRoot: '/work/proj',
  });
  assert.deepEqual(hits, [{ path: 'src/a.cpp', symbol: '_Z3fooi', startLine: 10, executionCount: 3 }]);
});

test('paths outside a known root are cut at the source marker', () => {
  const report = parseFastcovReport({
    sources: { '/ci/checkout/src/lib/b.cpp': { '': { functions: { b: { start_line: 4, execution_count: 1 } } } } },
  });
  const hits = collectHitFunctions(report, { sourceMarker: 'src/', excludedPathFragments: [] });
  assert.deepEqual(hits.map((h) => h.path), ['src/lib/b.cpp']);
});
