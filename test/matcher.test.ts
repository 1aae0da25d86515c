import test from 'node:test';
import assert from 'node:assert/strict';
import { CoverageMatcher, overloadName } from '../src/core/analysis/matcher';
import { CoverageMap } from '../src/core/coverageMap';

const map = CoverageMap.fromRecord({
  'src/a.cpp:foo(int):10': ['testA'],
  'src/a.cpp:foo(double):30': ['testB'],
  'src/a.cpp:int ns::tpl<int>(int):50': ['testC'],
  'src/b.cpp:foo(char):7': ['testD'],
});

test('exact identity wins', () => {
  const id = { path: 'src/a.cpp', signature: 'foo(int)', startLine: 10 };
  assert.deepEqual(new CoverageMatcher(map).match(id), {
    status: 'covered',
    matchKind: 'exact',
    tests: ['testA'],
    matched: id,
  });
});

test('a shifted start line matches without the line', () => {
  assert.deepEqual(new CoverageMatcher(map).match({ path: 'src/a.cpp', signature: 'foo(int)', startLine: 12 }), {
    status: 'covered',
    matchKind: 'pathless',
    tests: ['testA'],
    matched: { path: 'src/a.cpp', signature: 'foo(int)', startLine: 10 },
  });
});

test('same-named functions in the file are only candidates', () => {
  const res = new CoverageMatcher(map).match({ path: 'src/a.cpp', signature: 'foo(char)', startLine: 70 });
  assert.deepEqual(res, {
    status: 'fuzzy',
    candidates: [
      { path: 'src/a.cpp', signature: 'foo(double)', startLine: 30 },
      { path: 'src/a.cpp', signature: 'foo(int)', startLine: 10 },
    ],
  });
  const capped = new CoverageMatcher(map, 1).match({ path: 'src/a.cpp', signature: 'foo(char)', startLine: 70 });
  assert.deepEqual(capped, { status: 'fuzzy', candidates: [{ path: 'src/a.cpp', signature: 'foo(double)', startLine: 30 }] });
});

test('template patterns find their instantiations as candidates', () => {
  const res = new CoverageMatcher(map).match({ path: 'src/a.cpp', signature: 'ns::tpl(T)', startLine: 50 });
  assert.deepEqual(res, {
    status: 'fuzzy',
    candidates: [{ path: 'src/a.cpp', signature: 'int ns::tpl<int>(int)', startLine: 50 }],
  });
  assert.equal(overloadName('int ns::tpl<int>(int)'), 'ns::tpl');
  assert.equal(overloadName('ns::Foo::operator<(ns::Foo const&) const'), 'ns::Foo::operator<');
});

test('nothing related means uncovered', () => {
  assert.deepEqual(new CoverageMatcher(map).match({ path: 'src/a.cpp', signature: 'bar()', startLine: 5 }), { status: 'uncovered' });
  assert.deepEqual(new CoverageMatcher(map, 0).match({ path: 'src/a.cpp', signature: 'foo(char)', startLine: 70 }), { status: 'uncovered' });
});
