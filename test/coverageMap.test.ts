import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import {
  CoverageMap,
  CoverageMapAccumulator,
  loadCoverageMap,
  mergeCoverageMaps,
  saveCoverageMap,
  shardFileName,
} from '../src/core/coverageMap';
import { CoverageMapFormatError } from '../src/core/errors';

const A = CoverageMap.fromRecord({
  'src/a.cpp:foo(int):10': ['testB', 'testA'],
  'src/a.cpp:bar():20': ['testA'],
});
const B = CoverageMap.fromRecord({
  'src/a.cpp:foo(int):10': ['testC'],
  'src/b.cpp:ns::baz(double):5': ['testC'],
});
const C = CoverageMap.fromRecord({
  'src/a.cpp:foo(int):10': ['testA'],
  'src/c.cpp:qux():1': ['testD', 'testD'],
});

test('merging a shard with itself changes nothing', () => {
  assert.deepEqual(mergeCoverageMaps([A, A]).toRecord(), A.toRecord());
});

test('merge order does not matter', () => {
  const left = mergeCoverageMaps([mergeCoverageMaps([A, B]), C]).toRecord();
  const right = mergeCoverageMaps([C, B, A]).toRecord();
  assert.deepEqual(left, right);
  assert.deepEqual(left, {
    'src/a.cpp:bar():20': ['testA'],
    'src/a.cpp:foo(int):10': ['testA', 'testB', 'testC'],
    'src/b.cpp:ns::baz(double):5': ['testC'],
    'src/c.cpp:qux():1': ['testD'],
  });
});

test('lookups by exact key, by path and signature, and by path', () => {
  const map = CoverageMap.fromRecord({
    'src/a.cpp:foo(int):10': ['testA'],
    'src/a.cpp:foo(int):30': ['testB'],
    'src/a.cpp:foo(double):40': ['testC'],
  });
  assert.deepEqual(map.lookupExact({ path: 'src/a.cpp', signature: 'foo(int)', startLine: 10 })?.tests, ['testA']);
  assert.equal(map.lookupExact({ path: 'src/a.cpp', signature: 'foo(int)', startLine: 11 }), undefined);
  assert.deepEqual(map.lookupPathless('src/a.cpp', 'foo(int)').map((e) => e.identity.startLine), [10, 30]);
  assert.deepEqual(map.entriesForPath('src/a.cpp').map((e) => e.key), [
    'src/a.cpp:foo(double):40',
    'src/a.cpp:foo(int):10',
    'src/a.cpp:foo(int):30',
  ]);
  assert.deepEqual(map.stats(), { functions: 3, tests: 3, files: 1 });
});

test('accumulator dedupes tests per identity', () => {
  const acc = new CoverageMapAccumulator();
  const id = { path: 'src/a.cpp', signature: 'foo(int)', startLine: 10 };
  acc.add(id, 'testB');
  acc.add(id, 'testA');
  acc.add(id, 'testB');
  assert.equal(acc.size, 1);
  assert.deepEqual(acc.toMap().toRecord(), { 'src/a.cpp:foo(int):10': ['testA', 'testB'] });
});

test('persisted maps survive save and load, plain and gzipped', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'covmap-map-'));
  const merged = mergeCoverageMaps([A, B, C]);
  for (const name of [shardFileName(0, 10), 'coverage_mapping.json.gz']) {
    const file = path.join(dir, name);
    await saveCoverageMap(merged, file);
    const loaded = await loadCoverageMap(file);
    assert.deepEqual(loaded.toRecord(), merged.toRecord());
  }
  const head = (await fs.readFile(path.join(dir, 'coverage_mapping.json.gz'))).subarray(0, 2);
  assert.deepEqual([...head], [0x1f, 0x8b]);
  assert.equal(shardFileName(0, 10), 'coverage_mapping_0_10.json');
});

test('malformed map files are rejected at the boundary', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'covmap-bad-'));
  const cases: Array<[string, string]> = [
    ['not-json.json', '{oops'],
    ['wrong-shape.json', JSON.stringify({ 'src/a.cpp:foo():1': 'testA' })],
    ['bad-key.json', JSON.stringify({ 'src/a.cpp:foo()': ['testA'] })],
  ];
  for (const [name, body] of cases) {
    const file = path.join(dir, name);
    await fs.writeFile(file, body);
    await assert.rejects(loadCoverageMap(file), CoverageMapFormatError, name);
  }
});
