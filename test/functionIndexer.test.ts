import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'path';
import { selectChangedFunctions } from '../src/core/analysis/selector';
import type { Demangler } from '../src/core/demangle';
import { STDIN_FILE, extractFunctionDecls, type AstDump, type AstDumper } from '../src/core/indexer/clangAst';
import { degradedCompileArgs } from '../src/core/indexer/compileDb';
import { FunctionIndexer, fallbackSignature } from '../src/core/indexer/functionIndexer';

const FIXTURE = path.join(__dirname, 'fixtures', 'clang-ast.json');

class FixtureDumper implements AstDumper {
  async dump(): Promise<AstDump> {
    const ast: unknown = await fs.readJSON(FIXTURE);
    return { ast, mainFile: STDIN_FILE, diagnostics: '' };
  }
}

class TableDemangler implements Demangler {
  constructor(private readonly table: Record<string, string>) {}

  async demangle(symbol: string): Promise<string> {
    const hit = this.table[symbol];
    if (hit === undefined) throw new Error(`unknown symbol ${symbol}`);
    return hit;
  }

  async demangleAll(symbols: Iterable<string>): Promise<Map<string, string>> {
    const out = new Map<string, string>();
    for (const s of symbols) {
      const hit = this.table[s];
      if (hit !== undefined) out.set(s, hit);
    }
    return out;
  }
}

test('definitions of the main file are extracted with elided locations resolved', async () => {
  const decls = extractFunctionDecls(await fs.readJSON(FIXTURE), STDIN_FILE);
  assert.deepEqual(decls, [
    {
      qualifiedName: 'ns::Foo::conv',
      parameterTypes: ['T'],
      isConstMethod: false,
      mangledName: null,
      declLine: 4,
      spanStart: 4,
      spanEnd: 4,
    },
    {
      qualifiedName: 'ns::Foo::get',
      parameterTypes: [],
      isConstMethod: true,
      mangledName: '_ZNK2ns3Foo3getEv',
      declLine: 7,
      spanStart: 7,
      spanEnd: 9,
    },
    {
      qualifiedName: 'ns::Foo::get::(anonymous)::operator()',
      parameterTypes: ['int'],
      isConstMethod: true,
      mangledName: '_ZZNK2ns3Foo3getEvENKUliE_clEi',
      declLine: 8,
      spanStart: 8,
      spanEnd: 8,
    },
    {
      qualifiedName: 'helper',
      parameterTypes: ['int', 'const char *'],
      isConstMethod: false,
      mangledName: '_ZL6helperiPKc',
      declLine: 10,
      spanStart: 10,
      spanEnd: 11,
    },
  ]);
});

test('signatures come from the demangler, templates fall back to the AST spelling', async () => {
  const indexer = new FunctionIndexer(
    new FixtureDumper(),
    new TableDemangler({
      _ZNK2ns3Foo3getEv: 'ns::Foo::get() const',
      _ZL6helperiPKc: 'helper(int, char const*)',
      _ZZNK2ns3Foo3getEvENKUliE_clEi: 'ns::Foo::get() const::{lambda(int)#1}::operator()(int) const',
    }),
  );
  const req = { relPath: 'src/foo.cpp', absPath: '/work/proj/src/foo.cpp', source: '', compile: degradedCompileArgs('/work/proj') };
  const records = await indexer.index(req);
  assert.deepEqual(records.map((r) => [r.path, r.signature, r.declLine]), [
    ['src/foo.cpp', 'ns::Foo::conv(T)', 4],
    ['src/foo.cpp', 'ns::Foo::get() const', 7],
    ['src/foo.cpp', 'ns::Foo::get() const::{lambda(int)#1}::operator()(int) const', 8],
    ['src/foo.cpp', 'helper(int, char const*)', 10],
  ]);
  assert.deepEqual(await indexer.index(req), records);

  // the lambda nests inside the method that declares it and wins for its own line
  assert.deepEqual(
    selectChangedFunctions([7, 8], records).map((s) => [s.record.qualifiedName, s.changedLines]),
    [
      ['ns::Foo::get', [7]],
      ['ns::Foo::get::(anonymous)::operator()', [8]],
    ],
  );
});

test('fallback signatures mark const methods', () => {
  assert.equal(
    fallbackSignature({ qualifiedName: 'ns::Foo::get', parameterTypes: ['int', 'T'], isConstMethod: true }),
    'ns::Foo::get(int, T) const',
  );
});
