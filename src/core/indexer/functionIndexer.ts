import type { Demangler } from '../demangle';
import { nullLogger, type Logger } from '../log';
import { extractFunctionDecls, type AstDumper } from './clangAst';
import type { CompileArgs } from './compileDb';
import type { FunctionDecl, FunctionRecord } from './types';

export interface IndexRequest {
  relPath: string;
  absPath: string;
  source: string;
  compile: CompileArgs;
}

/** Signature spelled from the AST alone, for decls clang gives no mangled name (templates). */
export function fallbackSignature(decl: Pick<FunctionDecl, 'qualifiedName' | 'parameterTypes' | 'isConstMethod'>): string {
  return `${decl.qualifiedName}(${decl.parameterTypes.join(', ')})${decl.isConstMethod ? ' const' : ''}`;
}

/**
 * Lists the function definitions of one file at one revision. The AST dump
 * lives only for the duration of `index`; what comes out is plain data.
 */
export class FunctionIndexer {
  private readonly log: Logger;

  constructor(
    private readonly dumper: AstDumper,
    private readonly demangler: Demangler,
    log?: Logger,
  ) {
    this.log = log ?? nullLogger;
  }

  async index(req: IndexRequest): Promise<FunctionRecord[]> {
    const decls = await this.parse(req);
    const mangled = decls.flatMap((d) => (d.mangledName ? [d.mangledName] : []));
    const demangled = await this.demangler.demangleAll(mangled);

    const records = decls.map((d): FunctionRecord => {
      const fromSymbol = d.mangledName ? demangled.get(d.mangledName) : undefined;
      if (d.mangledName && fromSymbol === undefined) {
        this.log.debug('signature_fallback', { file: req.relPath, symbol: d.mangledName });
      }
      return { path: req.relPath, ...d, signature: fromSymbol ?? fallbackSignature(d) };
    });
    records.sort((a, b) => a.spanStart - b.spanStart || a.spanEnd - b.spanEnd);
    this.log.debug('file_indexed', { file: req.relPath, functions: records.length, degraded: req.compile.degraded });
    return records;
  }

  private async parse(req: IndexRequest): Promise<FunctionDecl[]> {
    const dump = await this.dumper.dump(req);
    if (dump.diagnostics.trim()) {
      this.log.debug('parse_diagnostics', { file: req.relPath, tail: dump.diagnostics.trim().split('\n').slice(-5) });
    }
    return extractFunctionDecls(dump.ast, dump.mainFile);
  }
}
