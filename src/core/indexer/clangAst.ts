import path from 'path';
import { ParseFailureError } from '../errors';
import { runTool } from '../proc';
import type { CompileArgs } from './compileDb';
import type { FunctionDecl } from './types';

/** File name clang reports for a translation unit read from stdin. */
export const STDIN_FILE = '<stdin>';

export interface AstDumpRequest {
  /** Repository-relative path, for messages. */
  relPath: string;
  absPath: string;
  /** File contents at the revision being analyzed. */
  source: string;
  compile: CompileArgs;
}

export interface AstDump {
  ast: unknown;
  /** File name the dump uses for the parsed file itself. */
  mainFile: string;
  diagnostics: string;
}

/** Produces clang's JSON AST for one file. */
export interface AstDumper {
  dump(req: AstDumpRequest): Promise<AstDump>;
}

export interface ClangDumperOptions {
  clangBin: string;
  timeoutMs?: number;
  maxBuffer?: number;
}

/**
 * Runs `clang++ -fsyntax-only -Xclang -ast-dump=json` on contents fed
 * through stdin, so any revision can be parsed without a checkout. Quoted
 * includes still resolve against the file's real directory via `-iquote`.
 */
export class ClangJsonAstDumper implements AstDumper {
  constructor(private readonly opts: ClangDumperOptions) {}

  async dump(req: AstDumpRequest): Promise<AstDump> {
    const args = [...req.compile.args];
    if (!args.includes('-x')) args.unshift('-x', req.absPath.endsWith('.c') ? 'c' : 'c++');
    args.push(
      '-fsyntax-only', '-w', '-ferror-limit=0',
      '-Xclang', '-ast-dump=json',
      '-iquote', path.dirname(req.absPath),
      '-',
    );
    const res = runTool(this.opts.clangBin, args, {
      cwd: req.compile.directory,
      input: req.source,
      timeoutMs: this.opts.timeoutMs,
      maxBuffer: this.opts.maxBuffer ?? 1024 * 1024 * 1024,
    });
    if (res.spawnError) throw new ParseFailureError(req.relPath, res.spawnError.message);
    if (!res.stdout.trim()) {
      throw new ParseFailureError(req.relPath, res.stderr.trim().split('\n').slice(-3).join(' | ') || `exit ${res.status}`);
    }
    let ast: unknown;
    try {
      ast = JSON.parse(res.stdout);
    } catch (e) {
      throw new ParseFailureError(req.relPath, `unreadable AST dump: ${e instanceof Error ? e.message : String(e)}`);
    }
    return { ast, mainFile: STDIN_FILE, diagnostics: res.stderr };
  }
}

type JsonObject = Record<string, unknown>;

function isObject(v: unknown): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

interface Position {
  file: string;
  line: number;
}

/**
 * clang prints a location's `file` only when it differs from the previously
 * printed location, and `line` only when the file or line changed. Positions
 * are therefore only recoverable by reading locations in output order.
 */
class LocationTracker {
  private file = '';
  private line = 0;

  private readBare(loc: JsonObject): Position | null {
    if (!('offset' in loc) && !('line' in loc) && !('col' in loc)) return null;
    if (typeof loc.file === 'string') this.file = loc.file;
    if (typeof loc.line === 'number') this.line = loc.line;
    return { file: this.file, line: this.line };
  }

  /** Consumes one `loc`-shaped object and returns where it expands to. */
  read(loc: unknown): Position | null {
    if (!isObject(loc)) return null;
    if (isObject(loc.spellingLoc) || isObject(loc.expansionLoc)) {
      if (isObject(loc.spellingLoc)) this.readBare(loc.spellingLoc);
      return isObject(loc.expansionLoc) ? this.readBare(loc.expansionLoc) : null;
    }
    return this.readBare(loc);
  }
}

const FUNCTION_KINDS = new Set([
  'FunctionDecl',
  'CXXMethodDecl',
  'CXXConstructorDecl',
  'CXXDestructorDecl',
  'CXXConversionDecl',
]);
const RECORD_KINDS = new Set(['CXXRecordDecl', 'ClassTemplateSpecializationDecl', 'ClassTemplatePartialSpecializationDecl', 'RecordDecl']);
const TEMPLATE_KINDS = new Set(['FunctionTemplateDecl', 'ClassTemplateDecl']);
const BODY_KINDS = new Set(['CompoundStmt', 'CXXTryStmt']);

function childNodes(node: JsonObject): JsonObject[] {
  return Array.isArray(node.inner) ? node.inner.filter(isObject) : [];
}

function typeSpelling(t: unknown): string {
  if (!isObject(t)) return '';
  const s = typeof t.desugaredQualType === 'string' ? t.desugaredQualType : t.qualType;
  return typeof s === 'string' ? s.replace(/\s+/g, ' ').trim() : '';
}

function scopeName(node: JsonObject): string {
  if (typeof node.name === 'string' && node.name) return node.name;
  return node.kind === 'NamespaceDecl' ? '(anonymous namespace)' : '(anonymous)';
}

interface WalkState {
  /** Lexical scope names from the translation unit down. */
  scope: string[];
  /** Inside an implicit template instantiation; positions still tracked, nothing collected. */
  suppressed: boolean;
}

/**
 * Collects every function definition located in `mainFile` from a clang JSON
 * AST. Template patterns are kept; their implicit instantiations, implicit
 * members and bodiless declarations are not.
 */
export function extractFunctionDecls(ast: unknown, mainFile: string): FunctionDecl[] {
  const tracker = new LocationTracker();
  const scopesById = new Map<string, string>();
  const out: FunctionDecl[] = [];

  const visit = (node: JsonObject, state: WalkState): void => {
    const kind = typeof node.kind === 'string' ? node.kind : '';
    let declPos: Position | null = null;
    let begin: Position | null = null;
    let end: Position | null = null;

    // keys are read in output order; `inner` always comes last
    for (const [key, value] of Object.entries(node)) {
      if (key === 'loc') declPos = tracker.read(value);
      else if (key === 'range' && isObject(value)) {
        begin = tracker.read(value.begin);
        end = tracker.read(value.end);
      }
    }

    let childScope = state.scope;
    if (kind === 'NamespaceDecl' || RECORD_KINDS.has(kind)) {
      childScope = [...state.scope, scopeName(node)];
      if (typeof node.id === 'string') scopesById.set(node.id, childScope.join('::'));
    }

    if (FUNCTION_KINDS.has(kind) && typeof node.name === 'string') {
      const qualifiedName = qualify(node, state.scope, scopesById);
      const children = childNodes(node);
      const isDefinition = children.some((c) => typeof c.kind === 'string' && BODY_KINDS.has(c.kind));
      if (
        !state.suppressed
        && node.isImplicit !== true
        && isDefinition
        && declPos !== null && begin !== null && end !== null
        && declPos.file === mainFile
      ) {
        const fnType = isObject(node.type) && typeof node.type.qualType === 'string' ? node.type.qualType : '';
        out.push({
          qualifiedName,
          parameterTypes: children.filter((c) => c.kind === 'ParmVarDecl').map((c) => typeSpelling(c.type)),
          isConstMethod: kind !== 'FunctionDecl' && /\)\s*const\b/.test(fnType),
          mangledName: typeof node.mangledName === 'string' ? node.mangledName : null,
          declLine: declPos.line,
          spanStart: begin.line,
          spanEnd: Math.max(begin.line, end.line),
        });
      }
      childScope = [qualifiedName];
    }

    let patternSeen = false;
    for (const child of childNodes(node)) {
      let suppressed = state.suppressed;
      if (TEMPLATE_KINDS.has(kind) && typeof child.kind === 'string' && !child.kind.endsWith('ParmDecl')) {
        // first non-parameter child is the pattern, the rest are instantiations
        if (patternSeen) suppressed = true;
        patternSeen = true;
      }
      visit(child, { scope: childScope, suppressed });
    }
  };

  if (isObject(ast)) visit(ast, { scope: [], suppressed: false });
  return out;
}

function qualify(node: JsonObject, lexicalScope: string[], scopesById: Map<string, string>): string {
  const name = String(node.name);
  if (typeof node.parentDeclContextId === 'string') {
    const semantic = scopesById.get(node.parentDeclContextId);
    if (semantic !== undefined) return semantic ? `${semantic}::${name}` : name;
  }
  return [...lexicalScope, name].join('::');
}
