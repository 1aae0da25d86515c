import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { CompileDatabaseError, errorMessage } from '../errors';

const CompileCommandSchema = z.object({
  directory: z.string(),
  file: z.string(),
  arguments: z.array(z.string()).optional(),
  command: z.string().optional(),
  output: z.string().optional(),
}).refine((c) => c.arguments !== undefined || c.command !== undefined, {
  message: 'entry needs "arguments" or "command"',
});

const CompileDatabaseSchema = z.array(CompileCommandSchema);

/** Arguments for parsing one file, and the directory they are relative to. */
export interface CompileArgs {
  args: string[];
  directory: string;
  /** True when guessed rather than taken from the database. */
  degraded: boolean;
}

/** Splits a shell command line the way POSIX sh would, minus expansions. */
export function splitCommandLine(command: string): string[] {
  const out: string[] = [];
  let cur = '';
  let inWord = false;
  let quote: '"' | "'" | null = null;
  for (let i = 0; i < command.length; i++) {
    const ch = command[i];
    if (quote === "'") {
      if (ch === "'") quote = null;
      else cur += ch;
      continue;
    }
    if (quote === '"') {
      if (ch === '"') quote = null;
      else if (ch === '\\' && i + 1 < command.length && '"\\$`'.includes(command[i + 1])) cur += command[++i];
      else cur += ch;
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (ch === '\\' && i + 1 < command.length) {
      cur += command[++i];
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) out.push(cur);
      cur = '';
      inWord = false;
    } else {
      cur += ch;
      inWord = true;
    }
  }
  if (inWord) out.push(cur);
  return out;
}

const DROP_WITH_VALUE = new Set(['-o', '-MF', '-MT', '-MQ', '--serialize-diagnostics']);
const DROP_ALONE = new Set(['-c', '-S', '-E', '-MD', '-MMD', '-MP', '-M', '-MM', '-Werror', '--']);

/**
 * Keeps what affects parsing (includes, defines, language and standard
 * flags) and removes the compiler itself, outputs, dependency-file flags and
 * the input file.
 */
export function sanitizeCompileArgs(argv: readonly string[], sourceFile: string, directory: string): string[] {
  const absSource = path.resolve(directory, sourceFile);
  const out: string[] = [];
  for (let i = 1; i < argv.length; i++) {
    const a = argv[i];
    if (DROP_WITH_VALUE.has(a)) {
      i++;
      continue;
    }
    if (DROP_ALONE.has(a)) continue;
    if (a.startsWith('-o') && a.length > 2 && !a.startsWith('-objc')) continue;
    if (a.startsWith('-MF') || a.startsWith('-MT') || a.startsWith('-MQ')) continue;
    if (!a.startsWith('-') && path.resolve(directory, a) === absSource) continue;
    out.push(a);
  }
  return out;
}

export class CompileDatabase {
  private readonly byFile = new Map<string, CompileArgs>();

  constructor(entries: z.infer<typeof CompileDatabaseSchema>) {
    for (const e of entries) {
      const argv = e.arguments ?? splitCommandLine(e.command ?? '');
      const abs = path.resolve(e.directory, e.file);
      // first entry wins when a file is compiled more than once
      if (this.byFile.has(abs)) continue;
      this.byFile.set(abs, {
        args: sanitizeCompileArgs(argv, e.file, e.directory),
        directory: e.directory,
        degraded: false,
      });
    }
  }

  static async load(file: string): Promise<CompileDatabase> {
    let raw: unknown;
    try {
      raw = await fs.readJSON(file);
    } catch (e) {
      throw new CompileDatabaseError(`Cannot read compilation database ${file}: ${errorMessage(e)}`);
    }
    const parsed = CompileDatabaseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CompileDatabaseError(`Invalid compilation database ${file}: ${parsed.error.issues[0]?.message ?? 'bad shape'}`);
    }
    return new CompileDatabase(parsed.data);
  }

  get size(): number {
    return this.byFile.size;
  }

  /** Arguments for an absolute path, or null when the database never compiles it. */
  argsFor(absPath: string): CompileArgs | null {
    return this.byFile.get(path.resolve(absPath)) ?? null;
  }
}

export function degradedCompileArgs(repoRoot: string): CompileArgs {
  return {
    args: [
      '-x', 'c++', '-std=c++17',
      `-I${path.join(repoRoot, 'include')}`,
      `-I${path.join(repoRoot, 'src')}`,
    ],
    directory: repoRoot,
    degraded: true,
  };
}

/**
 * Where the database comes from decides the fallback: a required database
 * that is missing is fatal, an optional one falls back to guessed arguments.
 */
export class CompileArgsResolver {
  constructor(
    private readonly repoRoot: string,
    private readonly db: CompileDatabase | null,
  ) {}

  static async open(repoRoot: string, dbPath: string, required: boolean): Promise<CompileArgsResolver> {
    const file = path.resolve(repoRoot, dbPath);
    if (!await fs.pathExists(file)) {
      if (required) throw new CompileDatabaseError(`Compilation database not found: ${file}`);
      return new CompileArgsResolver(repoRoot, null);
    }
    return new CompileArgsResolver(repoRoot, await CompileDatabase.load(file));
  }

  get hasDatabase(): boolean {
    return this.db !== null;
  }

  /** null: the database exists but does not know this file. */
  resolve(relPath: string): CompileArgs | null {
    if (!this.db) return degradedCompileArgs(this.repoRoot);
    return this.db.argsFor(path.resolve(this.repoRoot, relPath));
  }

  /**
   * Arguments for a parent-side file, which the database (built for the
   * current tree) often no longer lists: a renamed or deleted file borrows
   * the entry of the path it became, then the guessed arguments.
   */
  resolveAtParent(relPath: string, currentPath?: string): CompileArgs {
    return this.resolve(relPath)
      ?? (currentPath === undefined ? null : this.resolve(currentPath))
      ?? degradedCompileArgs(this.repoRoot);
  }
}
