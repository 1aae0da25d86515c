import { DemangleError } from './errors';
import { describeFailure, runTool } from './proc';

/**
 * Turns compiler-mangled symbols into the canonical signature spelling shared
 * by the coverage recorder and the function indexer. Both sides must go
 * through the same implementation or their identities will not line up.
 */
export interface Demangler {
  demangle(symbol: string): Promise<string>;
  /** Demangles every symbol it can; failures are left out of the result. */
  demangleAll(symbols: Iterable<string>): Promise<Map<string, string>>;
}

const C_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const ITANIUM_PREFIX = /^_{1,2}Z/;

export function normalizeSignatureSpacing(sig: string): string {
  return sig.replace(/\s+/g, ' ').trim();
}

/** C-linkage functions are not mangled; their name is their signature. */
export function isPlainCSymbol(symbol: string): boolean {
  return C_IDENTIFIER.test(symbol) && !ITANIUM_PREFIX.test(symbol);
}

export function isItaniumSymbol(symbol: string): boolean {
  return ITANIUM_PREFIX.test(symbol) && !/\s/.test(symbol);
}

export interface CxxFiltOptions {
  bin?: string;
  timeoutMs?: number;
}

/** Batches symbols through one `c++filt` process per call; results are cached per instance. */
export class CxxFiltDemangler implements Demangler {
  private readonly cache = new Map<string, string | DemangleError>();
  private readonly bin: string;
  private readonly timeoutMs: number;

  constructor(opts: CxxFiltOptions = {}) {
    this.bin = opts.bin ?? 'c++filt';
    this.timeoutMs = opts.timeoutMs ?? 60_000;
  }

  async demangle(symbol: string): Promise<string> {
    await this.fill([symbol]);
    const hit = this.cache.get(symbol);
    if (hit === undefined) throw new DemangleError(symbol);
    if (hit instanceof DemangleError) throw hit;
    return hit;
  }

  async demangleAll(symbols: Iterable<string>): Promise<Map<string, string>> {
    const list = Array.from(new Set(symbols));
    await this.fill(list);
    const out = new Map<string, string>();
    for (const s of list) {
      const hit = this.cache.get(s);
      if (typeof hit === 'string') out.set(s, hit);
    }
    return out;
  }

  private async fill(symbols: string[]): Promise<void> {
    const pending: string[] = [];
    for (const s of symbols) {
      if (this.cache.has(s)) continue;
      if (isPlainCSymbol(s)) this.cache.set(s, s);
      else if (!isItaniumSymbol(s)) this.cache.set(s, new DemangleError(s, 'not an Itanium C++ symbol'));
      else pending.push(s);
    }
    if (pending.length === 0) return;

    const res = runTool(this.bin, [], { input: pending.join('\n') + '\n', timeoutMs: this.timeoutMs });
    if (res.status !== 0) throw new Error(describeFailure(this.bin, res));
    const lines = res.stdout.split('\n');
    for (let i = 0; i < pending.length; i++) {
      const symbol = pending[i];
      const out = normalizeSignatureSpacing(lines[i] ?? '');
      if (!out || out === symbol) this.cache.set(symbol, new DemangleError(symbol, 'c++filt left it unchanged'));
      else this.cache.set(symbol, out);
    }
  }
}
