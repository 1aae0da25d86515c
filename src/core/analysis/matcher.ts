import type { CoverageMap, CoverageEntry } from '../coverageMap';
import { signatureName, type FunctionIdentity } from '../identity';
import type { MatchResult } from './types';

/**
 * Name used to group overloads: `signatureName` with the template argument
 * list of the last component dropped, so `ns::f<int>` and `ns::f` agree.
 */
export function overloadName(signature: string): string {
  const name = signatureName(signature);
  if (!name.endsWith('>') || /\boperator\b/.test(name)) return name;
  let depth = 0;
  for (let i = name.length - 1; i >= 0; i--) {
    if (name[i] === '>') depth++;
    else if (name[i] === '<' && --depth === 0) return name.slice(0, i);
  }
  return name;
}

function unionTests(entries: readonly CoverageEntry[]): string[] {
  const all = new Set<string>();
  for (const e of entries) for (const t of e.tests) all.add(t);
  return Array.from(all).sort();
}

function nearest(entries: readonly CoverageEntry[], line: number): CoverageEntry {
  let best = entries[0];
  for (const e of entries) {
    if (Math.abs(e.identity.startLine - line) < Math.abs(best.identity.startLine - line)) best = e;
  }
  return best;
}

/**
 * Looks a changed function up in the map, most specific tier first:
 * exact key, then path and signature at any line, then same-named functions
 * in the same file. Only the first two tiers count as coverage.
 */
export class CoverageMatcher {
  constructor(
    private readonly map: CoverageMap,
    private readonly fuzzyCandidateLimit = 5,
  ) {}

  match(id: FunctionIdentity): MatchResult {
    const exact = this.map.lookupExact(id);
    if (exact) {
      return { status: 'covered', matchKind: 'exact', tests: [...exact.tests], matched: exact.identity };
    }

    const pathless = this.map.lookupPathless(id.path, id.signature);
    if (pathless.length > 0) {
      return {
        status: 'covered',
        matchKind: 'pathless',
        tests: unionTests(pathless),
        matched: nearest(pathless, id.startLine).identity,
      };
    }

    const candidates = this.fuzzyCandidates(id);
    if (candidates.length > 0) return { status: 'fuzzy', candidates };
    return { status: 'uncovered' };
  }

  private fuzzyCandidates(id: FunctionIdentity): FunctionIdentity[] {
    if (this.fuzzyCandidateLimit <= 0) return [];
    const name = overloadName(id.signature);
    return this.map
      .entriesForPath(id.path)
      .filter((e) => e.identity.signature !== id.signature && overloadName(e.identity.signature) === name)
      .slice(0, this.fuzzyCandidateLimit)
      .map((e) => e.identity);
  }
}
