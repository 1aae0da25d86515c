import { stableKey } from '../identity';
import type { FunctionRecord } from '../indexer/types';
import { normalizeBody, sliceLines } from './normalize';
import type { MoveClassification, SelectedFunction } from './types';

/** One file as it stood in the parent revision. */
export interface ParentFile {
  path: string;
  source: string;
  records: readonly FunctionRecord[];
}

/** The parent revision, as far as the commit being analyzed can see it. */
export interface ParentView {
  /** null when the path did not exist in the parent or could not be indexed. */
  file(path: string): Promise<ParentFile | null>;
  /** Every parent-side file the commit touches, indexed. */
  touchedFiles(): Promise<ParentFile[]>;
}

export interface MoveContext {
  /** Text of the file holding `changed`, at the analyzed revision. */
  source: string;
  parent: ParentView;
  /** Parent-side path when the file was renamed. */
  renamedFrom?: string;
}

export type BodyNormalizer = (text: string) => string;

export function recordStableKey(r: FunctionRecord): string {
  return stableKey(r.qualifiedName, r.parameterTypes);
}

/**
 * Tells relocated functions from edited ones. The first parent-side file that
 * knows the function's stable key decides: an identical normalized body there
 * is a pure move, anything else a modification.
 */
export class MoveDetector {
  constructor(private readonly normalize: BodyNormalizer = normalizeBody) {}

  async classify(changed: SelectedFunction, ctx: MoveContext): Promise<MoveClassification> {
    const key = recordStableKey(changed.record);
    const body = this.normalize(sliceLines(ctx.source, changed.record.spanStart, changed.record.spanEnd));

    const tried = new Set<string>();
    const lookIn = async (filePath: string): Promise<MoveClassification | null> => {
      if (tried.has(filePath)) return null;
      tried.add(filePath);
      return this.compareIn(await ctx.parent.file(filePath), key, body);
    };

    const samePath = await lookIn(changed.record.path);
    if (samePath) return samePath;
    if (ctx.renamedFrom) {
      const renamed = await lookIn(ctx.renamedFrom);
      if (renamed) return renamed;
    }
    for (const pf of await ctx.parent.touchedFiles()) {
      if (tried.has(pf.path)) continue;
      tried.add(pf.path);
      const elsewhere = this.compareIn(pf, key, body);
      if (elsewhere) return elsewhere;
    }
    return { kind: 'modified' };
  }

  /**
   * null when `pf` has no function under `key`, so the search goes on.
   * Duplicate definitions under one key (#if branches) move if any matches.
   */
  private compareIn(pf: ParentFile | null, key: string, body: string): MoveClassification | null {
    if (!pf) return null;
    const namesakes = pf.records.filter((r) => recordStableKey(r) === key);
    if (namesakes.length === 0) return null;
    for (const r of namesakes) {
      const before = this.normalize(sliceLines(pf.source, r.spanStart, r.spanEnd));
      if (before === body) {
        return { kind: 'pure-move', from: { path: pf.path, spanStart: r.spanStart, spanEnd: r.spanEnd } };
      }
    }
    return { kind: 'modified' };
  }
}
