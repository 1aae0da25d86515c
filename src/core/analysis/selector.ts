import type { FunctionRecord } from '../indexer/types';
import type { SelectedFunction } from './types';

function spanLength(r: FunctionRecord): number {
  return r.spanEnd - r.spanStart;
}

/**
 * Innermost record containing `line`: the shortest span wins, then the later
 * start line, then whichever came first in `records`.
 */
export function innermostContaining(records: readonly FunctionRecord[], line: number): FunctionRecord | null {
  let best: FunctionRecord | null = null;
  for (const r of records) {
    if (line < r.spanStart || line > r.spanEnd) continue;
    if (
      !best ||
      spanLength(r) < spanLength(best) ||
      (spanLength(r) === spanLength(best) && r.spanStart > best.spanStart)
    ) {
      best = r;
    }
  }
  return best;
}

/**
 * Maps each changed line of one file to the innermost function around it.
 * Lines outside every function are dropped; each function appears once,
 * ordered by span start.
 */
export function selectChangedFunctions(lines: Iterable<number>, records: readonly FunctionRecord[]): SelectedFunction[] {
  const hits = new Map<FunctionRecord, number[]>();
  for (const line of lines) {
    const owner = innermostContaining(records, line);
    if (!owner) continue;
    const list = hits.get(owner);
    if (list) list.push(line);
    else hits.set(owner, [line]);
  }
  return Array.from(hits, ([record, changedLines]) => ({
    record,
    changedLines: changedLines.sort((a, b) => a - b),
  })).sort((a, b) => a.record.spanStart - b.record.spanStart || a.record.spanEnd - b.record.spanEnd);
}
