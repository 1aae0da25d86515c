import type { CommitInfo } from '../git';
import type { FunctionIdentity } from '../identity';
import type { FunctionRecord } from '../indexer/types';

export type MatchKind = 'exact' | 'pathless';

export type MatchResult =
  | { status: 'covered'; matchKind: MatchKind; tests: string[]; matched: FunctionIdentity }
  | { status: 'fuzzy'; candidates: FunctionIdentity[] }
  | { status: 'uncovered' };

/** A function whose span contains at least one changed line. */
export interface SelectedFunction {
  record: FunctionRecord;
  /** Ascending. */
  changedLines: number[];
}

export interface MovedFrom {
  path: string;
  spanStart: number;
  spanEnd: number;
}

export type MoveClassification =
  | { kind: 'modified' }
  | { kind: 'pure-move'; from: MovedFrom };

export interface ChangedFunction {
  path: string;
  qualifiedName: string;
  signature: string;
  stableKey: string;
  identity: FunctionIdentity;
  spanStart: number;
  spanEnd: number;
  changedLines: number[];
  match: MatchResult;
}

export interface PureMove {
  path: string;
  qualifiedName: string;
  signature: string;
  stableKey: string;
  spanStart: number;
  spanEnd: number;
  from: MovedFrom;
}

export type SkipReason = 'not_in_compile_db' | 'missing_at_revision' | 'parse_failed';

export interface SkippedFile {
  path: string;
  reason: SkipReason;
  detail?: string;
}

export interface CommitTotals {
  changed: number;
  covered: number;
  /** Includes the functions that only have fuzzy candidates. */
  uncovered: number;
  fuzzy: number;
}

export interface CommitReport {
  sha: string;
  parent: string | null;
  info: CommitInfo | null;
  skipped?: 'root-commit';
  changedFunctions: ChangedFunction[];
  pureMoves: PureMove[];
  skippedFiles: SkippedFile[];
  totals: CommitTotals;
  /** Union of the tests covering any changed function, sorted. */
  coveringTests: string[];
}
