/**
 * Domain errors. Each carries a machine-readable `reason` that handlers copy
 * into the CLI error payload.
 */
export abstract class CovmapError extends Error {
  abstract readonly reason: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The symbol is not a valid mangled name for the Itanium C++ ABI. */
export class DemangleError extends CovmapError {
  readonly reason = 'demangle_failed';

  constructor(readonly symbol: string, detail?: string) {
    super(`Cannot demangle symbol "${symbol}"${detail ? `: ${detail}` : ''}`);
  }
}

/** Coverage counters could not be zeroed; the shard must stop. */
export class CounterResetError extends CovmapError {
  readonly reason = 'counter_reset_failed';
}

export class NoParentError extends CovmapError {
  readonly reason = 'no_parent';

  constructor(readonly sha: string) {
    super(`Commit ${sha} has no parent`);
  }
}

export class CommitResolutionError extends CovmapError {
  readonly reason = 'commit_not_found';

  constructor(readonly rev: string, detail?: string) {
    super(`Cannot resolve commit "${rev}"${detail ? `: ${detail}` : ''}`);
  }
}

export class CompileDatabaseError extends CovmapError {
  readonly reason = 'compile_db_unavailable';
}

export class CoverageMapFormatError extends CovmapError {
  readonly reason = 'coverage_map_invalid';
}

/** A single file could not be parsed. Contained by the commit analyzer. */
export class ParseFailureError extends CovmapError {
  readonly reason = 'parse_failed';

  constructor(readonly file: string, detail: string) {
    super(`Failed to parse ${file}: ${detail}`);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
