import { formatIdentityKey } from '../identity';
import { formatPercent, type BatchSummary } from './aggregate';
import type { ChangedFunction, CommitReport } from './types';

const LISTED_TESTS = 10;

function matchLabel(f: ChangedFunction): string {
  switch (f.match.status) {
    case 'covered':
      return `[covered ${f.match.matchKind}] (${f.match.tests.length} ${f.match.tests.length === 1 ? 'test' : 'tests'})`;
    case 'fuzzy':
      return '[fuzzy]';
    case 'uncovered':
      return '[uncovered]';
  }
}

export function commitTotalsLine(r: CommitReport): string {
  return `Changed functions: ${r.totals.changed}; with coverage: ${r.totals.covered}; without: ${r.totals.uncovered};`;
}

export function renderCommitReport(r: CommitReport): string {
  const lines: string[] = [];
  const subject = r.info?.subject ? ` ${r.info.subject}` : '';
  lines.push(`commit ${r.sha}${subject}`);
  if (r.skipped === 'root-commit') {
    lines.push('  skipped: root commit has no parent');
  }
  for (const f of r.changedFunctions) {
    lines.push(`  ${f.path}:${f.identity.startLine} ${f.signature} ${matchLabel(f)}`);
    if (f.match.status === 'fuzzy') {
      for (const c of f.match.candidates) lines.push(`      candidate ${formatIdentityKey(c)}`);
    }
  }
  for (const m of r.pureMoves) {
    lines.push(`  ${m.path}:${m.spanStart} ${m.signature} [moved from ${m.from.path}:${m.from.spanStart}]`);
  }
  for (const s of r.skippedFiles) {
    lines.push(`  ${s.path} [skipped: ${s.reason}]`);
  }
  if (r.coveringTests.length > 0) {
    lines.push(`  Covering tests (${r.coveringTests.length}):`);
    for (const t of r.coveringTests.slice(0, LISTED_TESTS)) lines.push(`    ${t}`);
    const rest = r.coveringTests.length - LISTED_TESTS;
    if (rest > 0) lines.push(`    ... and ${rest} more`);
  }
  lines.push(commitTotalsLine(r));
  return lines.join('\n');
}

export function summaryLine(s: BatchSummary): string {
  return (
    `commits=${s.commits}; total_functions=${s.totalFunctions}; with_coverage=${s.withCoverage}; ` +
    `without_coverage=${s.withoutCoverage}; overall_coverage=${formatPercent(s.overallCoverage)}%`
  );
}

export function renderBatch(reports: readonly CommitReport[], summary: BatchSummary): string {
  const blocks = reports.map(renderCommitReport);
  blocks.push(summaryLine(summary));
  if (summary.minCoverage !== null) {
    blocks.push(`gate: ${summary.passed ? 'passed' : 'failed'} (minimum ${formatPercent(summary.minCoverage)}%)`);
  }
  return blocks.join('\n\n') + '\n';
}
