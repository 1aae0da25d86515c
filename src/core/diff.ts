import type { RootCommitPolicy } from './config';
import { NoParentError } from './errors';
import type { RevisionSource } from './git';

/** New-side line numbers touched by one commit, per file. */
export interface ChangedLineSet {
  files: Map<string, Set<number>>;
  /** new path -> old path, for files the diff reports as renamed. */
  renames: Map<string, string>;
  /** Every old-side path the diff touches, deleted files included. */
  oldPaths: Set<string>;
}

const HUNK_HEADER = /^@@ -\d+(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

function unquoteGitPath(raw: string): string {
  const p = raw.replace(/\t.*$/, '');
  if (!p.startsWith('"') || !p.endsWith('"')) return p;
  return p.slice(1, -1).replace(/\\(["\\])/g, '$1');
}

/**
 * Reads a zero-context unified diff. Inside a hunk the cursor starts at the
 * header's new-side line: `+` lines are recorded and advance it, context
 * lines only advance it, `-` lines leave it alone. The header's line counts
 * bound the hunk, so added or removed lines that look like file headers
 * (`+++`, `---`) are read as content.
 */
export function parseUnifiedDiff(diffText: string): ChangedLineSet {
  const files = new Map<string, Set<number>>();
  const renames = new Map<string, string>();
  const oldPaths = new Set<string>();
  let currentFile: string | null = null;
  let oldFile: string | null = null;
  let cursor = 0;
  let oldLeft = 0;
  let newLeft = 0;

  for (const raw of diffText.split('\n')) {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    const inHunk = oldLeft > 0 || newLeft > 0;

    if (inHunk && currentFile !== null) {
      if (line.startsWith('+')) {
        files.get(currentFile)?.add(cursor);
        cursor++;
        newLeft--;
        continue;
      }
      if (line.startsWith('-')) {
        oldLeft--;
        continue;
      }
      if (line.startsWith(' ')) {
        cursor++;
        oldLeft--;
        newLeft--;
        continue;
      }
      if (line.startsWith('\\')) continue; // "\ No newline at end of file"
      // anything else ends a truncated hunk and is read as a header below
      oldLeft = 0;
      newLeft = 0;
    }

    if (line.startsWith('diff --git ')) {
      currentFile = null;
      oldFile = null;
    } else if (line.startsWith('rename from ')) {
      oldFile = line.slice('rename from '.length);
    } else if (line.startsWith('--- ')) {
      const p = unquoteGitPath(line.slice(4));
      if (p.startsWith('a/')) {
        oldFile = oldFile ?? p.slice(2);
        oldPaths.add(p.slice(2));
      }
    } else if (line.startsWith('+++ ')) {
      const p = unquoteGitPath(line.slice(4));
      // `+++ /dev/null`: the file is gone, nothing on the new side
      currentFile = p.startsWith('b/') ? p.slice(2) : null;
      if (currentFile !== null) {
        if (!files.has(currentFile)) files.set(currentFile, new Set());
        if (oldFile !== null && oldFile !== currentFile) renames.set(currentFile, oldFile);
      }
    } else if (line.startsWith('@@')) {
      const m = HUNK_HEADER.exec(line);
      if (m && currentFile !== null) {
        oldLeft = m[1] === undefined ? 1 : Number(m[1]);
        cursor = Number(m[2]);
        newLeft = m[3] === undefined ? 1 : Number(m[3]);
      }
    }
  }

  return { files, renames, oldPaths };
}

export interface ExtractedDiff {
  changed: ChangedLineSet;
  /** Revision the diff was taken against; null when diffed against the empty tree. */
  parent: string | null;
}

/**
 * Changed lines of `sha` against its first parent. A root commit either
 * raises NoParentError (`skip`) or counts every line as changed (`all-lines`).
 */
export async function extractChangedLines(
  source: RevisionSource,
  sha: string,
  policy: RootCommitPolicy,
): Promise<ExtractedDiff> {
  const parents = await source.parentsOf(sha);
  const parent = parents[0] ?? null;
  if (parent === null && policy === 'skip') throw new NoParentError(sha);
  const text = await source.diff(parent, sha);
  return { changed: parseUnifiedDiff(text), parent };
}
