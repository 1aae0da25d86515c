import simpleGit, { type SimpleGit } from 'simple-git';
import path from 'path';
import { CommitResolutionError, errorMessage } from './errors';

export async function resolveGitRoot(startDir: string): Promise<string> {
  const resolved = path.resolve(startDir);
  try {
    const git = simpleGit(resolved);
    const root = await git.raw(['rev-parse', '--show-toplevel']);
    return root.trim();
  } catch {
    return resolved;
  }
}

export interface CommitInfo {
  sha: string;
  author: string;
  date: string;
  subject: string;
}

/** Read-only view of repository history used by the commit analyzer. */
export interface RevisionSource {
  /** Full SHA of `rev`; throws CommitResolutionError when it is not a commit. */
  resolveCommit(rev: string): Promise<string>;
  parentsOf(sha: string): Promise<string[]>;
  /** Zero-context diff of `to` against `from`, or against the empty tree when `from` is null. */
  diff(from: string | null, to: string): Promise<string>;
  /** File contents at a revision, or null when the file does not exist there. */
  readFile(rev: string, filePath: string): Promise<string | null>;
  commitInfo(sha: string): Promise<CommitInfo>;
  recentCommits(count: number, ref?: string): Promise<string[]>;
}

const DIFF_FLAGS = ['-U0', '--no-color', '--no-ext-diff', '-M'];

export class GitRevisionSource implements RevisionSource {
  private readonly git: SimpleGit;

  constructor(readonly repoRoot: string) {
    this.git = simpleGit(repoRoot);
  }

  async resolveCommit(rev: string): Promise<string> {
    try {
      const out = await this.git.raw(['rev-parse', '--verify', '--quiet', `${rev}^{commit}`]);
      const sha = out.trim();
      if (!sha) throw new CommitResolutionError(rev);
      return sha;
    } catch (e) {
      if (e instanceof CommitResolutionError) throw e;
      throw new CommitResolutionError(rev, errorMessage(e));
    }
  }

  async parentsOf(sha: string): Promise<string[]> {
    const out = await this.git.raw(['rev-list', '--parents', '-n', '1', sha]);
    return out.trim().split(/\s+/).slice(1).filter(Boolean);
  }

  async diff(from: string | null, to: string): Promise<string> {
    if (from === null) {
      // a root commit's own patch is its diff against the empty tree
      return this.git.raw(['show', '--format=', ...DIFF_FLAGS, to]);
    }
    return this.git.raw(['diff', ...DIFF_FLAGS, from, to]);
  }

  async readFile(rev: string, filePath: string): Promise<string | null> {
    try {
      return await this.git.show([`${rev}:${filePath}`]);
    } catch {
      return null;
    }
  }

  async commitInfo(sha: string): Promise<CommitInfo> {
    const out = await this.git.raw(['log', '-1', '--format=%H%x00%an%x00%aI%x00%s', sha]);
    const [full = sha, author = '', date = '', subject = ''] = out.trim().split('\0');
    return { sha: full, author, date, subject };
  }

  async recentCommits(count: number, ref: string = 'HEAD'): Promise<string[]> {
    const out = await this.git.raw(['log', '-n', String(count), '--format=%H', ref]);
    return out.split('\n').map((s) => s.trim()).filter(Boolean);
  }
}
