import { spawnSync } from 'child_process';

export interface ToolRunOptions {
  cwd?: string;
  input?: string;
  timeoutMs?: number;
  /** Upper bound on captured stdout; clang's JSON dumps are large. */
  maxBuffer?: number;
  env?: Record<string, string>;
}

export interface ToolRunResult {
  status: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
  /** Set when the process could not be started at all (ENOENT and friends). */
  spawnError?: Error;
}

export function runTool(bin: string, args: string[], opts: ToolRunOptions = {}): ToolRunResult {
  const startedAt = Date.now();
  const res = spawnSync(bin, args, {
    cwd: opts.cwd,
    input: opts.input,
    timeout: opts.timeoutMs,
    maxBuffer: opts.maxBuffer ?? 64 * 1024 * 1024,
    env: opts.env ? { ...process.env, ...opts.env } : process.env,
    encoding: 'utf-8',
    stdio: 'pipe',
  });
  const errCode = res.error && 'code' in res.error ? res.error.code : undefined;
  const timedOut = errCode === 'ETIMEDOUT';
  return {
    status: res.status,
    stdout: res.stdout ?? '',
    stderr: res.stderr ?? '',
    timedOut,
    durationMs: Date.now() - startedAt,
    spawnError: res.error && !timedOut ? res.error : undefined,
  };
}

export function describeFailure(bin: string, res: ToolRunResult): string {
  if (res.spawnError) return `${bin}: ${res.spawnError.message}`;
  if (res.timedOut) return `${bin}: timed out after ${res.durationMs}ms`;
  const tail = res.stderr.trim().split('\n').slice(-3).join(' | ');
  return `${bin} exited with ${res.status ?? 'signal'}${tail ? `: ${tail}` : ''}`;
}
