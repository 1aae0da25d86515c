import { z } from 'zod';
import { isProjectSource, simplifyProjectPath } from '../paths';

/**
 * fastcov's combined JSON: per source file, per test-name bucket, the gcov
 * function table. fastcov writes everything under the '' bucket unless
 * `--test-name` is given.
 */
const FastcovFunctionSchema = z.object({
  start_line: z.number().int().nonnegative().default(0),
  execution_count: z.number().nonnegative().default(0),
}).passthrough();

const FastcovSourceBucketSchema = z.object({
  functions: z.record(z.string(), FastcovFunctionSchema).default({}),
}).passthrough();

export const FastcovReportSchema = z.object({
  sources: z.record(z.string(), z.record(z.string(), FastcovSourceBucketSchema)).default({}),
}).passthrough();

export type FastcovReport = z.infer<typeof FastcovReportSchema>;

/** A function that executed at least once during the captured run. */
export interface HitFunction {
  path: string;
  symbol: string;
  startLine: number;
  executionCount: number;
}

export interface HitFilter {
  sourceMarker: string;
  excludedPathFragments: readonly string[];
  projectRoot?: string;
}

export function parseFastcovReport(raw: unknown): FastcovReport {
  return FastcovReportSchema.parse(raw);
}

export function collectHitFunctions(report: FastcovReport, filter: HitFilter): HitFunction[] {
  const out: HitFunction[] = [];
  for (const [file, buckets] of Object.entries(report.sources)) {
    if (!isProjectSource(file, filter.sourceMarker, filter.excludedPathFragments)) continue;
    const relPath = simplifyProjectPath(file, filter.sourceMarker, filter.projectRoot);
    for (const bucket of Object.values(buckets)) {
      for (const [symbol, fn] of Object.entries(bucket.functions)) {
        if (fn.execution_count <= 0 || fn.start_line < 1) continue;
        out.push({ path: relPath, symbol, startLine: fn.start_line, executionCount: fn.execution_count });
      }
    }
  }
  return out;
}
