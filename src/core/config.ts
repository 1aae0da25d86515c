import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';

export type RootCommitPolicy = 'skip' | 'all-lines';

export interface CoverageConfig {
  /** ctest build directory holding the instrumented binary. */
  buildDir: string;
  testTimeoutMs: number;
  /** Path fragment that marks a file as part of the project's own tree. */
  sourceMarker: string;
  excludedPathFragments: string[];
  ctestBin: string;
  fastcovBin: string;
  gcovBin: string;
  cxxfiltBin: string;
}

export interface AnalysisConfig {
  sourceExtensions: string[];
  compileDbPath: string;
  requireCompileDb: boolean;
  rootCommitPolicy: RootCommitPolicy;
  clangBin: string;
  fuzzyCandidateLimit: number;
  concurrency: number;
}

export interface GateConfig {
  minCoverage: number;
}

export interface CovmapConfig {
  coverage: CoverageConfig;
  analysis: AnalysisConfig;
  gate: GateConfig;
}

export function defaultCoverageConfig(): CoverageConfig {
  return {
    buildDir: 'build',
    testTimeoutMs: 120_000,
    sourceMarker: 'src/',
    excludedPathFragments: [
      '/usr/include/', '/usr/lib/', '/System/', '/Library/',
      '/Applications/', '/opt/', '/deps/', '/build/',
      'CMakeFiles/', 'cmake/',
    ],
    ctestBin: 'ctest',
    fastcovBin: 'fastcov',
    gcovBin: 'gcov',
    cxxfiltBin: 'c++filt',
  };
}

export function defaultAnalysisConfig(): AnalysisConfig {
  return {
    sourceExtensions: ['.cpp', '.cc', '.cxx', '.c', '.h', '.hpp', '.hh'],
    compileDbPath: 'build/compile_commands.json',
    requireCompileDb: true,
    rootCommitPolicy: 'skip',
    clangBin: 'clang++',
    fuzzyCandidateLimit: 5,
    concurrency: 4,
  };
}

export function defaultCovmapConfig(): CovmapConfig {
  return {
    coverage: defaultCoverageConfig(),
    analysis: defaultAnalysisConfig(),
    gate: { minCoverage: 80 },
  };
}

const ConfigFileSchema = z.object({
  coverage: z.object({
    buildDir: z.string(),
    testTimeoutMs: z.number().int().positive(),
    sourceMarker: z.string().min(1),
    excludedPathFragments: z.array(z.string()),
    ctestBin: z.string(),
    fastcovBin: z.string(),
    gcovBin: z.string(),
    cxxfiltBin: z.string(),
  }).partial().optional(),
  analysis: z.object({
    sourceExtensions: z.array(z.string().startsWith('.')),
    compileDbPath: z.string(),
    requireCompileDb: z.boolean(),
    rootCommitPolicy: z.enum(['skip', 'all-lines']),
    clangBin: z.string(),
    fuzzyCandidateLimit: z.number().int().nonnegative(),
    concurrency: z.number().int().positive(),
  }).partial().optional(),
  gate: z.object({
    minCoverage: z.number().min(0).max(100),
  }).partial().optional(),
});

export type CovmapConfigOverrides = z.infer<typeof ConfigFileSchema>;

export function mergeConfig(overrides?: CovmapConfigOverrides, base: CovmapConfig = defaultCovmapConfig()): CovmapConfig {
  if (!overrides) return base;
  return {
    coverage: { ...base.coverage, ...overrides.coverage },
    analysis: { ...base.analysis, ...overrides.analysis },
    gate: { ...base.gate, ...overrides.gate },
  };
}

export function configPath(repoRoot: string): string {
  return path.join(repoRoot, '.covmap', 'config.json');
}

/** Reads `.covmap/config.json` when present; a malformed file is an error, a missing one is not. */
export async function loadConfig(repoRoot: string): Promise<CovmapConfig> {
  const file = configPath(repoRoot);
  if (!await fs.pathExists(file)) return defaultCovmapConfig();
  const raw: unknown = await fs.readJSON(file);
  return mergeConfig(ConfigFileSchema.parse(raw));
}
