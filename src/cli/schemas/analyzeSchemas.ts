import { z } from 'zod';

export const AnalyzeSchema = z.object({
  path: z.string().default('.'),
  shas: z.array(z.string().min(1)).default([]),
  recent: z.coerce.number().int().positive().optional(),
  coverageMap: z.string().default('coverage_mapping.json'),
  compileDb: z.string().optional(),
  allowMissingCompileDb: z.boolean().default(false),
  rootCommits: z.enum(['skip', 'all-lines']).optional(),
  format: z.enum(['json', 'text']).default('json'),
  minCoverage: z.coerce.number().min(0).max(100).optional(),
  gate: z.boolean().default(true),
  concurrency: z.coerce.number().int().positive().optional(),
});

export type AnalyzeInput = z.infer<typeof AnalyzeSchema>;
