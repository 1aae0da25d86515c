import { z } from 'zod';

const optionalCount = z.coerce.number().int().nonnegative().optional();

export const MapBuildSchema = z.object({
  path: z.string().default('.'),
  buildDir: z.string().optional(),
  start: optionalCount,
  end: optionalCount,
  pattern: z.string().optional(),
  maxTests: z.coerce.number().int().positive().optional(),
  timeoutMs: z.coerce.number().int().positive().optional(),
  out: z.string().optional(),
}).refine((v) => v.start === undefined || v.end === undefined || v.start <= v.end, {
  message: '--start must not exceed --end',
  path: ['start'],
});

export const MapMergeSchema = z.object({
  inputs: z.array(z.string()).default([]),
  glob: z.string().optional(),
  out: z.string().default('coverage_mapping.json'),
  gzip: z.boolean().default(false),
});

export const MapStatsSchema = z.object({
  file: z.string().min(1),
});

export type MapBuildInput = z.infer<typeof MapBuildSchema>;
export type MapMergeInput = z.infer<typeof MapMergeSchema>;
export type MapStatsInput = z.infer<typeof MapStatsSchema>;
