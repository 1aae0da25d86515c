import type { CLIError, CLIResult, HandlerRegistration } from './types';
import { MapBuildSchema, MapMergeSchema, MapStatsSchema } from './schemas/mapSchemas';
import { handleMapBuild, handleMapMerge, handleMapStats } from './handlers/mapHandlers';
import { AnalyzeSchema } from './schemas/analyzeSchemas';
import { handleAnalyze } from './handlers/analyzeHandlers';

type RegisteredRun = (rawInput: unknown) => Promise<CLIResult | CLIError>;

function register<T>(reg: HandlerRegistration<T>): RegisteredRun {
  return async (rawInput) => reg.handler(reg.schema.parse(rawInput));
}

/**
 * Command key -> validated handler. Subcommands use `group:name`.
 */
export const cliHandlers: Record<string, RegisteredRun> = {
  'map:build': register({ schema: MapBuildSchema, handler: handleMapBuild }),
  'map:merge': register({ schema: MapMergeSchema, handler: handleMapMerge }),
  'map:stats': register({ schema: MapStatsSchema, handler: handleMapStats }),
  'analyze': register({ schema: AnalyzeSchema, handler: handleAnalyze }),
};

/** null when no handler is registered under `commandKey`. */
export async function runRegistered(commandKey: string, rawInput: unknown): Promise<CLIResult | CLIError | null> {
  const run = cliHandlers[commandKey];
  return run ? run(rawInput) : null;
}
