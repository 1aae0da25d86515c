import { z } from 'zod';
import { createLogger } from '../core/log';

/**
 * Successful command result. Printed as JSON unless the handler supplies
 * `textOutput`; `exitCode` lets a successful run still fail the pipeline
 * (coverage gate).
 */
export interface CLIResult {
  ok: true;
  command?: string;
  repoRoot?: string;
  timestamp?: string;
  duration_ms?: number;
  textOutput?: string;
  exitCode?: number;
  [key: string]: unknown;
}

/**
 * Failed command result:
 * - reason: machine-readable error code
 * - message: human-readable error description
 * - hint: optional suggestion for resolution
 */
export interface CLIError {
  ok: false;
  reason: string;
  message?: string;
  command?: string;
  timestamp?: string;
  hint?: string;
  [key: string]: unknown;
}

export type CLIHandler<TInput> = (input: TInput) => Promise<CLIResult | CLIError>;

/** Schemas may fill defaults, so only their output type is pinned. */
export interface HandlerRegistration<TInput> {
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  handler: CLIHandler<TInput>;
}

export const ExitCodes = {
  OK: 0,
  USAGE_OR_INTERNAL: 1,
  FAILED: 2,
  GATE_FAILED: 3,
} as const;

/**
 * Validates `rawInput` against the command's schema, runs its handler and
 * prints the result. Exits 0 on success (or the result's `exitCode`), 1 on
 * invalid arguments or unexpected errors, 2 when the handler reports a
 * failure.
 *
 * @example
 * ```typescript
 * .action(async (file, options) => {
 *   await executeHandler('map:stats', { file, ...options });
 * })
 * ```
 */
export async function executeHandler(
  commandKey: string,
  rawInput: unknown
): Promise<void> {
  const { runRegistered } = await import('./registry.js');
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();
  const log = createLogger({ component: 'cli', cmd: commandKey });

  try {
    const result = await runRegistered(commandKey, rawInput);
    const duration_ms = Date.now() - startedAt;

    if (result === null) {
      console.error(JSON.stringify(
        {
          ok: false,
          reason: ErrorReasons.UNKNOWN_COMMAND,
          command: commandKey,
          timestamp,
          hint: 'Run "covmap --help" to see available commands',
        },
        null,
        2
      ));
      process.exit(ExitCodes.USAGE_OR_INTERNAL);
      return;
    }

    if (result.ok) {
      const { textOutput, exitCode, ...rest } = result;
      if (typeof textOutput === 'string') {
        process.stdout.write(textOutput.endsWith('\n') ? textOutput : textOutput + '\n');
      } else {
        console.log(JSON.stringify({ ...rest, command: commandKey, timestamp, duration_ms }, null, 2));
      }
      process.exit(exitCode ?? ExitCodes.OK);
    } else {
      process.stderr.write(JSON.stringify({ ...result, command: commandKey, timestamp, duration_ms }, null, 2) + '\n');
      process.exit(ExitCodes.FAILED);
    }
  } catch (e) {
    const duration_ms = Date.now() - startedAt;

    if (e instanceof z.ZodError) {
      const errors = e.issues.map((err: z.ZodIssue) => ({
        path: err.path.join('.'),
        message: err.message,
        code: err.code,
      }));

      console.error(JSON.stringify(
        {
          ok: false,
          reason: ErrorReasons.VALIDATION_ERROR,
          message: 'Invalid command arguments',
          command: commandKey,
          timestamp,
          duration_ms,
          errors,
          hint: ErrorHints.VALIDATION_ERROR,
        },
        null,
        2
      ));
      process.exit(ExitCodes.USAGE_OR_INTERNAL);
      return;
    }

    const errorDetails = e instanceof Error
      ? { name: e.name, message: e.message, stack: e.stack }
      : { message: String(e) };

    log.error(commandKey, { ok: false, err: errorDetails });

    console.error(JSON.stringify(
      {
        ok: false,
        reason: ErrorReasons.INTERNAL_ERROR,
        message: e instanceof Error ? e.message : String(e),
        command: commandKey,
        timestamp,
        duration_ms,
        hint: 'An unexpected error occurred. Check logs for details.',
      },
      null,
      2
    ));
    process.exit(ExitCodes.USAGE_OR_INTERNAL);
  }
}

export function success(data: Record<string, unknown>): CLIResult {
  return {
    ok: true,
    ...data,
  };
}

export function error(reason: string, details?: Record<string, unknown>): CLIError {
  return {
    ok: false,
    reason,
    ...details,
  };
}

export const ErrorReasons = {
  UNKNOWN_COMMAND: 'unknown_command',
  VALIDATION_ERROR: 'validation_error',
  INTERNAL_ERROR: 'internal_error',
  NO_TESTS: 'no_tests_selected',
  NO_INPUTS: 'no_inputs',
  NO_COMMITS: 'no_commits',
  MAP_BUILD_FAILED: 'map_build_failed',
  MAP_MERGE_FAILED: 'map_merge_failed',
  ANALYSIS_FAILED: 'analysis_failed',
} as const;

export const ErrorHints = {
  VALIDATION_ERROR: 'Check command syntax with --help',
  counter_reset_failed: 'Check that fastcov and gcov are installed and the build directory is writable',
  coverage_map_invalid: 'Rebuild the map with "covmap map build" or merge shards with "covmap map merge"',
  compile_db_unavailable: 'Configure the build with -DCMAKE_EXPORT_COMPILE_COMMANDS=ON, or pass --allow-missing-compile-db',
  commit_not_found: 'Pass a commit SHA or ref that exists in this repository',
} as const;

export function hintFor(reason: string): string | undefined {
  for (const [k, v] of Object.entries(ErrorHints)) {
    if (k === reason) return v;
  }
  return undefined;
}
