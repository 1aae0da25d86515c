import { Command } from 'commander';
import { executeHandler } from '../types.js';

export const analyzeCommand = new Command('analyze')
  .description('Report which changed functions of each commit are covered by tests')
  .argument('[shas...]', 'Commits to analyze')
  .option('-p, --path <path>', 'Path inside the repository', '.')
  .option('-n, --recent <n>', 'Also analyze the last n commits of HEAD')
  .option('-m, --coverage-map <file>', 'Coverage map (.json or .json.gz)', 'coverage_mapping.json')
  .option('--compile-db <file>', 'compile_commands.json, relative to the repository root')
  .option('--allow-missing-compile-db', 'Guess compile flags when the database is absent', false)
  .option('--root-commits <policy>', 'Root commits: skip | all-lines')
  .option('-f, --format <format>', 'Output format: json | text', 'json')
  .option('--min-coverage <percent>', 'Coverage gate threshold (default from config)')
  .option('--no-gate', 'Report only; never fail on coverage')
  .option('-j, --concurrency <n>', 'Commits analyzed at once')
  .action(async (shas: string[], options) => {
    await executeHandler('analyze', { shas, ...options });
  });
