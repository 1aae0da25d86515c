import { Command } from 'commander';
import { executeHandler } from '../types.js';

export const mapCommand = new Command('map')
  .description('Build, merge and inspect function-to-test coverage maps')
  .addCommand(
    new Command('build')
      .description('Run tests one at a time and record the functions each executes')
      .option('-p, --path <path>', 'Path inside the repository', '.')
      .option('-b, --build-dir <dir>', 'ctest build directory of the instrumented binary')
      .option('--start <n>', 'First test index of the shard (inclusive)')
      .option('--end <n>', 'Last test index of the shard (exclusive)')
      .option('--pattern <text>', 'Only tests whose name contains this text')
      .option('--max-tests <n>', 'Cap on the number of tests recorded')
      .option('--timeout-ms <ms>', 'Per-test timeout in milliseconds')
      .option('-o, --out <file>', 'Output file (.gz to compress)')
      .action(async (options) => {
        await executeHandler('map:build', options);
      })
  )
  .addCommand(
    new Command('merge')
      .description('Union coverage map shards into one artifact')
      .argument('[inputs...]', 'Shard files to merge')
      .option('-g, --glob <pattern>', 'Glob matching shard files')
      .option('-o, --out <file>', 'Output file', 'coverage_mapping.json')
      .option('--gzip', 'Write gzip-compressed output', false)
      .action(async (inputs: string[], options) => {
        await executeHandler('map:merge', { inputs, ...options });
      })
  )
  .addCommand(
    new Command('stats')
      .description('Summarize a coverage map')
      .argument('<file>', 'Coverage map file')
      .action(async (file: string) => {
        await executeHandler('map:stats', { file });
      })
  );

