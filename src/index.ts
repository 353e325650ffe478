/**
 * VLM Benchmark Harness - Main Entry Point
 * Dispatches dataset questions to the inference endpoint, or resumes a failed run
 */

import 'dotenv/config';
import chalk from 'chalk';
import { loadConfig } from './config';
import { runBenchmark, runSingle } from './benchmark/runner';
import { resumeBenchmark } from './benchmark/resume';
import { createConsoleLogger } from './ui/logger';
import { ProgressUI } from './ui/progress';
import { describeError } from './utils/errors';
import { parseArgs } from './cli';

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const logger = createConsoleLogger();

  if (args.resume) {
    await resumeBenchmark(
      { resumeFile: args.resume, n: args.n, concurrency: args.concurrency },
      { config, logger, reporter: new ProgressUI() }
    );
  } else if (args.n === 1) {
    await runSingle(args.start, { config, logger });
  } else {
    await runBenchmark(
      { start: args.start, n: args.n, concurrency: args.concurrency },
      { config, logger, reporter: new ProgressUI() }
    );
  }
}

// Help message
if (process.argv.includes('--help') || process.argv.includes('-h')) {
  console.log(`
VLM Benchmark Harness

Usage:
  tsx src/index.ts [options]

Options:
  --start=N          1-indexed dataset item to start from (default: 1)
  --n=N              Number of items to run (default: all); --n=1 prints a single debug run
  --concurrency=N    Maximum requests in flight (default: CONCURRENCY or 16)
  --resume=FILE      Retry entries with errors in an existing results file
  --help, -h         Show this help message

Examples:
  tsx src/index.ts                                 # Run the whole dataset
  tsx src/index.ts --start=10 --n=1                # Debug item 10
  tsx src/index.ts --start=1 --n=100 --concurrency=8
  tsx src/index.ts --resume=results_20250101_120000.json --n=20
`);
  process.exit(0);
}

main().catch((error: unknown) => {
  console.error(chalk.red(`Fatal error: ${describeError(error)}`));
  process.exit(1);
});
