/**
 * Score a results file against the dataset answers
 *
 * Usage:
 *   tsx src/evaluate.ts results_20250101_120000.json
 *   tsx src/evaluate.ts results.json --match=substring --dataset=data/test.jsonl
 */

import 'dotenv/config';
import chalk from 'chalk';
import { loadConfig, MatchModeSchema } from './config';
import { evaluateFile } from './evaluation/scorer';
import { printEvaluationReport } from './ui/report';
import { readFlag } from './cli';
import { ConfigError, describeError } from './utils/errors';

async function main() {
  const args = process.argv.slice(2);
  const inputFile = args.find((a) => !a.startsWith('--'));
  if (!inputFile) {
    throw new ConfigError('Usage: tsx src/evaluate.ts <results.json> [--match=exact|substring] [--dataset=FILE]');
  }

  const config = loadConfig();
  const matchArg = readFlag(args, 'match');
  const match = MatchModeSchema.safeParse(matchArg ?? config.matchMode);
  if (!match.success) {
    throw new ConfigError(`--match must be "exact" or "substring" (got "${matchArg}")`);
  }
  const datasetFile = readFlag(args, 'dataset');

  const { outputFile, report } = await evaluateFile(inputFile, { matchMode: match.data, datasetFile });
  printEvaluationReport(report, outputFile);
}

main().catch((error: unknown) => {
  console.error(chalk.red(`Fatal error: ${describeError(error)}`));
  process.exit(1);
});
