/**
 * Batch runner - selects a dataset range, dispatches it and writes the results file
 */

import { mkdir } from 'node:fs/promises';
import type { HarnessConfig } from '../config';
import { loadDataset, type DatasetItem } from '../dataset/loader';
import { buildPrompt } from '../llm/prompts';
import { createInferenceClient, type InferenceClient } from '../llm/provider';
import { ConfigError } from '../utils/errors';
import { silentLogger, type Logger } from '../ui/logger';
import type { DispatchReporter } from '../ui/progress';
import { countOutcomes, dispatch } from './dispatcher';
import { resultsFilePath, writeResults, type ResultEntry } from './results';

export interface BenchmarkContext {
  config: HarnessConfig;
  client?: InferenceClient;
  logger?: Logger;
  reporter?: DispatchReporter;
  now?: () => Date;
}

export interface RunOptions {
  /** 1-indexed dataset position to start from */
  start: number;
  /** Number of items; all remaining when omitted */
  n?: number;
  concurrency?: number;
}

export interface RunSummary {
  file: string;
  total: number;
  succeeded: number;
  failed: number;
  entries: ResultEntry[];
}

export function assertPositiveCount(n: number | undefined): void {
  if (n !== undefined && (!Number.isInteger(n) || n <= 0)) {
    throw new ConfigError('--n must be a positive integer or omitted for all');
  }
}

function assertPosition(position: number, total: number): void {
  if (!Number.isInteger(position) || position < 1 || position > total) {
    throw new ConfigError(`--start must be between 1 and ${total} (got ${position})`);
  }
}

/**
 * Inclusive 1-indexed `[start, end]` range of dataset positions to run.
 * A start past the last item gives an empty range (`end < start`).
 */
export function resolveRange(start: number, n: number | undefined, total: number): { start: number; end: number } {
  if (!Number.isInteger(start) || start < 1) {
    throw new ConfigError(`--start must be a positive integer (got ${start})`);
  }
  assertPositiveCount(n);
  const end = n === undefined ? total : Math.min(start + n - 1, total);
  return { start, end };
}

/**
 * Run the given items through the dispatcher, reporting progress when a reporter is attached.
 */
export async function dispatchWithReporter(
  items: readonly DatasetItem[],
  ctx: BenchmarkContext,
  concurrency: number,
  title: string
): Promise<ResultEntry[]> {
  const client = ctx.client ?? createInferenceClient(ctx.config);
  const reporter = ctx.reporter;

  reporter?.start(items.length, title);
  try {
    return await dispatch(items, {
      client,
      concurrency,
      imageBaseUrl: ctx.config.imageBaseUrl,
      onSettled: reporter ? (entry) => reporter.advance(entry) : undefined,
    });
  } finally {
    reporter?.finish();
  }
}

export async function runBenchmark(options: RunOptions, ctx: BenchmarkContext): Promise<RunSummary> {
  const logger = ctx.logger ?? silentLogger;
  const concurrency = options.concurrency ?? ctx.config.concurrency;

  const data = await loadDataset(ctx.config.datasetFile);
  const { start, end } = resolveRange(options.start, options.n, data.length);
  const items = data.slice(start - 1, end);

  if (items.length === 0) {
    logger.warn(`No dataset items from position ${start} (dataset has ${data.length}); writing an empty results file`);
  } else {
    logger.info(`Dispatching ${items.length} requests (items ${start}-${end}, concurrency ${concurrency})`);
  }

  const entries = await dispatchWithReporter(items, ctx, concurrency, `Benchmark run: items ${start}-${end}`);

  await mkdir(ctx.config.outputDir, { recursive: true });
  const file = resultsFilePath(ctx.config.outputDir, (ctx.now ?? (() => new Date()))());
  await writeResults(file, entries, { exclusive: true });

  const { succeeded, failed } = countOutcomes(entries);
  logger.success(`Saved ${entries.length} results to ${file} (${succeeded} succeeded, ${failed} failed)`);

  return { file, total: entries.length, succeeded, failed, entries };
}

export interface SingleRunResult {
  imageNum: number;
  prompt: string;
  rawResponse: string | null;
  error: string | null;
  expected: string;
}

/**
 * Debug mode: one item, printed rather than written to a results file.
 */
export async function runSingle(imageNum: number, ctx: BenchmarkContext): Promise<SingleRunResult> {
  const logger = ctx.logger ?? silentLogger;
  const data = await loadDataset(ctx.config.datasetFile);
  assertPosition(imageNum, data.length);

  // positional lookup, same as a batch run starting at imageNum
  const item = data[imageNum - 1];
  const prompt = buildPrompt(item);
  logger.info(prompt);

  const [entry] = await dispatch([item], {
    client: ctx.client ?? createInferenceClient(ctx.config),
    concurrency: 1,
    imageBaseUrl: ctx.config.imageBaseUrl,
  });

  if (entry.error !== null) {
    logger.error(`Error: ${entry.error}`);
  } else {
    logger.info(`Response: ${entry.raw_response}`);
  }
  logger.info(`Correct answer: ${item.answer}`);

  return {
    imageNum,
    prompt,
    rawResponse: entry.raw_response,
    error: entry.error,
    expected: item.answer,
  };
}
