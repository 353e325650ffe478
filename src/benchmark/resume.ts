/**
 * Resume Controller - retry only the failed entries of an existing results file
 */

import { indexById, loadDataset, type DatasetItem } from '../dataset/loader';
import { silentLogger } from '../ui/logger';
import { assertPositiveCount, dispatchWithReporter, type BenchmarkContext } from './runner';
import { hasError, readResults, writeResults, type ResultEntry } from './results';

export interface ResumeOptions {
  resumeFile: string;
  /** Retry at most this many failed entries, in file order */
  n?: number;
  concurrency?: number;
}

export interface ResumeSummary {
  file: string;
  /** Failed entries selected for retry, after the cap */
  found: number;
  retried: number;
  /** Selected entries with no matching dataset id */
  skipped: number;
  /** Retried entries that now hold a response */
  updated: number;
  rewritten: boolean;
  entries: ResultEntry[];
}

export async function resumeBenchmark(options: ResumeOptions, ctx: BenchmarkContext): Promise<ResumeSummary> {
  const logger = ctx.logger ?? silentLogger;
  const concurrency = options.concurrency ?? ctx.config.concurrency;
  assertPositiveCount(options.n);

  const { raw, entries: existing } = await readResults(options.resumeFile);
  const noop = (found: number, skipped: number): ResumeSummary => ({
    file: options.resumeFile,
    found,
    retried: 0,
    skipped,
    updated: 0,
    rewritten: false,
    entries: [],
  });

  let failedImageNums = existing.filter(hasError).map((entry) => entry.image_num);
  if (failedImageNums.length === 0) {
    logger.info('No entries with errors found in the resume file.');
    return noop(0, 0);
  }
  if (options.n !== undefined) {
    failedImageNums = failedImageNums.slice(0, options.n);
  }
  logger.info(`Found ${failedImageNums.length} entries with errors to retry`);

  const datasetById = indexById(await loadDataset(ctx.config.datasetFile));
  const retryItems: DatasetItem[] = [];
  for (const imageNum of failedImageNums) {
    const item = datasetById.get(imageNum);
    if (item) retryItems.push(item);
  }

  const skipped = failedImageNums.length - retryItems.length;
  if (skipped > 0) {
    logger.warn(`Skipped ${skipped} image_nums not found in ${ctx.config.datasetFile}`);
  }
  if (retryItems.length === 0) {
    logger.info('No valid image_nums to retry.');
    return noop(failedImageNums.length, skipped);
  }

  const retried = await dispatchWithReporter(retryItems, ctx, concurrency, `Resume: retrying ${retryItems.length} failed entries`);

  // Replace whole entries by image_num; everything else is written back as read
  const replacements = new Map(retried.map((entry) => [entry.image_num, entry]));
  const merged = raw.map((original, index) => replacements.get(existing[index].image_num) ?? original);
  await writeResults(options.resumeFile, merged);

  const updated = retried.filter((entry) => entry.error === null).length;
  logger.success(
    `Updated ${retried.length} entries in ${options.resumeFile} (${updated} succeeded, ${retried.length - updated} still failing)`
  );

  return {
    file: options.resumeFile,
    found: failedImageNums.length,
    retried: retried.length,
    skipped,
    updated,
    rewritten: true,
    entries: retried,
  };
}
