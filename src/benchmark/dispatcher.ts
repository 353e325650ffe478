/**
 * Dispatcher - bounded-concurrency fan-out over the inference endpoint
 *
 * Every task yields exactly one ResultEntry: the raw response on success, or the
 * failure message. A failing task never cancels or blocks its siblings.
 */

import type { DatasetItem } from '../dataset/loader';
import { buildPrompt } from '../llm/prompts';
import type { InferenceClient } from '../llm/provider';
import { Semaphore } from '../utils/semaphore';
import { describeError } from '../utils/errors';
import type { ResultEntry } from './results';

export interface RequestTask {
  itemId: number;
  imageUrl: string;
  promptText: string;
}

export interface DispatchOptions {
  client: InferenceClient;
  concurrency: number;
  imageBaseUrl: string;
  /** Called once per task as soon as it settles, in completion order */
  onSettled?: (entry: ResultEntry, index: number) => void;
}

export function imageUrlFor(imageBaseUrl: string, itemId: number): string {
  return `${imageBaseUrl}/${itemId}.jpg`;
}

export function buildTask(item: DatasetItem, imageBaseUrl: string): RequestTask {
  return {
    itemId: item.id,
    imageUrl: imageUrlFor(imageBaseUrl, item.id),
    promptText: buildPrompt(item),
  };
}

export async function dispatch(items: readonly DatasetItem[], options: DispatchOptions): Promise<ResultEntry[]> {
  const semaphore = new Semaphore(options.concurrency);

  const tasks = items.map(async (item, index): Promise<ResultEntry> => {
    const task = buildTask(item, options.imageBaseUrl);
    let entry: ResultEntry;

    try {
      const raw = await semaphore.withPermit(() =>
        options.client.generate({ imageUrl: task.imageUrl, text: task.promptText })
      );
      entry = {
        image_num: item.id,
        question: item.question,
        expected: item.answer,
        raw_response: raw,
        error: null,
      };
    } catch (error) {
      entry = {
        image_num: item.id,
        question: item.question,
        expected: item.answer,
        raw_response: null,
        error: describeError(error),
      };
    }

    options.onSettled?.(entry, index);
    return entry;
  });

  // Each task resolves with its own outcome, so this join never short-circuits
  return Promise.all(tasks);
}

export function countOutcomes(entries: readonly ResultEntry[]): { succeeded: number; failed: number } {
  const failed = entries.filter((e) => e.error !== null).length;
  return { succeeded: entries.length - failed, failed };
}
