/**
 * Scorer - extracts tagged answers from raw responses and aggregates accuracy
 */

import { writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { MatchMode } from '../config';
import { indexById, loadDataset, type DatasetItem } from '../dataset/loader';
import { readResults, serializeResults, type StoredResultEntry } from '../benchmark/results';

export const DEFAULT_DATASET_FILE = 'test.jsonl';

export type EvaluatedEntry = StoredResultEntry & {
  /** `null` when the response has no answer tag pair */
  extracted: string | null;
  correct: boolean;
  level: number | null;
  is_multiple_choice: boolean;
};

export interface AccuracyStats {
  correct: number;
  total: number;
}

export interface EvaluationReport {
  matchMode: MatchMode;
  overall: AccuracyStats;
  byLevel: Array<{ level: number } & AccuracyStats>;
  multipleChoice: AccuracyStats;
  nonMultipleChoice: AccuracyStats;
}

const ANSWER_PATTERN = /<answer>([\s\S]*?)<\/answer>/;

export function extractAnswer(rawResponse: unknown): string | null {
  if (typeof rawResponse !== 'string') {
    return null;
  }
  const match = ANSWER_PATTERN.exec(rawResponse);
  return match ? match[1].trim() : null;
}

export function isMatch(expected: string, extracted: string | null, mode: MatchMode): boolean {
  if (extracted === null || extracted === '') {
    return false;
  }
  const target = expected.trim();
  switch (mode) {
    case 'exact':
      return target === extracted;
    case 'substring':
      return target.includes(extracted) || extracted.includes(target);
  }
}

export function accuracy(stats: AccuracyStats): number {
  return stats.total > 0 ? (stats.correct / stats.total) * 100 : 0;
}

function tally(stats: AccuracyStats, correct: boolean): void {
  stats.total++;
  if (correct) stats.correct++;
}

export function scoreResults(
  entries: readonly StoredResultEntry[],
  dataset: ReadonlyMap<number, DatasetItem>,
  mode: MatchMode
): { entries: EvaluatedEntry[]; report: EvaluationReport } {
  const overall: AccuracyStats = { correct: 0, total: 0 };
  const levels = new Map<number, AccuracyStats>();
  const multipleChoice: AccuracyStats = { correct: 0, total: 0 };
  const nonMultipleChoice: AccuracyStats = { correct: 0, total: 0 };

  const evaluated = entries.map((entry): EvaluatedEntry => {
    const item = dataset.get(entry.image_num);
    const extracted = extractAnswer(entry.raw_response);
    const correct = isMatch(entry.expected, extracted, mode);
    const level = item?.level ?? null;
    const isMultipleChoice = (item?.options.length ?? 0) > 0;

    tally(overall, correct);
    if (level !== null) {
      const stats = levels.get(level) ?? { correct: 0, total: 0 };
      tally(stats, correct);
      levels.set(level, stats);
    }
    tally(isMultipleChoice ? multipleChoice : nonMultipleChoice, correct);

    return { ...entry, extracted, correct, level, is_multiple_choice: isMultipleChoice };
  });

  const byLevel = [...levels.entries()]
    .sort(([a], [b]) => a - b)
    .map(([level, stats]) => ({ level, ...stats }));

  return {
    entries: evaluated,
    report: { matchMode: mode, overall, byLevel, multipleChoice, nonMultipleChoice },
  };
}

export function evaluatedFileName(inputFile: string): string {
  return inputFile.endsWith('.json')
    ? `${inputFile.slice(0, -'.json'.length)}_evaluated.json`
    : `${inputFile}_evaluated.json`;
}

export interface EvaluateFileOptions {
  matchMode: MatchMode;
  /** Defaults to test.jsonl beside the input file */
  datasetFile?: string;
}

export async function evaluateFile(
  inputFile: string,
  options: EvaluateFileOptions
): Promise<{ outputFile: string; entries: EvaluatedEntry[]; report: EvaluationReport }> {
  const { entries } = await readResults(inputFile);
  const datasetFile = options.datasetFile ?? join(dirname(inputFile), DEFAULT_DATASET_FILE);
  const dataset = indexById(await loadDataset(datasetFile));

  const scored = scoreResults(entries, dataset, options.matchMode);
  const outputFile = evaluatedFileName(inputFile);
  await writeFile(outputFile, serializeResults(scored.entries), 'utf-8');

  return { outputFile, ...scored };
}
