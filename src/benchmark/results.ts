/**
 * Batch output files: entry schema, naming and persistence
 */

import { readFile, writeFile } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import { z } from 'zod';
import { ItemIdSchema } from '../dataset/loader';
import { ErrorCodes, HarnessError, ResultsFileError, describeError } from '../utils/errors';

export interface ResultEntry {
  image_num: number;
  question: string;
  expected: string;
  raw_response: string | null;
  error: string | null;
}

// Files from older runs omit `error` on successful entries.
export const StoredResultEntrySchema = z
  .object({
    image_num: ItemIdSchema,
    question: z.string(),
    expected: z.string(),
    raw_response: z.string().nullable().optional(),
    error: z.string().nullable().optional(),
  })
  .passthrough();

export type StoredResultEntry = z.infer<typeof StoredResultEntrySchema>;

export interface ResultsFile {
  /** Entries exactly as they were read, for writing back untouched */
  raw: unknown[];
  entries: StoredResultEntry[];
}

export function hasError(entry: Pick<StoredResultEntry, 'error'>): boolean {
  return entry.error !== undefined && entry.error !== null;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/** Local-time `YYYYMMDD_HHMMSS` */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function resultsFileName(date: Date): string {
  return `results_${formatTimestamp(date)}.json`;
}

export function resultsFilePath(outputDir: string, date: Date): string {
  return join(outputDir, resultsFileName(date));
}

export function serializeResults(entries: readonly unknown[]): string {
  return JSON.stringify(entries, null, 2);
}

export interface WriteResultsOptions {
  /** Fail instead of replacing a file that already exists */
  exclusive?: boolean;
}

export async function writeResults(
  file: string,
  entries: readonly unknown[],
  options: WriteResultsOptions = {}
): Promise<void> {
  try {
    await writeFile(file, serializeResults(entries), { encoding: 'utf-8', flag: options.exclusive ? 'wx' : 'w' });
  } catch (error) {
    if (options.exclusive && error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      throw new ResultsFileError(`Results file ${file} already exists`, { cause: error });
    }
    throw error;
  }
}

/**
 * Resolve a client-supplied results file name against `outputDir`, refusing anything outside it.
 */
export function resolveResultsPath(outputDir: string, file: string): string {
  const root = resolve(outputDir);
  const target = resolve(root, file);
  const rel = relative(root, target);
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new HarnessError(ErrorCodes.INVALID_REQUEST, 'resumeFile must name a file inside the output directory');
  }
  return target;
}

export function parseResults(text: string, file: string): ResultsFile {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    // the parser's message quotes file content
    throw new ResultsFileError(`${file} is not valid JSON`, { cause: error });
  }

  const raw = z.array(z.unknown()).safeParse(json);
  if (!raw.success) {
    throw new ResultsFileError(`${file} must contain a JSON array of result entries`);
  }

  const entries = raw.data.map((value, index) => {
    const entry = StoredResultEntrySchema.safeParse(value);
    if (!entry.success) {
      const issues = entry.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join(', ');
      throw new ResultsFileError(`${file}: entry ${index} is invalid: ${issues}`);
    }
    return entry.data;
  });

  return { raw: raw.data, entries };
}

export async function readResults(file: string): Promise<ResultsFile> {
  let text: string;
  try {
    text = await readFile(file, 'utf-8');
  } catch (error) {
    throw new ResultsFileError(`Cannot read results file ${file}: ${describeError(error)}`, { cause: error });
  }
  return parseResults(text, file);
}
