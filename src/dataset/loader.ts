/**
 * Dataset Loader - newline-delimited JSON question records
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { DatasetError, describeError } from '../utils/errors';

// Ids arrive either as numbers or as numeric strings such as "12"
export const ItemIdSchema = z
  .union([z.number(), z.string().regex(/^\d+$/, 'Expected a numeric id')])
  .pipe(z.coerce.number().int().min(1));

export const DatasetItemSchema = z.object({
  id: ItemIdSchema,
  question: z.string(),
  options: z.array(z.string()).default([]),
  answer: z.string(),
  level: z.number().int(),
});

export type DatasetItem = Readonly<z.infer<typeof DatasetItemSchema>>;

export function parseDataset(text: string): DatasetItem[] {
  const items: DatasetItem[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (!line.trim()) return;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      throw new DatasetError(`Invalid JSON: ${describeError(error)}`, index + 1, { cause: error });
    }

    const parsed = DatasetItemSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`).join(', ');
      throw new DatasetError(`Invalid dataset item: ${issues}`, index + 1);
    }
    items.push(Object.freeze(parsed.data));
  });

  return items;
}

export async function loadDataset(file: string): Promise<DatasetItem[]> {
  let text: string;
  try {
    text = await readFile(file, 'utf-8');
  } catch (error) {
    throw new DatasetError(`Cannot read dataset ${file}: ${describeError(error)}`, undefined, { cause: error });
  }
  return parseDataset(text);
}

/**
 * Index items by their `id`. Later duplicates win, matching a plain dict build.
 */
export function indexById(items: readonly DatasetItem[]): Map<number, DatasetItem> {
  return new Map(items.map((item) => [item.id, item]));
}
