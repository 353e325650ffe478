import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { indexById, loadDataset, parseDataset } from '../loader';
import { DatasetError } from '../../utils/errors';
import { createWorkspace } from '../../test/fake-endpoint';

describe('parseDataset', () => {
  it('parses one item per line and defaults missing options', () => {
    const text = [
      JSON.stringify({ id: 1, question: 'What is <image1> the value?', answer: '6', level: 2 }),
      JSON.stringify({ id: 2, question: 'Pick one', options: ['3', '5'], answer: 'B', level: 4 }),
    ].join('\n');

    expect(parseDataset(text)).toEqual([
      { id: 1, question: 'What is <image1> the value?', options: [], answer: '6', level: 2 },
      { id: 2, question: 'Pick one', options: ['3', '5'], answer: 'B', level: 4 },
    ]);
  });

  it('accepts ids stored as numeric strings', () => {
    const [item] = parseDataset(JSON.stringify({ id: '1', question: 'q', answer: '6', level: 2 }));
    expect(item).toEqual({ id: 1, question: 'q', options: [], answer: '6', level: 2 });
  });

  it('rejects non-numeric string ids', () => {
    const text = JSON.stringify({ id: 'one', question: 'q', answer: '6', level: 2 });
    expect(() => parseDataset(text)).toThrow('Invalid dataset item: id Expected a numeric id (line 1)');
  });

  it('skips blank lines', () => {
    const text = '\n' + JSON.stringify({ id: 3, question: 'q', answer: '1', level: 1 }) + '\n\n';
    expect(parseDataset(text)).toHaveLength(1);
  });

  it('reports the line of invalid JSON', () => {
    const text = JSON.stringify({ id: 1, question: 'q', answer: '1', level: 1 }) + '\n{not json';
    let caught: unknown;
    try {
      parseDataset(text);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DatasetError);
    expect(caught instanceof DatasetError && caught.line).toBe(2);
  });

  it('rejects items missing required fields', () => {
    const text = JSON.stringify({ id: 1, question: 'q', level: 1 });
    expect(() => parseDataset(text)).toThrow(/Invalid dataset item: answer Required \(line 1\)/);
  });

  it('returns frozen items', () => {
    const [item] = parseDataset(JSON.stringify({ id: 1, question: 'q', answer: '1', level: 1 }));
    expect(Object.isFrozen(item)).toBe(true);
  });
});

describe('loadDataset', () => {
  it('throws a DatasetError when the file is missing', async () => {
    const dir = await createWorkspace();
    await expect(loadDataset(join(dir, 'missing.jsonl'))).rejects.toThrow(DatasetError);
  });
});

describe('indexById', () => {
  it('keys items by id', () => {
    const items = parseDataset([
      JSON.stringify({ id: 4, question: 'a', answer: '1', level: 1 }),
      JSON.stringify({ id: 9, question: 'b', answer: '2', level: 1 }),
    ].join('\n'));
    const index = indexById(items);

    expect(index.get(9)?.question).toBe('b');
    expect(index.has(1)).toBe(false);
  });
});
