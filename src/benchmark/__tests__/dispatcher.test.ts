import { describe, it, expect, vi } from 'vitest';
import { buildTask, countOutcomes, dispatch } from '../dispatcher';
import type { DatasetItem } from '../../dataset/loader';
import type { FetchLike } from '../../llm/provider';
import {
  IMAGE_BASE_URL,
  createFakeEndpoint,
  createTestClient,
  imageNumOf,
} from '../../test/fake-endpoint';

function item(id: number, overrides: Partial<DatasetItem> = {}): DatasetItem {
  return { id, question: `Question ${id}`, options: [], answer: String(id), level: 1, ...overrides };
}

const answerWith = (n: number) => `<thinking>...</thinking><answer>${n}</answer>`;

describe('buildTask', () => {
  it('derives the image url and prompt from the item', () => {
    const task = buildTask(item(12, { question: 'How many <image1> sides?' }), IMAGE_BASE_URL);

    expect(task.itemId).toBe(12);
    expect(task.imageUrl).toBe('http://images.test/12.jpg');
    expect(task.promptText.endsWith('How many  sides?')).toBe(true);
  });
});

describe('dispatch', () => {
  it('keeps results in input order regardless of completion order', async () => {
    const delays: Record<number, number> = { 1: 40, 2: 1, 3: 15 };
    const endpoint = createFakeEndpoint((req) => ({
      status: 200,
      body: answerWith(imageNumOf(req)),
      delayMs: delays[imageNumOf(req)],
    }));

    const settledOrder: number[] = [];
    const entries = await dispatch([item(1), item(2), item(3)], {
      client: createTestClient(endpoint.fetch),
      concurrency: 3,
      imageBaseUrl: IMAGE_BASE_URL,
      onSettled: (entry) => settledOrder.push(entry.image_num),
    });

    expect(entries.map((e) => e.image_num)).toEqual([1, 2, 3]);
    expect(entries[0]).toEqual({
      image_num: 1,
      question: 'Question 1',
      expected: '1',
      raw_response: answerWith(1),
      error: null,
    });
    expect(settledOrder).toEqual([2, 3, 1]);
  });

  it('sends the image url and prompt as the request body', async () => {
    const endpoint = createFakeEndpoint(() => ({ status: 200, body: 'ok' }));

    await dispatch([item(5)], {
      client: createTestClient(endpoint.fetch),
      concurrency: 1,
      imageBaseUrl: IMAGE_BASE_URL,
    });

    expect(endpoint.requests).toEqual([
      { image_url: 'http://images.test/5.jpg', text: buildTask(item(5), IMAGE_BASE_URL).promptText },
    ]);
  });

  it('captures a failing status without affecting siblings', async () => {
    const endpoint = createFakeEndpoint((req) =>
      imageNumOf(req) === 7
        ? { status: 500, body: 'internal' }
        : { status: 200, body: answerWith(imageNumOf(req)) }
    );

    const entries = await dispatch([5, 6, 7, 8].map((id) => item(id)), {
      client: createTestClient(endpoint.fetch),
      concurrency: 2,
      imageBaseUrl: IMAGE_BASE_URL,
    });

    expect(entries).toHaveLength(4);
    expect(entries[2]).toEqual({
      image_num: 7,
      question: 'Question 7',
      expected: '7',
      raw_response: null,
      error: 'Inference endpoint returned 500: internal',
    });
    expect(entries.filter((e) => e.error === null).map((e) => e.image_num)).toEqual([5, 6, 8]);
    for (const entry of entries) {
      expect((entry.raw_response === null) !== (entry.error === null)).toBe(true);
    }
    expect(countOutcomes(entries)).toEqual({ succeeded: 3, failed: 1 });
  });

  it('never exceeds the concurrency limit', async () => {
    const endpoint = createFakeEndpoint(() => ({ status: 200, body: 'ok', delayMs: 5 }));
    const items = Array.from({ length: 12 }, (_, i) => item(i + 1));

    const entries = await dispatch(items, {
      client: createTestClient(endpoint.fetch),
      concurrency: 3,
      imageBaseUrl: IMAGE_BASE_URL,
    });

    expect(entries).toHaveLength(12);
    expect(endpoint.requests).toHaveLength(12);
    expect(endpoint.maxInFlight).toBeGreaterThan(1);
    expect(endpoint.maxInFlight).toBeLessThanOrEqual(3);
  });

  it('turns a timeout into that task\'s error', async () => {
    const hanging: FetchLike = (_input, init) => new Promise((_resolve, reject) => {
      const signal = init?.signal;
      if (signal) {
        signal.addEventListener('abort', () => reject(signal.reason));
      }
    });

    const entries = await dispatch([item(1)], {
      client: createTestClient(hanging, 20),
      concurrency: 1,
      imageBaseUrl: IMAGE_BASE_URL,
    });

    expect(entries[0].raw_response).toBeNull();
    expect(entries[0].error).toBe('Request timed out after 20ms');
  });

  it('reports the cause of transport failures', async () => {
    const refused: FetchLike = async () => {
      throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:8000') });
    };
    const onSettled = vi.fn();

    const entries = await dispatch([item(1), item(2)], {
      client: createTestClient(refused),
      concurrency: 2,
      imageBaseUrl: IMAGE_BASE_URL,
      onSettled,
    });

    expect(entries.map((e) => e.error)).toEqual([
      'fetch failed: connect ECONNREFUSED 127.0.0.1:8000',
      'fetch failed: connect ECONNREFUSED 127.0.0.1:8000',
    ]);
    expect(onSettled).toHaveBeenCalledTimes(2);
  });

  it('accepts a wrapped response field and rejects other body shapes', async () => {
    const endpoint = createFakeEndpoint((req) =>
      imageNumOf(req) === 1
        ? { status: 200, body: { response: answerWith(3) } }
        : { status: 200, body: { text: 'wrong shape' } }
    );

    const entries = await dispatch([item(1), item(2)], {
      client: createTestClient(endpoint.fetch),
      concurrency: 2,
      imageBaseUrl: IMAGE_BASE_URL,
    });

    expect(entries[0].raw_response).toBe(answerWith(3));
    expect(entries[1].error).toBe('Inference endpoint returned an unexpected body shape');
  });

  it('returns an empty batch for no items', async () => {
    const endpoint = createFakeEndpoint(() => ({ status: 200, body: 'ok' }));
    const entries = await dispatch([], {
      client: createTestClient(endpoint.fetch),
      concurrency: 4,
      imageBaseUrl: IMAGE_BASE_URL,
    });
    expect(entries).toEqual([]);
    expect(endpoint.requests).toHaveLength(0);
  });
});
