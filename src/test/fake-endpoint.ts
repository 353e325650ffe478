/**
 * In-process stand-in for the inference endpoint.
 * A Hono app serves the requests; `app.request` is handed to the client as its fetch.
 */

import { Hono } from 'hono';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, type HarnessConfig } from '../config';
import type { DatasetItem } from '../dataset/loader';
import { InferenceClient, type FetchLike } from '../llm/provider';

export interface EndpointRequest {
  image_url: string;
  text: string;
}

export interface EndpointReply {
  status: number;
  /** JSON-encoded for a 200, sent as plain text otherwise */
  body?: unknown;
  delayMs?: number;
}

export interface FakeEndpoint {
  fetch: FetchLike;
  requests: EndpointRequest[];
  maxInFlight: number;
}

export const ENDPOINT_URL = 'http://inference.test/generate';
export const IMAGE_BASE_URL = 'http://images.test';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Item id from an image url such as http://images.test/7.jpg */
export function imageNumOf(request: EndpointRequest): number {
  const match = /\/(\d+)\.jpg$/.exec(request.image_url);
  return match ? Number(match[1]) : -1;
}

export function createFakeEndpoint(reply: (request: EndpointRequest) => EndpointReply): FakeEndpoint {
  const app = new Hono();
  let inFlight = 0;

  const endpoint: FakeEndpoint = {
    fetch: async (input, init) => app.request(input, init),
    requests: [],
    maxInFlight: 0,
  };

  app.post('/generate', async (c) => {
    const body = await c.req.json<EndpointRequest>();
    endpoint.requests.push(body);
    inFlight++;
    endpoint.maxInFlight = Math.max(endpoint.maxInFlight, inFlight);
    try {
      const result = reply(body);
      if (result.delayMs) await sleep(result.delayMs);
      if (result.status === 200) {
        return new Response(JSON.stringify(result.body), {
          status: 200,
          headers: { 'Content-Type': 'application/json' },
        });
      }
      return new Response(typeof result.body === 'string' ? result.body : 'error', { status: result.status });
    } finally {
      inFlight--;
    }
  });

  return endpoint;
}

export function createTestClient(fetchImpl: FetchLike, timeoutMs = 5000): InferenceClient {
  return new InferenceClient({ endpointUrl: ENDPOINT_URL, timeoutMs, fetch: fetchImpl });
}

export async function createWorkspace(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'vlm-bench-'));
}

export async function writeDataset(dir: string, items: Array<Partial<DatasetItem> & { id: number }>): Promise<string> {
  const file = join(dir, 'test.jsonl');
  const lines = items.map((item) =>
    JSON.stringify({
      question: `Question ${item.id}`,
      answer: '1',
      level: 1,
      ...item,
    })
  );
  await writeFile(file, lines.join('\n') + '\n', 'utf-8');
  return file;
}

export function testConfig(overrides: Partial<HarnessConfig> = {}): HarnessConfig {
  return {
    ...loadConfig({}),
    endpointUrl: ENDPOINT_URL,
    imageBaseUrl: IMAGE_BASE_URL,
    concurrency: 4,
    ...overrides,
  };
}
