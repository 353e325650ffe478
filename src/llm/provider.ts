/**
 * Inference Provider
 * HTTP client for the hosted vision-language model endpoint
 */

import { z } from 'zod';
import type { HarnessConfig } from '../config';
import { InferenceError, RequestTimeoutError } from '../utils/errors';

export interface GenerateRequest {
  imageUrl: string;
  text: string;
}

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface InferenceClientConfig {
  endpointUrl: string;
  timeoutMs: number;
  maxNewTokens?: number;
  fetch?: FetchLike;
}

// The endpoint returns the generated text as a bare JSON string; some deployments wrap it.
const GenerateResponseSchema = z.union([
  z.string(),
  z.object({ response: z.string() }).transform((body) => body.response),
]);

function isTimeout(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError';
}

export class InferenceClient {
  private config: InferenceClientConfig;
  private fetchImpl: FetchLike;

  constructor(config: InferenceClientConfig) {
    this.config = config;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  async generate(request: GenerateRequest): Promise<string> {
    const body: Record<string, unknown> = {
      image_url: request.imageUrl,
      text: request.text,
    };
    if (this.config.maxNewTokens !== undefined) {
      body.max_new_tokens = this.config.maxNewTokens;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.config.endpointUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new RequestTimeoutError(this.config.timeoutMs);
      }
      throw error;
    }

    if (response.status !== 200) {
      const detail = (await response.text().catch(() => '')).trim().slice(0, 200);
      throw new InferenceError(
        `Inference endpoint returned ${response.status}${detail ? `: ${detail}` : ''}`,
        response.status
      );
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      if (isTimeout(error)) {
        throw new RequestTimeoutError(this.config.timeoutMs);
      }
      throw new InferenceError('Inference endpoint returned a non-JSON body', response.status);
    }

    const parsed = GenerateResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new InferenceError('Inference endpoint returned an unexpected body shape', response.status);
    }
    return parsed.data;
  }
}

export function createInferenceClient(config: HarnessConfig, fetchImpl?: FetchLike): InferenceClient {
  return new InferenceClient({
    endpointUrl: config.endpointUrl,
    timeoutMs: config.requestTimeoutMs,
    maxNewTokens: config.maxNewTokens,
    fetch: fetchImpl,
  });
}
