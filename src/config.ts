/**
 * Harness configuration, read from environment variables
 */

import { z } from 'zod';
import { ConfigError } from './utils/errors';

export const MatchModeSchema = z.enum(['exact', 'substring']);
export type MatchMode = z.infer<typeof MatchModeSchema>;

const ConfigSchema = z.object({
  endpointUrl: z.string().url(),
  imageBaseUrl: z.string().url(),
  datasetFile: z.string().min(1),
  outputDir: z.string().min(1),
  concurrency: z.coerce.number().int().min(1),
  requestTimeoutMs: z.coerce.number().int().min(1),
  maxNewTokens: z.coerce.number().int().min(1).optional(),
  matchMode: MatchModeSchema,
  apiKeys: z.array(z.string()),
  port: z.coerce.number().int().min(1).max(65535),
});

export type HarnessConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG = {
  endpointUrl: 'http://127.0.0.1:8000/generate',
  imageBaseUrl: 'http://127.0.0.1:8000/images',
  datasetFile: 'test.jsonl',
  outputDir: '.',
  concurrency: 16,
  requestTimeoutMs: 300_000,
  matchMode: 'exact',
  port: 5005,
} as const;

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: Env = process.env): HarnessConfig {
  const parsed = ConfigSchema.safeParse({
    endpointUrl: nonEmpty(env.INFERENCE_ENDPOINT_URL) ?? DEFAULT_CONFIG.endpointUrl,
    imageBaseUrl: (nonEmpty(env.IMAGE_BASE_URL) ?? DEFAULT_CONFIG.imageBaseUrl).replace(/\/+$/, ''),
    datasetFile: nonEmpty(env.DATASET_FILE) ?? DEFAULT_CONFIG.datasetFile,
    outputDir: nonEmpty(env.OUTPUT_DIR) ?? DEFAULT_CONFIG.outputDir,
    concurrency: nonEmpty(env.CONCURRENCY) ?? DEFAULT_CONFIG.concurrency,
    requestTimeoutMs: nonEmpty(env.REQUEST_TIMEOUT_MS) ?? DEFAULT_CONFIG.requestTimeoutMs,
    maxNewTokens: nonEmpty(env.MAX_NEW_TOKENS),
    matchMode: nonEmpty(env.MATCH_MODE) ?? DEFAULT_CONFIG.matchMode,
    apiKeys: env.API_KEYS?.split(',').map((k) => k.trim()).filter(Boolean) ?? [],
    port: nonEmpty(env.PORT) ?? DEFAULT_CONFIG.port,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  return parsed.data;
}
