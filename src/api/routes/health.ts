import { Hono } from 'hono';
import { access } from 'node:fs/promises';
import type { HealthResponse } from '../schemas/response';
import type { ApiContext } from '../context';

const VERSION = '1.0.0';

async function fileExists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

export function createHealthRoutes(ctx: ApiContext) {
  const health = new Hono();

  health.get('/', async (c) => {
    const datasetAvailable = await fileExists(ctx.config.datasetFile);

    const response: HealthResponse = {
      status: datasetAvailable ? 'healthy' : 'unhealthy',
      version: VERSION,
      services: {
        inference: {
          endpoint: ctx.config.endpointUrl,
          timeoutMs: ctx.config.requestTimeoutMs,
        },
        dataset: {
          file: ctx.config.datasetFile,
          status: datasetAvailable ? 'available' : 'missing',
        },
      },
      timestamp: (ctx.now ?? (() => new Date()))().toISOString(),
    };

    return c.json(response);
  });

  return health;
}
