import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';

import { createAuthMiddleware } from './middleware/auth';
import { errorHandler } from './middleware/errorHandler';
import { createBenchmarkRoutes } from './routes/benchmark';
import { createEvaluateRoutes } from './routes/evaluate';
import { createHealthRoutes } from './routes/health';
import type { ApiContext } from './context';
import type { ErrorResponse } from './schemas/response';

export interface AppOptions {
  /** Request logging via hono/logger; off in tests */
  requestLogging?: boolean;
}

export function createApp(ctx: ApiContext, options: AppOptions = {}) {
  const app = new Hono();

  // Global middleware
  app.use('*', secureHeaders());
  app.use('*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'X-API-Key'],
  }));
  if (options.requestLogging ?? true) {
    app.use('*', logger());
  }

  // Auth middleware for API routes
  app.use('/api/*', createAuthMiddleware(ctx.config.apiKeys));

  // API routes
  app.route('/api/v1/benchmark', createBenchmarkRoutes(ctx));
  app.route('/api/v1/evaluate', createEvaluateRoutes(ctx));
  app.route('/api/v1/health', createHealthRoutes(ctx));

  // Root endpoint
  app.get('/', (c) => {
    return c.json({
      name: 'VLM Benchmark API',
      version: '1.0.0',
      endpoints: {
        run: 'POST /api/v1/benchmark/run',
        resume: 'POST /api/v1/benchmark/resume',
        evaluate: 'POST /api/v1/evaluate',
        health: 'GET /api/v1/health',
      },
    });
  });

  // Global error handler
  app.onError(errorHandler);

  // 404 handler
  app.notFound((c) => {
    const body: ErrorResponse = {
      error: {
        code: 'NOT_FOUND',
        message: `Route ${c.req.method} ${c.req.path} not found`,
      },
    };
    return c.json(body, 404);
  });

  return app;
}
