/**
 * VLM Benchmark API Server
 *
 * Endpoints:
 * - POST /api/v1/benchmark/run - Dispatch a dataset range and write a results file
 * - POST /api/v1/benchmark/resume - Retry failed entries of a results file in place
 * - POST /api/v1/evaluate - Score result entries against the dataset
 * - GET /api/v1/health - Health check
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadConfig } from '../config';
import { createConsoleLogger } from '../ui/logger';
import { createApp } from './app';

const config = loadConfig();
const app = createApp({ config, logger: createConsoleLogger() });

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`
╔══════════════════════════════════════════════════════════════╗
║                    VLM BENCHMARK API                         ║
╚══════════════════════════════════════════════════════════════╝
  Listening on http://localhost:${info.port}

  Endpoints:
    POST /api/v1/benchmark/run     - Run a dataset range
    POST /api/v1/benchmark/resume  - Retry failed entries
    POST /api/v1/evaluate          - Score result entries
    GET  /api/v1/health            - Health check
`);
});
