import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { RunRequestSchema, ResumeRequestSchema, type ResumeRequest, type RunRequest } from '../schemas/request';
import type { ResumeResponse, RunResponse } from '../schemas/response';
import { runBenchmark } from '../../benchmark/runner';
import { resumeBenchmark } from '../../benchmark/resume';
import { resolveResultsPath } from '../../benchmark/results';
import { rejectInvalid } from '../middleware/validate';
import type { ApiContext } from '../context';

export function createBenchmarkRoutes(ctx: ApiContext) {
  const benchmark = new Hono();

  benchmark.post('/run', zValidator('json', RunRequestSchema, rejectInvalid), async (c) => {
    const body: RunRequest = c.req.valid('json');
    const summary = await runBenchmark(body, ctx);

    const response: RunResponse = {
      file: summary.file,
      total: summary.total,
      succeeded: summary.succeeded,
      failed: summary.failed,
    };
    return c.json(response);
  });

  benchmark.post('/resume', zValidator('json', ResumeRequestSchema, rejectInvalid), async (c) => {
    const body: ResumeRequest = c.req.valid('json');
    const resumeFile = resolveResultsPath(ctx.config.outputDir, body.resumeFile);
    const summary = await resumeBenchmark({ ...body, resumeFile }, ctx);

    const response: ResumeResponse = {
      file: summary.file,
      found: summary.found,
      retried: summary.retried,
      skipped: summary.skipped,
      updated: summary.updated,
      rewritten: summary.rewritten,
    };
    return c.json(response);
  });

  return benchmark;
}
