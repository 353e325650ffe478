import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { EvaluateRequestSchema, type EvaluateRequest } from '../schemas/request';
import type { EvaluateResponse } from '../schemas/response';
import { indexById, loadDataset } from '../../dataset/loader';
import { scoreResults } from '../../evaluation/scorer';
import { rejectInvalid } from '../middleware/validate';
import type { ApiContext } from '../context';

export function createEvaluateRoutes(ctx: ApiContext) {
  const evaluate = new Hono();

  evaluate.post('/', zValidator('json', EvaluateRequestSchema, rejectInvalid), async (c) => {
    const body: EvaluateRequest = c.req.valid('json');
    const dataset = indexById(await loadDataset(ctx.config.datasetFile));

    const { entries, report } = scoreResults(body.results, dataset, body.matchMode ?? ctx.config.matchMode);

    const response: EvaluateResponse = { results: entries, report };
    return c.json(response);
  });

  return evaluate;
}
