import { z } from 'zod';
import { MatchModeSchema } from '../../config';
import { StoredResultEntrySchema } from '../../benchmark/results';

export const RunRequestSchema = z.object({
  start: z.number().int().min(1).default(1),
  n: z.number().int().min(1).optional(),
  concurrency: z.number().int().min(1).max(256).optional(),
});

export const ResumeRequestSchema = z.object({
  resumeFile: z.string().min(1, 'resumeFile is required'),
  n: z.number().int().min(1).optional(),
  concurrency: z.number().int().min(1).max(256).optional(),
});

export const EvaluateRequestSchema = z.object({
  results: z.array(StoredResultEntrySchema).min(1),
  matchMode: MatchModeSchema.optional(),
});

export type RunRequest = z.infer<typeof RunRequestSchema>;
export type ResumeRequest = z.infer<typeof ResumeRequestSchema>;
export type EvaluateRequest = z.infer<typeof EvaluateRequestSchema>;
