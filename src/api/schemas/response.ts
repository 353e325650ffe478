import type { EvaluatedEntry, EvaluationReport } from '../../evaluation/scorer';

export interface RunResponse {
  file: string;
  total: number;
  succeeded: number;
  failed: number;
}

export interface ResumeResponse {
  file: string;
  found: number;
  retried: number;
  skipped: number;
  updated: number;
  rewritten: boolean;
}

export interface EvaluateResponse {
  results: EvaluatedEntry[];
  report: EvaluationReport;
}

export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  version: string;
  services: {
    inference: { endpoint: string; timeoutMs: number };
    dataset: { file: string; status: 'available' | 'missing' };
  };
  timestamp: string;
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}
