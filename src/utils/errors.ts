export const ErrorCodes = {
  INVALID_REQUEST: 'INVALID_REQUEST',
  UNAUTHORIZED: 'UNAUTHORIZED',
  CONFIG_ERROR: 'CONFIG_ERROR',
  DATASET_ERROR: 'DATASET_ERROR',
  RESULTS_FILE_ERROR: 'RESULTS_FILE_ERROR',
  INFERENCE_ERROR: 'INFERENCE_ERROR',
  TIMEOUT: 'TIMEOUT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class HarnessError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends HarnessError {
  constructor(message: string) {
    super(ErrorCodes.CONFIG_ERROR, message);
  }
}

export class DatasetError extends HarnessError {
  /** 1-based line in the dataset file, when the problem is tied to one */
  readonly line?: number;

  constructor(message: string, line?: number, options?: { cause?: unknown }) {
    super(ErrorCodes.DATASET_ERROR, line !== undefined ? `${message} (line ${line})` : message, options);
    this.line = line;
  }
}

export class ResultsFileError extends HarnessError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.RESULTS_FILE_ERROR, message, options);
  }
}

export class InferenceError extends HarnessError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(ErrorCodes.INFERENCE_ERROR, message);
    this.status = status;
  }
}

export class RequestTimeoutError extends HarnessError {
  constructor(timeoutMs: number) {
    super(ErrorCodes.TIMEOUT, `Request timed out after ${timeoutMs}ms`);
  }
}

/**
 * Render any thrown value as a single-line message suitable for a result entry.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    // undici reports transport failures as "fetch failed" with the real reason in `cause`
    if (error.message === 'fetch failed' && error.cause instanceof Error) {
      return `fetch failed: ${error.cause.message}`;
    }
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
