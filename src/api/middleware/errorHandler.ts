import type { Context, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ZodError } from 'zod';
import { ErrorCodes, HarnessError, type ErrorCode } from '../../utils/errors';
import type { ErrorResponse } from '../schemas/response';

const STATUS_BY_CODE: Record<ErrorCode, ContentfulStatusCode> = {
  [ErrorCodes.INVALID_REQUEST]: 400,
  [ErrorCodes.UNAUTHORIZED]: 401,
  [ErrorCodes.CONFIG_ERROR]: 400,
  [ErrorCodes.RESULTS_FILE_ERROR]: 422,
  [ErrorCodes.DATASET_ERROR]: 500,
  [ErrorCodes.INFERENCE_ERROR]: 502,
  [ErrorCodes.TIMEOUT]: 504,
  [ErrorCodes.INTERNAL_ERROR]: 500,
};

function errorBody(code: string, message: string, details?: Record<string, unknown>): ErrorResponse {
  return { error: details ? { code, message, details } : { code, message } };
}

export const errorHandler: ErrorHandler = (err, c: Context) => {
  console.error('API Error:', err);

  // Zod validation errors
  if (err instanceof ZodError) {
    return c.json(errorBody(ErrorCodes.INVALID_REQUEST, 'Validation failed', {
      issues: err.issues.map(i => ({
        path: i.path.join('.'),
        message: i.message,
      })),
    }), 400);
  }

  // Malformed bodies and other errors Hono raises itself
  if (err instanceof HTTPException) {
    return c.json(errorBody(ErrorCodes.INVALID_REQUEST, err.message), err.status);
  }

  if (err instanceof HarnessError) {
    return c.json(errorBody(err.code, err.message), STATUS_BY_CODE[err.code]);
  }

  // Generic internal error
  return c.json(errorBody(
    ErrorCodes.INTERNAL_ERROR,
    'An unexpected error occurred.',
    process.env.NODE_ENV !== 'production' ? { originalMessage: err.message } : undefined
  ), 500);
};
