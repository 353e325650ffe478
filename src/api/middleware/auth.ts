import type { Context, MiddlewareHandler } from 'hono';
import { ErrorCodes } from '../../utils/errors';
import type { ErrorResponse } from '../schemas/response';

export const HEALTH_PATH = '/api/v1/health';

function unauthorized(c: Context, message: string) {
  const body: ErrorResponse = { error: { code: ErrorCodes.UNAUTHORIZED, message } };
  return c.json(body, 401);
}

/**
 * Requires X-API-Key on every route but health. With no keys configured,
 * any key is accepted outside production.
 */
export function createAuthMiddleware(apiKeys: readonly string[]): MiddlewareHandler {
  return async (c, next) => {
    // Skip auth for health endpoint
    if (c.req.path === HEALTH_PATH) {
      return next();
    }

    const apiKey = c.req.header('X-API-Key');

    if (!apiKey) {
      return unauthorized(c, 'API key required. Include X-API-Key header.');
    }

    if (apiKeys.length === 0 && process.env.NODE_ENV !== 'production') {
      return next();
    }

    if (!apiKeys.includes(apiKey)) {
      return unauthorized(c, 'Invalid API key.');
    }

    await next();
  };
}
