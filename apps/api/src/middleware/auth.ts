import type { MiddlewareHandler } from 'hono';
import { AppError } from '../errors.js';

const BEARER_RE = /^Bearer\s+(.+)$/i;

const unauthorized = (message: string, suggestion: string) =>
  new AppError('UNAUTHORIZED', message, 401, suggestion);

/** Bearer-key guard. Without a configured key every request passes. */
export function apiKeyAuth(apiKey: string | undefined): MiddlewareHandler {
  if (!apiKey) {
    return async (_c, next) => next();
  }

  return async (c, next) => {
    const header = c.req.header('Authorization');
    if (!header) {
      throw unauthorized('Missing Authorization header', 'Send Authorization: Bearer <api-key>');
    }

    const token = BEARER_RE.exec(header)?.[1];
    if (token !== apiKey) {
      throw unauthorized('Invalid API key', 'The key must match LOANCALC_API_KEY on the server');
    }

    await next();
  };
}
