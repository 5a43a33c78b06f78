import type { ContentfulStatusCode } from 'hono/utils/http-status';
import {
  ConfigurationError,
  InvalidTermError,
  ParseError,
  SimulationDivergenceError,
} from '@loancalc/engine';

export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public status: ContentfulStatusCode = 400,
    public suggestion = '',
  ) {
    super(message);
  }
}

export const notFound = (entity: string, id: string) =>
  new AppError(
    'NOT_FOUND',
    `${entity} '${id}' not found`,
    404,
    `Use GET /api/v1/${entity.toLowerCase()}s to list available IDs`,
  );

export const validationError = (message: string) =>
  new AppError('VALIDATION_ERROR', message, 400, 'Check request body');

export function toAppError(err: Error): AppError {
  if (err instanceof AppError) return err;

  if (err instanceof ConfigurationError) {
    return new AppError(err.code, err.message, 400, `Check the '${err.field}' field`);
  }
  if (err instanceof ParseError) {
    return new AppError(err.code, err.message, 400, 'Months are YYYY-MM; amounts accept k/m suffixes');
  }
  if (err instanceof InvalidTermError) {
    return new AppError(err.code, err.message, 400, 'Term must be a positive number of months');
  }
  if (err instanceof SimulationDivergenceError) {
    return new AppError(
      err.code,
      err.message,
      422,
      'Reduce holidays or extend the term so the loan can be repaid',
    );
  }
  return new AppError('INTERNAL_ERROR', err.message, 500, 'Check server logs');
}
