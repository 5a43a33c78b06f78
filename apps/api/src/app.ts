import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { DB } from '@loancalc/engine';
import { loadConfig, type ApiConfig } from './config.js';
import { toAppError } from './errors.js';
import { apiKeyAuth } from './middleware/auth.js';
import { comparisonRoutes } from './routes/comparisons.js';
import { scheduleRoutes } from './routes/schedule.js';

export const API_VERSION = '0.1.0';

export function createApp(db: DB, config: ApiConfig = loadConfig()) {
  const app = new Hono();

  app.use('*', cors());
  app.use('*', logger());

  app.onError((err, c) => {
    const appError = toAppError(err);
    if (appError.status >= 500) console.error(err);
    return c.json(
      {
        error: {
          code: appError.code,
          message: appError.message,
          suggestion: appError.suggestion,
        },
      },
      appError.status,
    );
  });

  app.get('/health', (c) => c.json({ status: 'ok', version: API_VERSION }));

  app.use('/api/v1/*', apiKeyAuth(config.apiKey));

  app.route('/api/v1/schedule', scheduleRoutes(config));
  app.route('/api/v1/comparisons', comparisonRoutes(db, config));

  return app;
}
