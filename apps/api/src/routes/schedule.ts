import { Hono } from 'hono';
import { z } from 'zod';
import {
  compareScenarios,
  compareWithBaseline,
  computeSchedule,
  hasOverpayments,
  toComparisonRecord,
  toCsv,
  toJsonDocument,
  toSummaryRecord,
} from '@loancalc/engine';
import type { ApiConfig } from '../config.js';
import { buildLoanConfig, loanRequestSchema, parseBody, readJson } from '../loan-request.js';

const compareRequestSchema = z.object({
  scenario1: loanRequestSchema,
  scenario2: loanRequestSchema,
});

export function scheduleRoutes(config: ApiConfig) {
  const router = new Hono();
  const options = { precision: config.precision };

  // POST / - full schedule, plus savings against the baseline when overpaying
  router.post('/', async (c) => {
    const loan = parseBody(loanRequestSchema, await readJson(c));
    const result = computeSchedule(buildLoanConfig(loan), options);
    const document = toJsonDocument(result);

    if (!hasOverpayments(result.config)) {
      return c.json(document);
    }
    return c.json({
      ...document,
      comparison: toComparisonRecord(compareWithBaseline(result, options)),
    });
  });

  // POST /summary - summary only
  router.post('/summary', async (c) => {
    const loan = parseBody(loanRequestSchema, await readJson(c));
    const result = computeSchedule(buildLoanConfig(loan), options);
    return c.json({ summary: toSummaryRecord(result.summary) });
  });

  // POST /csv - schedule as CSV
  router.post('/csv', async (c) => {
    const loan = parseBody(loanRequestSchema, await readJson(c));
    const result = computeSchedule(buildLoanConfig(loan), options);
    c.header('Content-Type', 'text/csv; charset=utf-8');
    return c.body(toCsv(result.entries));
  });

  // POST /compare - two scenarios side by side
  router.post('/compare', async (c) => {
    const body = parseBody(compareRequestSchema, await readJson(c));
    const first = computeSchedule(buildLoanConfig(body.scenario1), options);
    const second = computeSchedule(buildLoanConfig(body.scenario2), options);

    return c.json({
      scenario1: toSummaryRecord(first.summary),
      scenario2: toSummaryRecord(second.summary),
      metrics: compareScenarios(first.summary, second.summary),
    });
  });

  return router;
}
