import { Hono, type Context } from 'hono';
import { getCookie, setCookie } from 'hono/cookie';
import { z } from 'zod';
import { createId } from '@paralleldrive/cuid2';
import {
  type DB,
  addScenario,
  clearScenarios,
  computeSchedule,
  getScenario,
  listScenarios,
  removeScenario,
  toScheduleRecord,
  toSummaryRecord,
} from '@loancalc/engine';
import type { ApiConfig } from '../config.js';
import { notFound } from '../errors.js';
import { buildLoanConfig, loanRequestSchema, parseBody, readJson } from '../loan-request.js';

export const USER_TOKEN_COOKIE = 'user_token';

const saveScenarioSchema = z.object({
  name: z.string().min(1).max(255),
  loan: loanRequestSchema,
});

function userToken(c: Context): string {
  return getCookie(c, USER_TOKEN_COOKIE) ?? '';
}

export function comparisonRoutes(db: DB, config: ApiConfig) {
  const router = new Hono();

  // GET / - saved scenarios of the caller, oldest first
  router.get('/', (c) => c.json(listScenarios(db, userToken(c))));

  // POST / - compute and save a scenario, issuing a token on first save
  router.post('/', async (c) => {
    const body = parseBody(saveScenarioSchema, await readJson(c));
    const result = computeSchedule(buildLoanConfig(body.loan), { precision: config.precision });

    let token = userToken(c);
    if (!token) {
      token = createId();
      setCookie(c, USER_TOKEN_COOKIE, token, { path: '/', httpOnly: true, sameSite: 'Lax' });
    }

    const saved = addScenario(
      db,
      token,
      {
        name: body.name,
        summary: toSummaryRecord(result.summary),
        schedule: result.entries.map(toScheduleRecord),
      },
      config.maxScenariosPerUser,
    );
    return c.json(saved, 201);
  });

  // GET /:id - one saved scenario with its schedule
  router.get('/:id', (c) => {
    const id = c.req.param('id');
    const scenario = getScenario(db, userToken(c), id);
    if (!scenario) throw notFound('Comparison', id);
    return c.json(scenario);
  });

  // DELETE /:id - remove one scenario
  router.delete('/:id', (c) => {
    const id = c.req.param('id');
    if (!removeScenario(db, userToken(c), id)) throw notFound('Comparison', id);
    return c.json({ success: true });
  });

  // DELETE / - remove all scenarios of the caller
  router.delete('/', (c) => c.json({ deleted: clearScenarios(db, userToken(c)) }));

  return router;
}
