import type { Hono } from 'hono';
import { createDb, migrate, type DB } from '@loancalc/engine';
import { createApp } from '../src/app.js';
import { loadConfig, type ApiConfig } from '../src/config.js';

export async function api(
  app: Hono,
  method: string,
  path: string,
  body?: unknown,
  headers: Record<string, string> = {},
) {
  const init: RequestInit = {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
  };
  if (body !== undefined) init.body = typeof body === 'string' ? body : JSON.stringify(body);
  const res = await app.request(path, init);
  const data: unknown = res.headers.get('Content-Type')?.includes('application/json')
    ? await res.json()
    : await res.text();
  return { status: res.status, data, headers: res.headers };
}

export function createTestApp(overrides: Partial<ApiConfig> = {}): { app: Hono; db: DB } {
  const db = createDb(':memory:');
  migrate(db);
  const app = createApp(db, { ...loadConfig({}), ...overrides });
  return { app, db };
}

export const scenarioA = {
  principal: 100000,
  rate: 6,
  term: 12,
  startMonth: '2024-01',
};
