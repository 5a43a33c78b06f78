import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema.js';

export const DEFAULT_DB_PATH = './data/loancalc.db';

/** Opens the scenario database. File databases get their directory and WAL journaling. */
export function createDb(dbPath: string = DEFAULT_DB_PATH) {
  const inMemory = dbPath === ':memory:';
  if (!inMemory) mkdirSync(dirname(dbPath), { recursive: true });

  const sqlite = new Database(dbPath);
  if (!inMemory) sqlite.pragma('journal_mode = WAL');
  return drizzle(sqlite, { schema });
}

export type DB = ReturnType<typeof createDb>;
export { schema };
