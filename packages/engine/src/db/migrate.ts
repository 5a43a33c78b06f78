import type { DB } from './index.js';

/** Creates the tables the store needs. Safe to run on every start. */
export function migrate(db: DB): void {
  db.$client.exec(`
    CREATE TABLE IF NOT EXISTS comparison_scenarios (
      id TEXT PRIMARY KEY,
      user_token TEXT NOT NULL,
      name TEXT NOT NULL,
      summary_json TEXT NOT NULL,
      schedule_json TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_scenarios_user ON comparison_scenarios(user_token);
  `);
}
