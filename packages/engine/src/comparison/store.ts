import { and, asc, desc, eq, inArray, sql } from 'drizzle-orm';
import type { DB } from '../db/index.js';
import { comparisonScenarios } from '../db/schema.js';
import type { ScheduleRecord, SummaryRecord } from '../export/records.js';

export const DEFAULT_MAX_SCENARIOS_PER_USER = 10;

export interface SavedScenario {
  id: string;
  name: string;
  summary: SummaryRecord;
  schedule: ScheduleRecord[];
  createdAt: string;
}

export interface NewScenario {
  name: string;
  summary: SummaryRecord;
  schedule: ScheduleRecord[];
}

function toSavedScenario(row: typeof comparisonScenarios.$inferSelect): SavedScenario {
  const summary: SummaryRecord = JSON.parse(row.summaryJson);
  const schedule: ScheduleRecord[] = JSON.parse(row.scheduleJson);
  return { id: row.id, name: row.name, summary, schedule, createdAt: row.createdAt };
}

/** Oldest first. An empty token owns nothing. */
export function listScenarios(db: DB, userToken: string): SavedScenario[] {
  if (!userToken) return [];

  return db
    .select()
    .from(comparisonScenarios)
    .where(eq(comparisonScenarios.userToken, userToken))
    .orderBy(asc(comparisonScenarios.createdAt), sql`rowid`)
    .all()
    .map(toSavedScenario);
}

export function getScenario(db: DB, userToken: string, id: string): SavedScenario | null {
  const row = db
    .select()
    .from(comparisonScenarios)
    .where(and(eq(comparisonScenarios.id, id), eq(comparisonScenarios.userToken, userToken)))
    .get();
  return row ? toSavedScenario(row) : null;
}

/** Keeps only the newest `maxPerUser` scenarios of the user. Zero or less disables trimming. */
function trimScenarios(db: DB, userToken: string, maxPerUser: number): void {
  if (maxPerUser <= 0) return;

  const stale = db
    .select({ id: comparisonScenarios.id })
    .from(comparisonScenarios)
    .where(eq(comparisonScenarios.userToken, userToken))
    .orderBy(desc(comparisonScenarios.createdAt), sql`rowid desc`)
    .all()
    .slice(maxPerUser)
    .map((row) => row.id);

  if (stale.length === 0) return;
  db.delete(comparisonScenarios).where(inArray(comparisonScenarios.id, stale)).run();
}

export function addScenario(
  db: DB,
  userToken: string,
  scenario: NewScenario,
  maxPerUser = DEFAULT_MAX_SCENARIOS_PER_USER,
): SavedScenario {
  const row = db
    .insert(comparisonScenarios)
    .values({
      userToken,
      name: scenario.name,
      summaryJson: JSON.stringify(scenario.summary),
      scheduleJson: JSON.stringify(scenario.schedule),
    })
    .returning()
    .get();

  trimScenarios(db, userToken, maxPerUser);
  return toSavedScenario(row);
}

export function removeScenario(db: DB, userToken: string, id: string): boolean {
  const result = db
    .delete(comparisonScenarios)
    .where(and(eq(comparisonScenarios.id, id), eq(comparisonScenarios.userToken, userToken)))
    .run();
  return result.changes > 0;
}

export function clearScenarios(db: DB, userToken: string): number {
  if (!userToken) return 0;
  return db
    .delete(comparisonScenarios)
    .where(eq(comparisonScenarios.userToken, userToken))
    .run().changes;
}
