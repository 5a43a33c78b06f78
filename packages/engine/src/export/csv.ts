import type { ScheduleEntry } from '../loan/types.js';
import { SCHEDULE_RECORD_KEYS, toScheduleRecord } from './records.js';

/** One header row of record keys, then one row per entry. Lines end with `\n`. */
export function toCsv(entries: readonly ScheduleEntry[]): string {
  const lines: string[] = [SCHEDULE_RECORD_KEYS.join(',')];
  for (const entry of entries) {
    const record = toScheduleRecord(entry);
    lines.push(SCHEDULE_RECORD_KEYS.map((key) => String(record[key])).join(','));
  }
  return `${lines.join('\n')}\n`;
}
