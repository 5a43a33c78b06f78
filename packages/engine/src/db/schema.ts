import { sqliteTable, text, index } from 'drizzle-orm/sqlite-core';
import { createId } from '@paralleldrive/cuid2';

export const comparisonScenarios = sqliteTable('comparison_scenarios', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  userToken: text('user_token').notNull(),
  name: text('name').notNull(),
  summaryJson: text('summary_json').notNull(),
  scheduleJson: text('schedule_json').notNull(),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => [
  index('idx_scenarios_user').on(table.userToken),
]);
