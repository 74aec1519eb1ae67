import { pgTable, uuid, jsonb, timestamp } from 'drizzle-orm/pg-core';
import type { RunSummaryRecord } from '@shared/types';

export const runs = pgTable('runs', {
  id: uuid('id').primaryKey().defaultRandom(),
  startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
  finishedAt: timestamp('finished_at', { withTimezone: true }).notNull(),
  summary: jsonb('summary').$type<RunSummaryRecord>(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});
