import { pgTable, uuid, text, timestamp } from 'drizzle-orm/pg-core';
import type { TrackingKind } from '@shared/types';

export const taskTracking = pgTable('task_tracking', {
  id: uuid('id').primaryKey().defaultRandom(),
  processName: text('process_name').notNull(),
  kind: text('kind').$type<TrackingKind>().notNull(),
  trackedAt: timestamp('tracked_at', { withTimezone: true }).notNull().defaultNow(),
});
