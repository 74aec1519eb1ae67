import type { CompletionTracker } from '@core/ports';
import type { Database } from './connection';
import { taskTracking } from './schema/task-tracking';

/** Counts finished and partially finished citizens per process. */
export class DrizzleCompletionTracker implements CompletionTracker {
  private readonly db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async trackTask(processName: string): Promise<void> {
    await this.db.insert(taskTracking).values({ processName, kind: 'full' });
  }

  async trackPartialTask(processName: string): Promise<void> {
    await this.db.insert(taskTracking).values({ processName, kind: 'partial' });
  }
}
