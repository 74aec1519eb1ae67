import { and, asc, desc, eq, type SQL } from 'drizzle-orm';
import type { WorkItem, WorkQueue } from '@core/ports';
import type { WorkItemStatus } from '@shared/types';
import type { Database } from './connection';
import { workItems } from './schema/work-items';

type WorkItemRow = typeof workItems.$inferSelect;

function toWorkItem(row: WorkItemRow): WorkItem {
  return {
    id: row.id,
    reference: row.reference,
    data: row.data,
    status: row.status,
    message: row.message,
    updatedAt: row.updatedAt,
  };
}

export class DrizzleWorkQueue implements WorkQueue {
  private readonly db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async getItemsByReference(reference: string, status?: WorkItemStatus): Promise<WorkItem[]> {
    const conditions: SQL[] = [eq(workItems.reference, reference)];
    if (status) conditions.push(eq(workItems.status, status));

    const rows = await this.db
      .select()
      .from(workItems)
      .where(and(...conditions))
      .orderBy(desc(workItems.updatedAt));
    return rows.map(toWorkItem);
  }

  async addItem(data: Record<string, unknown>, reference: string): Promise<WorkItem> {
    const [row] = await this.db.insert(workItems).values({ data, reference }).returning();
    return toWorkItem(row);
  }

  async clearWorkqueue(status: WorkItemStatus): Promise<number> {
    const deleted = await this.db
      .delete(workItems)
      .where(eq(workItems.status, status))
      .returning({ id: workItems.id });
    return deleted.length;
  }

  async claimNext(): Promise<WorkItem | null> {
    return this.db.transaction(async (tx) => {
      const [next] = await tx
        .select({ id: workItems.id })
        .from(workItems)
        .where(eq(workItems.status, 'NEW'))
        .orderBy(asc(workItems.createdAt))
        .limit(1)
        .for('update', { skipLocked: true });
      if (!next) return null;

      const [claimed] = await tx
        .update(workItems)
        .set({ status: 'IN_PROGRESS', updatedAt: new Date() })
        .where(eq(workItems.id, next.id))
        .returning();
      return toWorkItem(claimed);
    });
  }

  async complete(id: string): Promise<void> {
    await this.db
      .update(workItems)
      .set({ status: 'COMPLETED', updatedAt: new Date() })
      .where(eq(workItems.id, id));
  }

  async fail(id: string, message: string): Promise<void> {
    await this.db
      .update(workItems)
      .set({ status: 'FAILED', message, updatedAt: new Date() })
      .where(eq(workItems.id, id));
  }

  async get(id: string): Promise<WorkItem | null> {
    const [row] = await this.db.select().from(workItems).where(eq(workItems.id, id));
    return row ? toWorkItem(row) : null;
  }

  async list(status?: WorkItemStatus): Promise<WorkItem[]> {
    const rows = await this.db
      .select()
      .from(workItems)
      .where(status ? eq(workItems.status, status) : undefined)
      .orderBy(desc(workItems.createdAt));
    return rows.map(toWorkItem);
  }

  async requeue(id: string): Promise<void> {
    await this.db
      .update(workItems)
      .set({ status: 'NEW', message: null, updatedAt: new Date() })
      .where(eq(workItems.id, id));
  }
}
