import { describe, it, expect } from 'vitest';
import { getTableName } from 'drizzle-orm';
import { workItems } from '../../src/db/schema/work-items';
import { taskTracking } from '../../src/db/schema/task-tracking';
import { reports, runs } from '@db/schema';

describe('work_items schema', () => {
  it('exports the work_items table', () => {
    expect(getTableName(workItems)).toBe('work_items');
  });

  it('has the queue columns', () => {
    const cols = Object.keys(workItems);
    expect(cols).toContain('id');
    expect(cols).toContain('reference');
    expect(cols).toContain('data');
    expect(cols).toContain('status');
    expect(cols).toContain('message');
    expect(cols).toContain('updatedAt');
  });

  it('defaults new items to NEW', () => {
    expect(workItems.status.default).toBe('NEW');
  });
});

describe('task_tracking schema', () => {
  it('exports the task_tracking table', () => {
    expect(getTableName(taskTracking)).toBe('task_tracking');
    expect(Object.keys(taskTracking)).toContain('kind');
  });
});

describe('reports and runs schema', () => {
  it('exports both tables', () => {
    expect(getTableName(reports)).toBe('reports');
    expect(getTableName(runs)).toBe('runs');
  });

  it('runs stores a summary', () => {
    expect(Object.keys(runs)).toContain('summary');
  });
});
