import { Router } from 'express';
import { z } from 'zod';
import { db } from '@db/connection';
import { DrizzleWorkQueue } from '@db/work-queue';
import type { WorkQueue } from '@core/ports';
import { WORK_ITEM_STATUSES } from '@shared/constants';

export const workItemsQuerySchema = z.object({
  status: z.enum(WORK_ITEM_STATUSES).optional(),
});

export function createWorkItemsRouter(queue: WorkQueue): Router {
  const router = Router();

  // GET /work-items -- list items, optionally by status
  router.get('/', async (req, res, next) => {
    const query = workItemsQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({
        success: false,
        error: `Invalid status. Must be one of: ${WORK_ITEM_STATUSES.join(', ')}`,
      });
    }

    try {
      const items = await queue.list(query.data.status);
      res.json({ success: true, data: items });
    } catch (err) {
      next(err);
    }
  });

  // POST /work-items/:id/requeue -- send a failed item back for another run
  router.post('/:id/requeue', async (req, res, next) => {
    try {
      const item = await queue.get(req.params.id);
      if (!item) {
        return res.status(404).json({ success: false, error: 'Work item not found' });
      }
      if (item.status !== 'FAILED') {
        return res
          .status(409)
          .json({ success: false, error: `Only FAILED items can be requeued (status is ${item.status})` });
      }

      await queue.requeue(item.id);
      res.json({ success: true, data: { ...item, status: 'NEW', message: null } });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

export default createWorkItemsRouter(new DrizzleWorkQueue(db));
