import { Router } from 'express';
import { db } from '@db/connection';
import { reports } from '@db/schema/reports';
import { eq, desc } from 'drizzle-orm';
import { z } from 'zod';

export const reportsQuerySchema = z.object({
  group: z.string().min(1).optional(),
});

const router = Router();

// GET /reports?group= -- audit report rows, newest first; a bad filter answers 400
router.get('/', async (req, res, next) => {
  try {
    const { group } = reportsQuerySchema.parse(req.query);
    const rows = await db
      .select()
      .from(reports)
      .where(group ? eq(reports.group, group) : undefined)
      .orderBy(desc(reports.createdAt));

    res.json({ success: true, data: rows });
  } catch (err) {
    next(err);
  }
});

export default router;
