import { Router } from 'express';
import { db } from '@db/connection';
import { runs } from '@db/schema/runs';
import { eq, desc } from 'drizzle-orm';

const router = Router();

// GET /runs -- list all runs
router.get('/', async (_req, res, next) => {
  try {
    const rows = await db.select().from(runs).orderBy(desc(runs.createdAt));
    res.json({ success: true, data: rows });
  } catch (err) {
    next(err);
  }
});

// GET /runs/:id -- get a single run
router.get('/:id', async (req, res, next) => {
  try {
    const [row] = await db
      .select()
      .from(runs)
      .where(eq(runs.id, req.params.id));

    if (!row) {
      return res
        .status(404)
        .json({ success: false, error: 'Run not found' });
    }

    res.json({ success: true, data: row });
  } catch (err) {
    next(err);
  }
});

export default router;
