import { Router } from 'express';
import healthRouter from './health';
import workItemsRouter from './work-items';
import runsRouter from './runs';
import reportsRouter from './reports';

const router = Router();
router.use(healthRouter);
router.use('/work-items', workItemsRouter);
router.use('/runs', runsRouter);
router.use('/reports', reportsRouter);

export default router;
