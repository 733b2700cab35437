import express from 'express';
import { auth, authenticatedActionLimiter } from '@/middlewares';
import { getDashboardCounts, getDashboardOverview, getDashboardTimeseries } from './dashboard.controller';

const router = express.Router();

router.use(auth('admin'));

router.get('/', authenticatedActionLimiter, getDashboardOverview);
router.get('/counts', authenticatedActionLimiter, getDashboardCounts);
router.get('/timeseries', authenticatedActionLimiter, getDashboardTimeseries);

export const dashboardRouter = router;
