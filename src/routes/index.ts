import { Router } from 'express';
import healthRoutes from './health.routes';
import reconciliationRoutes from './reconciliation.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Pair scoring and batch runs
router.use('/reconciliation', reconciliationRoutes);

export default router;
