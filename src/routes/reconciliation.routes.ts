/**
 * Reconciliation API Routes
 *
 * HTTP concerns only; matching and orchestration live in the services.
 *
 * Endpoints:
 * - POST /score        - Score one (invoice, PO) pair
 * - POST /runs         - Run a batch synchronously
 * - POST /runs/async   - Queue a batch for the background worker
 * - GET  /runs/:runId  - Read a queued run's state
 */

import { Router } from 'express';
import { reconciliationController } from '../controllers';
import { validateRequest, reconciliationSchemas, runLimiter } from '../middlewares';

const router = Router();

/**
 * @route   POST /reconciliation/score
 * @desc    Score one pair and apply the decision policy
 * @access  Public
 */
router.post('/score', validateRequest({ body: reconciliationSchemas.score }), reconciliationController.scorePair);

/**
 * @route   POST /reconciliation/runs
 * @desc    Plan, reconcile and draft emails for a batch, stopping at approval
 * @access  Public
 */
router.post('/runs', runLimiter, validateRequest({ body: reconciliationSchemas.run }), reconciliationController.runBatch);

/**
 * @route   POST /reconciliation/runs/async
 * @desc    Queue a batch (requires Redis)
 * @access  Public
 */
router.post(
  '/runs/async',
  runLimiter,
  validateRequest({ body: reconciliationSchemas.run }),
  reconciliationController.enqueueRun
);

/**
 * @route   GET /reconciliation/runs/:runId
 * @desc    Background run state
 * @access  Public
 */
router.get('/runs/:runId', validateRequest({ params: reconciliationSchemas.runId }), reconciliationController.getRun);

export default router;
