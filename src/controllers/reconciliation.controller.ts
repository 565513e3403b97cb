import { Request, Response } from 'express';
import { reconciliationService, type ReconciliationService } from '../services';
import type { RunRequest, ScoreRequest } from '../middlewares';
import { sendSuccess, asyncHandler, AppError } from '../utils';

/**
 * Reconciliation controller
 *
 * Bodies and params arrive already validated by `validateRequest`.
 */
export class ReconciliationController {
  constructor(private readonly service: ReconciliationService = reconciliationService) {}

  /**
   * POST /reconciliation/score
   */
  scorePair = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { invoiceId, poNumber }: ScoreRequest = req.body;
    const verdict = await this.service.scoreInvoice(invoiceId, poNumber);
    sendSuccess(res, verdict, verdict.found ? 'Pair scored' : 'No feature row for this pair');
  });

  /**
   * POST /reconciliation/runs
   * Runs the batch to its approval checkpoint before responding
   */
  runBatch = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { invoices, minConf }: RunRequest = req.body;
    const result = await this.service.runBatch(invoices, minConf);
    sendSuccess(res, result, `Run ${result.status}`);
  });

  /**
   * POST /reconciliation/runs/async
   */
  enqueueRun = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { invoices, minConf }: RunRequest = req.body;
    const queued = await this.service.enqueueRun(invoices, minConf);
    sendSuccess(res, queued, 'Run queued', 202);
  });

  /**
   * GET /reconciliation/runs/:runId
   */
  getRun = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const state = await this.service.getRun(req.params.runId);
    if (!state) {
      throw AppError.notFound(`Run ${req.params.runId} not found`);
    }
    sendSuccess(res, state);
  });
}

export const reconciliationController = new ReconciliationController();

export default reconciliationController;
