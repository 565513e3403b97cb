import { Request, Response } from 'express';
import { healthService } from '../services';
import { sendSuccess, sendError, asyncHandler } from '../utils';

/**
 * Health check controller
 */
export class HealthController {
  /**
   * GET /health
   */
  getHealth = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, healthService.getHealthStatus(), 'Service is healthy');
  });

  /**
   * GET /health/ready
   * Dataset directory and model artifact must be present
   */
  getReadiness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const report = await healthService.checkReadiness();

    if (report.ready) {
      sendSuccess(res, report, 'Service is ready');
    } else {
      const failing = Object.entries(report.checks)
        .filter(([, ok]) => !ok)
        .map(([name]) => name);
      sendError(res, 'Service is not ready', 503, `Failing checks: ${failing.join(', ')}`);
    }
  });

  /**
   * GET /health/live
   */
  getLiveness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  });
}

export const healthController = new HealthController();

export default healthController;
