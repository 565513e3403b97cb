import { Router } from 'express';
import { healthController } from '../controllers';

/**
 * Health probes. Exempt from rate limiting and request logging.
 *
 * - GET /health        - Process status and uptime
 * - GET /health/ready  - Dataset directory and model artifact are usable (Redis reported, not required)
 * - GET /health/live   - Event loop is responsive
 */
const router = Router();

router.get('/', healthController.getHealth);
router.get('/ready', healthController.getReadiness);
router.get('/live', healthController.getLiveness);

export default router;
