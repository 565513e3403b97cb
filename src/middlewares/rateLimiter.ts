import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';
import { env } from '../config';
import { isHealthProbe } from './requestLogger';

const limitExceeded = (error: string) => ({
  success: false,
  error,
  timestamp: new Date().toISOString(),
});

/**
 * API-wide limit. Health probes are exempt so orchestrators never see 429s.
 */
export const apiLimiter: RateLimitRequestHandler = rateLimit({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  max: env.RATE_LIMIT_MAX_REQUESTS,
  message: limitExceeded('Too many requests, please try again later'),
  standardHeaders: true,
  legacyHeaders: false,
  skip: isHealthProbe,
});

/**
 * Batch runs score every invoice in the body; they get their own, smaller budget.
 */
export const runLimiter: RateLimitRequestHandler = rateLimit({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  max: env.RUN_RATE_LIMIT_MAX_REQUESTS,
  message: limitExceeded('Too many reconciliation runs, please try again later'),
  standardHeaders: true,
  legacyHeaders: false,
});
