export { errorHandler } from './errorHandler';
export { notFound } from './notFound';
export { requestLogger, isHealthProbe } from './requestLogger';
export { validateRequest, reconciliationSchemas, type ScoreRequest, type RunRequest } from './validateRequest';
export { apiLimiter, runLimiter } from './rateLimiter';
