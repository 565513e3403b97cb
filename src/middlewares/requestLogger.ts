import { Request } from 'express';
import morgan, { StreamOptions } from 'morgan';
import { logger } from '../utils';
import { env } from '../config';

const stream: StreamOptions = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

/** Readiness and liveness probes poll constantly; keep them out of the log */
export const isHealthProbe = (req: Request): boolean => req.path.startsWith(`${env.API_PREFIX}/health`);

const skip = (req: Request): boolean => env.NODE_ENV === 'test' || isHealthProbe(req);

export const requestLogger = morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', { stream, skip });

export default requestLogger;
