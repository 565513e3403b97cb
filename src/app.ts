import express, { Application } from 'express';
import cors, { CorsOptions } from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import hpp from 'hpp';
import { env } from './config';
import { apiLimiter, errorHandler, notFound, requestLogger } from './middlewares';
import routes from './routes';

/** Batch bodies carry up to 1000 invoice references */
const JSON_BODY_LIMIT = '1mb';

export const isOriginAllowed = (origin: string | undefined, allowed: readonly string[]): boolean =>
  origin === undefined || allowed.includes('*') || allowed.includes(origin);

const corsOptions: CorsOptions = {
  origin: (origin, callback) => callback(null, isOriginAllowed(origin, env.CORS_ORIGIN)),
  credentials: true,
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept'],
};

/**
 * Builds the Express application. The server and the tests both start here.
 */
export const createApp = (): Application => {
  const app = express();

  app.use(helmet());
  app.use(hpp());
  app.use(cors(corsOptions));
  app.use(apiLimiter);
  app.use(express.json({ limit: JSON_BODY_LIMIT }));
  app.use(compression());
  app.use(requestLogger);

  app.use(env.API_PREFIX, routes);

  // Service index
  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Invoice Reconciliation API',
      version: '1.0.0',
      health: `${env.API_PREFIX}/health`,
      reconciliation: `${env.API_PREFIX}/reconciliation`,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(notFound);
  app.use(errorHandler);

  return app;
};

export default createApp;
