import express from 'express';
import cors, { CorsOptions } from 'cors';
import { appConfig } from './connections/config/app.config';
import { createRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import { AppDependencies } from './types/app.types';
import { logger } from './utils/logging';
import { errorMessage } from './utils/errors';

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Allow requests with no origin (like curl or server-to-server calls)
    if (!origin) {
      return callback(null, true);
    }

    // Without an explicit allow-list every origin is accepted
    if (appConfig.corsOrigins.length === 0 || appConfig.corsOrigins.includes(origin)) {
      return callback(null, true);
    }

    callback(new Error('Not allowed by CORS'));
  },
  methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Accept', 'Origin', 'X-Requested-With'],
  maxAge: 3600,
  optionsSuccessStatus: 200,
};

export const createApp = (deps: AppDependencies) => {
  const app = express();

  app.use(cors(corsOptions));
  app.use(express.json());

  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      logger.info(`${req.method} ${req.originalUrl} ${res.statusCode}`, { durationMs: Date.now() - startedAt });
    });
    next();
  });

  // Health check
  app.get('/health', async (_req, res) => {
    try {
      await deps.db.query('SELECT 1');
      res.json({ status: 'ok', database: 'connected' });
    } catch (error) {
      logger.error('Health check failed', { error: errorMessage(error) });
      res.status(503).json({ status: 'error', database: 'disconnected' });
    }
  });

  app.use('/api/v1', createRoutes(deps));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
