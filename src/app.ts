import express from 'express';
import cors, { CorsOptions } from 'cors';
import { appConfig } from './connections/config/app.config';
import type { Services } from './container';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import { createApiRouter } from './routes';
import { logger } from './utils/logging';

export type HealthCheck = () => Promise<void>;

const DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:5173',
];

const allowedOrigins = (): string[] => {
  const origins = new Set<string>();
  if (appConfig.frontendUrl) {
    origins.add(appConfig.frontendUrl);
  }
  appConfig.corsOrigins.forEach(origin => origins.add(origin));
  if (appConfig.nodeEnv === 'development') {
    DEV_ORIGINS.forEach(origin => origins.add(origin));
  }
  return [...origins];
};

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Server-to-server calls and curl send no origin
    if (!origin) {
      return callback(null, true);
    }
    if (allowedOrigins().includes(origin)) {
      return callback(null, true);
    }
    // In development, allow all origins if CORS_ORIGINS is not set
    if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      return callback(null, true);
    }
    callback(new Error('Not allowed by CORS'));
  },
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Tenant-ID', 'X-Requested-With', 'Accept', 'Origin'],
  maxAge: 86400,
  optionsSuccessStatus: 200,
};

export const createApp = (services: Services, healthCheck: HealthCheck) => {
  const app = express();

  app.use(cors(corsOptions));
  app.use(express.json());

  app.get('/health', async (_req, res) => {
    try {
      await healthCheck();
      res.json({ status: 'ok', database: 'connected' });
    } catch (error) {
      logger.warn('Health check failed', { error: error instanceof Error ? error.message : String(error) });
      res.status(503).json({ status: 'error', database: 'disconnected' });
    }
  });

  app.use('/api', createApiRouter(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
