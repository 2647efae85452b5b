import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { join } from 'path';
import { env } from './config';
import {
  HealthController,
  ReconcileController,
  ReconciliationController,
  SearchController,
} from './controllers';
import { errorHandler, notFound, requestLogger } from './middlewares';
import createRoutes, { createReconcileRoutes } from './routes';
import { BatchJobService } from './services/batchJob.service';
import { HealthService, healthService } from './services/health.service';
import type { ReconciliationService } from './services/reconciliation.service';
import { SERVICE_NAME } from './services/protocolAdapter.service';

export interface AppDependencies {
  reconciler: ReconciliationService;
  jobs?: BatchJobService;
  health?: HealthService;
  /** Where multipart uploads are stored until the worker picks them up */
  uploadDir?: string;
}

/**
 * Create and configure Express application
 */
export const createApp = (deps: AppDependencies): Application => {
  const app = express();
  const jobs = deps.jobs ?? new BatchJobService();

  // Security middleware
  app.use(helmet()); // Set security HTTP headers
  app.use(hpp()); // Prevent HTTP Parameter Pollution

  // CORS configuration
  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (like reconciliation clients or curl)
        if (!origin) return callback(null, true);

        const allowedOrigins = env.CORS_ORIGIN;

        if (allowedOrigins.includes('*') || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(null, false);
        }
      },
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Requested-With', 'Accept'],
    })
  );

  // Rate limiting
  const limiter = rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX_REQUESTS,
    message: {
      success: false,
      error: 'Too many requests, please try again later',
      timestamp: new Date().toISOString(),
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use(limiter);

  // Body parsing middleware
  app.use(express.json({ limit: '2mb' }));
  app.use(express.urlencoded({ extended: true, limit: '2mb' }));

  // Compression middleware
  app.use(compression());

  // Request logging
  app.use(requestLogger);

  // Reconciliation protocol
  app.use(
    '/reconcile',
    createReconcileRoutes(new ReconcileController(deps.reconciler, env.CATALOG_BASE_URL))
  );

  // API routes
  app.use(
    env.API_PREFIX,
    createRoutes(
      {
        health: new HealthController(deps.health ?? healthService),
        search: new SearchController(deps.reconciler),
        reconciliation: new ReconciliationController(deps.reconciler, jobs),
      },
      deps.uploadDir ?? join(process.cwd(), 'uploads')
    )
  );

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: SERVICE_NAME,
      version: '1.0.0',
      reconcile: '/reconcile',
      health: `${env.API_PREFIX}/health`,
      timestamp: new Date().toISOString(),
    });
  });

  // Handle 404 - Route not found
  app.use(notFound);

  // Global error handler
  app.use(errorHandler);

  return app;
};

export default createApp;
