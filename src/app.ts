import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { env } from './config';
import { HealthController } from './controllers/health.controller';
import { errorHandler, notFound, requestLogger } from './middlewares';
import { createRoutes } from './routes';
import { healthService as defaultHealthService, HealthService } from './services/health.service';
import type { ReconciliationService } from './services/reconciliation.service';
import type { MatchingDispatcher } from './workers/dispatcher';

export interface AppDeps {
  service: ReconciliationService;
  dispatcher: MatchingDispatcher;
  healthService?: HealthService;
}

/**
 * Create and configure Express application
 */
export const createApp = (deps: AppDeps): Application => {
  const app = express();

  // Security middleware
  app.use(helmet()); // Set security HTTP headers
  app.use(hpp()); // Prevent HTTP Parameter Pollution

  // CORS configuration
  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (like mobile apps or curl)
        if (!origin) return callback(null, true);

        const allowedOrigins = env.CORS_ORIGIN;
        
        if (allowedOrigins.includes('*') || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(null, false);
        }
      },
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept'],
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

  // Body parsing middleware (raw rows arrive as JSON)
  app.use(express.json({ limit: '25mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));

  // Compression middleware
  app.use(compression());

  // Request logging
  app.use(requestLogger);

  // API routes
  app.use(
    env.API_PREFIX,
    createRoutes({
      service: deps.service,
      dispatcher: deps.dispatcher,
      healthController: new HealthController(deps.healthService ?? defaultHealthService),
    })
  );

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Ledger Reconciliation Engine API',
      version: '1.0.0',
      sessions: `${env.API_PREFIX}/sessions`,
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
