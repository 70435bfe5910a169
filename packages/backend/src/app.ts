import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { requestIdMiddleware } from './middleware/requestId';
import { requestLoggerMiddleware } from './middleware/requestLogger';
import { errorHandler } from './middleware/errorHandler';
import { createAuthMiddleware } from './middleware/auth';
import { successResponse, errorResponse } from './shared/envelope';
import { errorMessage, logger } from './shared/logger';
import { healthCheck as openSearchHealthCheck } from './modules/stacker/opensearch/client';
import { redisHealthCheck } from './cache/redis';
import { createStackerRoutes } from './modules/stacker/stacker.routes';
import type { StackerControllerDeps } from './modules/stacker/stacker.controller';

export interface AppConfig {
  corsOrigins: string[];
  jwtSecret: string;
  stacker: StackerControllerDeps;
}

export function createApp(config: AppConfig): express.Express {
  const app = express();

  app.disable('x-powered-by');

  // Middleware pipeline (order matters)
  // 1. requestId
  app.use(requestIdMiddleware);
  // 2. requestLogger
  app.use(requestLoggerMiddleware);
  // 3. helmet
  app.use(helmet());
  // 4. cors: explicit allowlist of origins
  app.use(cors({
    origin: (origin, callback) => {
      // No origin: server-to-server or health checks
      if (!origin) {
        return callback(null, true);
      }
      if (config.corsOrigins.includes(origin)) {
        return callback(null, origin);
      }
      return callback(null, false);
    },
  }));
  // 5. json body parser (1MB limit)
  app.use(express.json({ limit: '1mb' }));

  // 6. routes
  // Health check (public)
  app.get('/api/v1/health', async (_req, res) => {
    let osStatus: string = 'unavailable';
    try {
      const osHealth = await openSearchHealthCheck();
      osStatus = osHealth.status;
    } catch (err) {
      logger.warn('OpenSearch health check failed', { error: errorMessage(err) });
    }

    const redisHealthy = await redisHealthCheck();

    res.json(successResponse({
      status: 'ok',
      opensearch: osStatus,
      redis: redisHealthy ? 'ok' : 'unavailable',
    }));
  });

  const authenticate = createAuthMiddleware(config.jwtSecret);
  const { stackerRoutes, adminStackerRoutes } = createStackerRoutes(config.stacker);

  // Company-scoped stacker routes (authenticated, role check inside router)
  app.use('/api/v1/stacker', authenticate, stackerRoutes);

  // Admin stacker routes (authenticated, admin check inside router)
  app.use('/api/v1/admin/stacker', authenticate, adminStackerRoutes);

  // 404 catch-all for unknown routes
  app.use((_req, res) => {
    res.status(404).json(errorResponse('NOT_FOUND', 'The requested resource was not found'));
  });

  // 7. errorHandler (must be last)
  app.use(errorHandler);

  return app;
}
