import express, { Application } from 'express';
import cors, { type CorsOptions } from 'cors';
import helmet from 'helmet';
import { requestLogger } from './middleware/logger.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createRoutes } from './routes';
import { getOpenApiSpec } from './swagger/swagger.config';
import { env } from './config/environment';
import { logger } from './config/logger';
import type { Container } from './container';

function allowedOrigins(): CorsOptions['origin'] {
  if (env.ALLOWED_ORIGINS === '*') {
    return true;
  }
  return env.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim());
}

/**
 * Creates and configures the Express application
 */
export function createApp(container: Container): Application {
  const app = express();

  // Security middleware
  app.use(helmet());

  // CORS middleware
  app.use(cors({
    origin: allowedOrigins(),
    credentials: true,
  }));

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware
  app.use(requestLogger);

  // OpenAPI JSON endpoint
  app.get('/openapi.json', (_req, res) => {
    res.json(getOpenApiSpec());
  });

  // Mount API routes
  app.use('/', createRoutes(container));

  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  logger.debug('Express application configured', { store: container.store.driver });

  return app;
}
