import type { Server } from 'node:http';
import { createApp } from './app';
import { createContainer, type Container } from './container';
import { createStore } from './store';
import { testConnection } from './config/database';
import { env } from './config/environment';
import { logger } from './config/logger';
import { seedDemoData } from './seed';

/**
 * Application Entry Point
 *
 * Starts the Express server, the optional expiry sweep, and handles
 * graceful shutdown
 */

const SHUTDOWN_TIMEOUT_MS = 10_000;

// Verify database connection on startup
async function verifyDatabaseConnection(): Promise<void> {
  if (env.STORE_DRIVER !== 'postgres') {
    return;
  }
  const ok = await testConnection();
  if (!ok) {
    throw new Error('Database connection failed');
  }
  logger.info('Database connection verified successfully');
}

/**
 * Periodic sweep over overdue orders. Allocation expires holds lazily,
 * so this only keeps order statuses current for reporting.
 */
function startExpirySweep(container: Container): NodeJS.Timeout | null {
  if (env.EXPIRY_SWEEP_INTERVAL_SECONDS <= 0) {
    return null;
  }

  let running = false;
  const sweep = async (): Promise<void> => {
    if (running) return;
    running = true;
    try {
      await container.maintenance.expireOrders();
    } catch (error) {
      logger.error('Expiry sweep failed', { error: error instanceof Error ? error.message : String(error) });
    } finally {
      running = false;
    }
  };

  logger.info('Expiry sweep scheduled', { intervalSeconds: env.EXPIRY_SWEEP_INTERVAL_SECONDS });
  return setInterval(() => {
    void sweep();
  }, env.EXPIRY_SWEEP_INTERVAL_SECONDS * 1000);
}

// Start server
async function startServer(): Promise<void> {
  await verifyDatabaseConnection();

  const container = createContainer({ store: createStore(env) });
  if (container.store.driver === 'memory' && env.NODE_ENV === 'development') {
    await seedDemoData(container);
  }

  const app = createApp(container);
  const sweepTimer = startExpirySweep(container);

  const server: Server = app.listen(env.PORT, () => {
    logger.info('Booking & Allocation API listening', {
      environment: env.NODE_ENV,
      store: container.store.driver,
      baseUrl: `http://localhost:${env.PORT}`,
      openApi: `http://localhost:${env.PORT}/openapi.json`,
      health: `http://localhost:${env.PORT}/health`,
    });
  });

  let shuttingDown = false;

  // Graceful shutdown handler
  const gracefulShutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, starting graceful shutdown...`);

    if (sweepTimer) {
      clearInterval(sweepTimer);
    }

    server.close(() => {
      logger.info('HTTP server closed');
      container.store
        .close()
        .then(() => {
          logger.info('Shutting down gracefully');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Failed to close store', { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        });
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  // Handle shutdown signals
  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', { reason });
    gracefulShutdown('unhandledRejection');
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
