import { createApp } from './app';
import { env } from './config';
import { logger, Logging } from './utils';
import { disconnectRedis, getRedisClient } from './redis';
import { BatchJobService, createReconciliationService, redisBatchJobStore } from './services';
import {
  closeReconciliationQueue,
  createReconciliationJobProcessor,
  setupReconciliationWorker,
} from './workers';

/**
 * Start the server
 */
const startServer = async (): Promise<void> => {
  try {
    // Invalid configuration is fatal here, before anything listens
    const { service: reconciler, catalog } = createReconciliationService();

    if (env.CATALOG_STARTUP_CHECK) {
      await catalog.ping(env.CATALOG_TIMEOUT_MS);
      logger.info(`🛒 Catalog reachable at ${env.CATALOG_BASE_URL}`);
    }

    // Trigger Redis connection (for early logging and availability check)
    getRedisClient();

    // Setup background workers
    const worker = setupReconciliationWorker(
      createReconciliationJobProcessor({ reconciler, store: redisBatchJobStore })
    );
    logger.info('👷 Reconciliation worker initialized');

    const app = createApp({ reconciler, jobs: new BatchJobService() });

    const server = app.listen(env.PORT, () => {
      Logging.box('🚀 PRODUCT RECONCILIATION', `Server started in ${env.NODE_ENV} mode`);
      Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
      Logging.info(`Reconcile endpoint at http://${env.HOST}:${env.PORT}/reconcile`);
      Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
      Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
    });

    const closeResources = async (): Promise<void> => {
      // Close BullMQ worker and queue before dropping the Redis connection
      await worker.close();
      await closeReconciliationQueue();
      await disconnectRedis();
    };

    // Graceful shutdown handlers
    const gracefulShutdown = (signal: string): void => {
      logger.info(`${signal} received. Starting graceful shutdown...`);

      server.close((err) => {
        if (err) {
          logger.error('Error during server shutdown:', err);
          process.exit(1);
        }

        closeResources()
          .then(() => {
            logger.info('Server closed successfully');
            process.exit(0);
          })
          .catch((closeError: unknown) => {
            logger.error('Error while closing resources:', closeError);
            process.exit(1);
          });
      });

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Forced shutdown due to timeout');
        process.exit(1);
      }, 30000).unref();
    };

    // Handle termination signals
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    // Handle uncaught exceptions
    process.on('uncaughtException', (err: Error) => {
      logger.error('Uncaught Exception:', err);
      process.exit(1);
    });

    // Handle unhandled promise rejections
    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled Rejection:', reason);
      process.exit(1);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start server
void startServer();
