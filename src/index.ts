import { createApp } from './app';
import { env } from './config';
import { createSessionLock } from './locks';
import { disconnectRedis, getRedisClient } from './redis';
import { DrizzleSessionRepository, InMemorySessionRepository, type SessionRepository } from './repositories';
import { ReconciliationService } from './services/reconciliation.service';
import { logger, Logging } from './utils';
import { connectDatabase, disconnectDatabase, getDatabase, isDatabaseConfigured } from './utils/db';
import {
  closeMatchingQueue,
  createMatchingProcessor,
  InlineMatchingDispatcher,
  QueueMatchingDispatcher,
  setupMatchingWorker,
  type MatchingDispatcher,
} from './workers';

/**
 * Start the server
 */
const startServer = async (): Promise<void> => {
  try {
    // Connect to database (in-memory sessions when DATABASE_URL is unset)
    await connectDatabase();
    const repository: SessionRepository = isDatabaseConfigured()
      ? new DrizzleSessionRepository(getDatabase())
      : new InMemorySessionRepository();

    // Trigger Redis connection (for early logging and availability check)
    getRedisClient();

    const service = new ReconciliationService({ repository, lock: createSessionLock() });

    // Setup background worker when a queue is available
    let dispatcher: MatchingDispatcher;
    let shutdownWorker: () => Promise<void> = async () => undefined;

    if (env.REDIS_ENABLED) {
      const processor = createMatchingProcessor(service);
      const worker = setupMatchingWorker(processor.process);
      dispatcher = new QueueMatchingDispatcher();
      shutdownWorker = async () => {
        processor.abortAll();
        await worker.close();
        await closeMatchingQueue();
      };
      logger.info('👷 Matching worker initialized');
    } else {
      dispatcher = new InlineMatchingDispatcher(service);
      logger.info('👷 Redis disabled - matching runs inline');
    }

    const app = createApp({ service, dispatcher });

    const server = app.listen(env.PORT, () => {
      Logging.box('🚀 RECONCILIATION ENGINE', `Server started in ${env.NODE_ENV} mode`);
      Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
      Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
      Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
    });

    const closeResources = async (): Promise<void> => {
      // Close BullMQ worker first so no pass starts mid-shutdown
      await shutdownWorker();

      // Disconnect from Redis (optional - gracefully handle if unavailable)
      await disconnectRedis();

      // Disconnect from database
      await disconnectDatabase();
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
          .catch((error: unknown) => {
            logger.error('Error while releasing resources:', error);
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
