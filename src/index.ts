import { createApp } from './app';
import { env } from './config';
import { logger, Logging } from './utils';
import { describeError } from './utils/errors';
import { disconnectRedis, getRedisClient } from './redis';
import { createServices } from './services';

/**
 * Start the server
 */
const startServer = async (): Promise<void> => {
  try {
    const services = createServices();

    // Trigger Redis connection early so the first lookup does not miss
    if (env.MAPPING_STORE === 'redis') {
      getRedisClient();
    }

    // Warm the catalog; the server still starts when the provider is down
    try {
      await services.catalog.getSnapshot();
    } catch (error) {
      logger.warn(`Catalog not loaded at startup: ${describeError(error)}`);
    }

    const app = createApp(services);

    const server = app.listen(env.PORT, () => {
      Logging.box('🧾 INVOICE RECONCILER', `Server started in ${env.NODE_ENV} mode`);
      Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
      Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
      Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
      Logging.info(`Mapping store: ${services.mappings.kind}`);
    });

    // Graceful shutdown handlers
    const gracefulShutdown = async (signal: string): Promise<void> => {
      logger.info(`\n${signal} received. Starting graceful shutdown...`);

      server.close(async (err) => {
        if (err) {
          logger.error('Error during server shutdown:', err);
          process.exit(1);
        }

        // Disconnect from Redis (optional - gracefully handle if unavailable)
        await disconnectRedis();

        logger.info('Server closed successfully');
        process.exit(0);
      });

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Forced shutdown due to timeout');
        process.exit(1);
      }, 30000).unref();
    };

    // Handle termination signals
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

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
