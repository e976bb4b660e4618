import { startServer, stopServer } from './server-control';
import { logger } from './core/logger';

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, starting graceful shutdown`);

  try {
    await stopServer();
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Error during graceful shutdown');
    process.exit(1);
  }
}

startServer().catch((error: unknown) => {
  logger.error({ error }, 'Failed to start server');
  process.exit(1);
});

process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT');
});

process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught exception, shutting down');
  void gracefulShutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection, shutting down');
  void gracefulShutdown('unhandledRejection');
});
