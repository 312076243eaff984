import { createApp } from './app';
import { env } from './config/environment';
import { logger } from './config/logger';
import { closeConnection, getSupabaseClient, testConnection } from './config/database';
import { createServices, createSupabaseStores } from './services';

const SHUTDOWN_TIMEOUT_MS = 10000;

async function startServer(): Promise<void> {
  if (!(await testConnection())) {
    throw new Error('Database connection failed');
  }

  const services = createServices(createSupabaseStores(getSupabaseClient()));
  const app = createApp(services);

  const server = app.listen(env.PORT, () => {
    logger.info('Wash Bay Capacity API listening', {
      environment: env.NODE_ENV,
      port: env.PORT,
      docs: `http://localhost:${env.PORT}/docs`,
      health: `http://localhost:${env.PORT}/health`,
    });
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received, starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');
      closeConnection();
      process.exit(0);
    });

    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

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
  logger.error('Failed to start server', { error });
  process.exit(1);
});
