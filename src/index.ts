import { createApp } from './app';
import { closeDatabase, connectDatabase, pool } from './connections';
import { appConfig } from './connections/config/app.config';
import { PgUnitOfWork } from './connections/db/unit-of-work';
import { createServices } from './container';
import { createMailTransport, EmailOrderStatusNotifier, mailSettingsFromConfig } from './utils/email.service';
import { toError } from './utils/errors';
import { getLogger, logger } from './utils/logging';

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  try {
    logger.info('Connecting to database...');
    await connectDatabase();

    const notifier = new EmailOrderStatusNotifier(createMailTransport(), mailSettingsFromConfig(), getLogger('email'));
    const services = createServices(new PgUnitOfWork(pool, getLogger('db')), notifier);
    const app = createApp(services, async () => {
      await pool.query('SELECT 1');
    });

    const server = app.listen(appConfig.port, () => {
      logger.info(`Server is running on port ${appConfig.port}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
    });

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down`);
      server.close(() => {
        closeDatabase()
          .catch((error: unknown) => logger.error('Error closing database pool', { error: toError(error).message }))
          .finally(() => process.exit(0));
      });
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    const err = toError(error);
    logger.error('Failed to start server:', { error: err.message, stack: err.stack });
    logger.error('Exiting application...');
    process.exit(1);
  }
};

void startServer();
