import logger from './logger';
import { startServer } from './server';

startServer()
  .then(({ stop }) => {
    const shutdown = (signal: string) => {
      logger.info(`[shutdown] ${signal} received`);
      stop()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, '[shutdown] failed to stop cleanly');
          process.exit(1);
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  })
  .catch((err: unknown) => {
    logger.error({ err }, '[startup] failed to start server');
    process.exit(1);
  });
