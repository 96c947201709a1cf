import { Server } from 'http';
import { createApp } from '@/app.js';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { closeDatabaseConnection } from '@/db/connection.js';
import { createDependencies } from '@/dependencies.js';
import { serializeError } from '@/utils/errorHandling.js';

function startServer(): Server {
  const env = getEnvironment();
  const app = createApp(createDependencies());

  logger.info(`API key configured for external routes: ${Boolean((env.SERVICE_API_KEY || '').trim())}`);

  const server = app.listen(env.PORT, () => {
    logger.info('Picture Story Service started', {
      environment: env.NODE_ENV,
      port: env.PORT,
      textProvider: env.TEXT_PROVIDER,
      retrievalEnabled: env.RETRIEVAL_ENABLED,
    });
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    logger.error('Server failed to start', { error: serializeError(err), code: err.code });
    process.exitCode = 1;
  });

  return server;
}

function setupGracefulShutdown(server: Server): void {
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    server.close(() => {
      closeDatabaseConnection()
        .catch((error: unknown) => {
          logger.error('Failed to close database pool', { error: serializeError(error) });
          process.exitCode = 1;
        })
        .finally(() => process.exit());
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  setupGracefulShutdown(startServer());
}
