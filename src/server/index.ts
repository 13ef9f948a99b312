import type { Server } from 'http';
import { getEnv } from './config/env.js';
import { resourceConfigFromEnv } from './config/resourceConfig.js';
import { createResourceContainer } from './config/resources.js';
import { createServiceGetters } from './config/services.js';
import { createApp } from './app.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errorHandling.js';
import { ShutdownCoordinator } from './utils/shutdownCoordinator.js';

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeIdleConnections();
  });
}

function main(): void {
  const env = getEnv();
  const container = createResourceContainer(resourceConfigFromEnv(env));
  const app = createApp({
    ...createServiceGetters(container, env.AGENT_BASE_URL),
    health: container,
  });

  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Server listening');
  });

  const shutdown = new ShutdownCoordinator();
  shutdown.register('http-server', () => closeServer(server), 10000);
  shutdown.register('resources', async () => {
    const results = await container.cleanupAll();
    const failed = results.filter((result) => !result.success);
    if (failed.length > 0) {
      logger.warn({ failed }, 'Some resources did not close cleanly');
    }
  });

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown
      .shutdown(signal)
      .then((results) => {
        process.exit(results.every((result) => result.success) ? 0 : 1);
      })
      .catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  process.on('unhandledRejection', (reason) => {
    logger.error({ error: errorMessage(reason) }, 'Unhandled promise rejection');
  });
}

main();
