import { createServer } from 'http';
import fs from 'node:fs';
import path from 'node:path';
import { createApp } from './app/app';
import { loadConfig } from './app/app.config';
import { createServiceContainer } from './app/service-container';
import { openDatabase } from './db/database';
import { startRetryQueueDrainJob } from './jobs/retry-queue-drain';
import { createLogger, errorMessage } from './utils/logger';

function bootstrap(): void {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, silent: config.nodeEnv === 'test' });

  if (config.databasePath !== ':memory:') {
    fs.mkdirSync(path.dirname(config.databasePath), { recursive: true });
  }
  const db = openDatabase(config.databasePath);

  const services = createServiceContainer(config, db, logger);
  services.resolver.initialize();

  const app = createApp(services, logger, { corsOrigins: config.corsOrigins });
  const httpServer = createServer(app);
  const stopTasks: Array<() => void> = [];

  httpServer.listen(config.port, () => {
    logger.info('Kitchen dispatch API listening', { port: config.port, environment: config.nodeEnv });

    stopTasks.push(startRetryQueueDrainJob(services.retryQueue, logger, config.retry.drainIntervalMs));

    if (services.relay) {
      const { session, monitor } = services.relay;
      session
        .start()
        .then((connected) => {
          logger.info('Relay session started', { connected });
        })
        .catch((error: unknown) => {
          logger.error('Relay session failed to start', { error: errorMessage(error) });
        });
      monitor.start();
      stopTasks.push(() => monitor.stop(), () => session.stop());
    }
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    for (const stop of stopTasks) stop();
    httpServer.close(() => {
      db.close();
      process.exit(0);
    });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

bootstrap();
