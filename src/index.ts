/**
 * Feedcast — Service entry point
 *
 * Starts the daily scheduler and the query API.
 * Run with: npm start
 */

import 'dotenv/config';
import type { Server } from 'node:http';
import { loadConfig, type AppConfig } from './lib/config';
import { ConfigError } from './lib/errors';
import { logger } from './lib/logger';
import { buildServices } from './bootstrap';
import { createApp } from './server/api';

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Invalid configuration, exiting', { issues: error.issues });
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = loadConfigOrExit();
  const services = buildServices(config);

  logger.info('Feedcast starting', {
    env: config.env,
    sources: services.registry.size,
    transport: services.transport.name,
    cache: config.cache.backend,
  });

  services.scheduler.start();

  const app = createApp({
    news: services.news,
    registry: services.registry,
    defaultLimit: config.ranking.aggregateLimit,
    databaseHealth: services.databaseHealth,
  });

  const server: Server = app.listen(config.port, () => {
    logger.info(`Query API listening on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    services.scheduler.stop();
    server.close(() => process.exit(0));
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main();
