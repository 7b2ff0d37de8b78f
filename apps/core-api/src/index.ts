// Load env FIRST — before any module reads process.env
import './loadEnv';

import {
  checkDatabaseHealth,
  closePool,
  createStorefront,
  errorMessage,
  initPool,
  loadConfig,
  logger,
  migrate,
} from 'storefront-core';
import { buildApp } from './app';
import { startEvidenceTimeoutWorker, stopEvidenceTimeoutWorker } from './workers/evidenceTimeoutWorker';

async function main(): Promise<void> {
  const config = loadConfig();
  const usesPostgres = config.storeDriver === 'postgres';

  if (usesPostgres) {
    initPool(config);
    await migrate();
  }

  const storefront = createStorefront(config);
  const fastify = await buildApp({
    storefront,
    checkStore: usesPostgres ? checkDatabaseHealth : async () => true,
  });

  await fastify.listen({ port: config.server.port, host: config.server.host });
  logger.info(`Storefront API running on http://${config.server.host}:${config.server.port}`, {
    storeDriver: config.storeDriver,
  });

  await storefront.recover();
  startEvidenceTimeoutWorker(storefront.payments, config.timeoutPollMs);

  // Graceful shutdown: unfinished work stays in the store and resumes on the next start
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    stopEvidenceTimeoutWorker();
    await fastify.close();
    if (usesPostgres) await closePool();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error: unknown) => {
      logger.error('Shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error: unknown) => {
      logger.error('Shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    });
  });
}

main().catch((error: unknown) => {
  logger.error('Storefront API failed to start', { error: errorMessage(error) });
  process.exit(1);
});
