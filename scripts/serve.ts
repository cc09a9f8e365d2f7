/**
 * News Reader — Serve Script
 *
 * Loads configuration, hydrates the cache, starts the refresh
 * scheduler and the HTTP API.
 *
 * Usage:
 *   npm start
 *   PORT=9000 npm start
 */

import { createServer, type Server } from 'http';
import { loadConfig } from '../src/config/environment';
import { createNewsReader } from '../src/bootstrap';
import { logger } from '../src/lib/logger';
import { errorMessage } from '../src/lib/errors';

function listen(server: Server, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

async function main(): Promise<void> {
  const config = await loadConfig();
  const reader = createNewsReader(config);

  if (reader.store.persistent) {
    await reader.store.hydrate();
  }

  const server = createServer(reader.app);
  await listen(server, config.port);

  logger.info('News reader listening', {
    port: config.port,
    sources: reader.adapters.map(a => a.id),
    persistence: reader.store.persistent,
  });

  reader.scheduler.start();

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });

    await reader.scheduler.stop();
    await close(server);
    if (reader.store.persistent) {
      await reader.store.flush();
    }
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(error => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
    });
  }
}

main().catch(error => {
  logger.error('Startup failed', { error: errorMessage(error) });
  process.exit(1);
});
