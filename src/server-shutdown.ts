import type { ServerType } from '@hono/node-server';
import { logger } from './lib/logger';

const SHUTDOWN_TIMEOUT_MS = 10_000;

async function closeServer(server: ServerType): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((error?: Error) => (error ? reject(error) : resolve()));
  });
}

async function gracefulShutdown(server: ServerType, signal: string): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal');

  const timeout = setTimeout(() => {
    logger.error(`Shutdown timed out after ${SHUTDOWN_TIMEOUT_MS}ms, forcing exit`);
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    await closeServer(server);
    clearTimeout(timeout);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    clearTimeout(timeout);
    logger.error({ err: error }, 'Error during shutdown');
    process.exit(1);
  }
}

export function registerGracefulShutdownHandlers(server: ServerType): void {
  process.once('SIGTERM', () => {
    void gracefulShutdown(server, 'SIGTERM');
  });
  process.once('SIGINT', () => {
    void gracefulShutdown(server, 'SIGINT');
  });
}
