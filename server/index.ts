import { buildServer } from './app';
import { config } from './config/env';
import { closeDb } from './database/connection';
import { logger } from './lib/logger';

async function start() {
  const server = await buildServer();

  const shutdown = async (signal: string) => {
    server.log.info({ signal }, 'Shutting down');
    try {
      await server.close();
      await closeDb();
      process.exit(0);
    } catch (err) {
      server.log.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.listen({ port: config.API_PORT, host: config.API_HOST });
  server.log.info(`Print shop ERP API running on http://${config.API_HOST}:${config.API_PORT}`);
}

start().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start');
  process.exit(1);
});
