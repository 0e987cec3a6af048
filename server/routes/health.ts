import { FastifyInstance } from 'fastify';
import { APP_VERSION } from '../../shared/constants';
import { getDb } from '../database/connection';

export async function healthRoutes(server: FastifyInstance) {
  server.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: server.clock.now().toISOString(),
      version: APP_VERSION,
    };
  });

  server.get('/health/db', async (request) => {
    try {
      await getDb().raw('SELECT 1');
      return { status: 'ok', database: 'connected' };
    } catch (err) {
      request.log.warn({ err }, 'Database health check failed');
      return { status: 'error', database: 'disconnected' };
    }
  });
}
