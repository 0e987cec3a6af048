// =============================================================
// File: server/app.ts
// Description: Fastify server bootstrap with plugin and route
//              registrations.
// =============================================================

import Fastify from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import sensible from '@fastify/sensible';
import { initializeDb } from './database/connection';
import { loggerOptions } from './lib/logger';
import { Clock, systemClock } from './lib/context';
import type { DataStore } from './repositories/types';
import { createServices, Services } from './services';
import type { ServiceSettings } from './services/base.service';
import { settingsFromConfig } from './services/base.service';
import { errorHandler } from './plugins/error-handler.plugin';
import { healthRoutes } from './routes/health';
import { weightPricingRoutes } from './routes/weight-pricing';
import { invoiceRoutes } from './routes/invoices';
import { productionRoutes } from './routes/production';

declare module 'fastify' {
  interface FastifyInstance {
    services: Services;
    clock: Clock;
  }
}

export interface BuildServerOptions {
  /** Skips the PostgreSQL connection check when supplied. */
  store?: DataStore;
  clock?: Clock;
  settings?: ServiceSettings;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const server = Fastify({ logger: loggerOptions });

  // Plugins
  await server.register(cors, {
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });
  await server.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });
  await server.register(sensible);

  // Action endpoints (start, recalculate, mark-paid) are posted with an empty JSON body.
  server.removeContentTypeParser('application/json');
  server.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    const text = body.toString().trim();
    if (!text) {
      done(null, {});
      return;
    }
    try {
      done(null, JSON.parse(text));
    } catch (err) {
      server.log.debug({ err }, 'Malformed JSON body');
      done(server.httpErrors.badRequest('Malformed JSON body'), undefined);
    }
  });

  server.setErrorHandler(errorHandler);

  if (!options.store) {
    await initializeDb();
  }

  server.decorate('clock', options.clock ?? systemClock);
  server.decorate('services', createServices(options.store, options.settings ?? settingsFromConfig()));

  // Register routes
  await server.register(healthRoutes, { prefix: '/api' });
  await server.register(weightPricingRoutes, { prefix: '/api' });
  await server.register(invoiceRoutes, { prefix: '/api' });
  await server.register(productionRoutes, { prefix: '/api' });

  return server;
}
