import 'reflect-metadata';
import { serve } from '@hono/node-server';
import { swaggerUI } from '@hono/swagger-ui';
import { OpenAPIHono } from '@hono/zod-openapi';
import type { Redis } from 'ioredis';
import { env } from '@/core/env';
import { logger } from '@/core/logger';
import { DependencyContainer } from './core/dep';
import { RedisDeps } from './infra/redis/redis.dep';
import { registerRedisDeps } from './infra/redis/redis-conn';
import { registerEventDeps, registerEventRoutes, stopEventStream } from './modules/events/events.registry';
import { registerHealthDeps, registerHealthRoutes } from './modules/health/health.registry';
import { registerIngestDeps, startPolling, stopPolling } from './modules/ingest/ingest.registry';
import { drainPushQueue, registerWebhookDeps, registerWebhookRoutes } from './modules/webhooks/webhooks.registry';
import { corsMiddleware } from './view/middleware/cors.middleware';

// Init
//

logger.info(`Starting up in ${env.NODE_ENV} mode`);

const dep = new DependencyContainer();
const app = new OpenAPIHono();

// Dependencies
//

const redisEnabled = registerRedisDeps(dep);
registerEventDeps(dep, { redisEnabled });
registerIngestDeps(dep);
registerWebhookDeps(dep);
registerHealthDeps(dep);

// Middleware
//

if (env.CORS === 1) {
  app.use(corsMiddleware);
}

// Routes
//

app.get('/', (c) =>
  c.json({
    service: 'status-relay',
    status: 'running',
    timestamp: new Date().toISOString(),
    endpoints: {
      incidentIo: '/webhook/incident-io',
      generic: '/webhook/generic/{provider}',
      stream: '/incidents/stream',
      health: '/api/health/ping',
      stats: '/api/health/stats',
    },
  }),
);
registerWebhookRoutes(app, dep);
registerEventRoutes(app, dep);
registerHealthRoutes(app, dep);

// Swagger
//

if (env.SWAGGER === 1) {
  app.doc('/api/docs', {
    openapi: '3.0.0',
    info: {
      version: '1.0.0',
      title: 'Status Relay',
    },
  });
  app.get('/api-docs', swaggerUI({ url: '/api/docs' }));
}

// Server
//

const server = serve(
  {
    fetch: app.fetch,
    hostname: env.HOST,
    port: env.PORT,
  },
  (info) => {
    logger.info(`Server is running at http://${env.HOST}:${info.port}`);
  },
);

// Background Services
//

startPolling(dep);

// Shutdown
//

let isShuttingDown = false;

const closeServer = async (): Promise<void> => {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
  logger.debug('HTTP server closed');
};

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  if (isShuttingDown) {
    return;
  }

  isShuttingDown = true;
  logger.info({ signal }, 'Signal received, shutting down');

  const forceTimer = setTimeout(() => process.exit(1), 10000).unref();

  // SSE connections never end on their own, so they go before the server close.
  try {
    stopEventStream(dep);
  } catch (error) {
    logger.warn({ error }, 'Failed to stop event stream');
  }

  try {
    await closeServer();
  } catch (error) {
    logger.warn({ error }, 'Failed to close HTTP server');
  }

  const [polling, pushQueue] = await Promise.allSettled([stopPolling(dep), drainPushQueue(dep)]);
  if (polling.status === 'rejected') {
    logger.warn({ error: polling.reason }, 'Failed to stop feed poller');
  }
  if (pushQueue.status === 'rejected') {
    logger.warn({ error: pushQueue.reason }, 'Failed to drain push queue');
  }

  if (redisEnabled) {
    try {
      await dep.get<Redis>(RedisDeps.Client).quit();
      logger.debug('Redis client closed');
    } catch (error) {
      logger.warn({ error }, 'Failed to close Redis client');
    }
  }

  clearTimeout(forceTimer);
  process.exit(0);
};

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
