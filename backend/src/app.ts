import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { KeySourceCache } from './auth/keySourceCache.js';
import { buildAuthHook, type TokenVerifier } from './middleware/auth.js';
import { recordHttpRequest } from './metrics/prometheus.js';
import { registerHealthRoute, type ServiceInfo } from './routes/health.js';
import { registerPrometheusMetricsRoute } from './routes/metricsExporter.js';
import { registerProtectedRoutes } from './routes/protected.js';

export interface BuildAppOptions {
  logger: FastifyBaseLogger;
  validator: TokenVerifier;
  keyCache: Pick<KeySourceCache, 'isFresh' | 'getSnapshot' | 'refresh'>;
  publicPaths: string[];
  info: ServiceInfo;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger });
  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Authorization', 'Content-Type'],
    exposedHeaders: ['x-request-id', 'WWW-Authenticate'],
  });

  app.addHook('onRequest', async (request, reply) => {
    // Propagate request identifier to clients for easier debugging/correlation
    reply.header('x-request-id', request.id);
  });

  app.addHook('onRequest', buildAuthHook({ validator: options.validator, publicPaths: options.publicPaths }));

  await registerHealthRoute(app, { keyCache: options.keyCache, info: options.info });
  await registerProtectedRoutes(app);
  await registerPrometheusMetricsRoute(app);

  // Collect basic HTTP metrics
  app.addHook('onResponse', async (request, reply) => {
    const routePath = request.routeOptions.url ?? 'unmatched';
    recordHttpRequest({ method: request.method.toUpperCase(), route: routePath, status: reply.statusCode }, reply.elapsedTime);
  });

  return app;
}
