import type { FastifyInstance } from 'fastify';
import type { KeySourceCache } from '../auth/keySourceCache.js';

export interface ServiceInfo {
  service: string;
  tenantId: string | null;
  clientId: string | null;
}

interface RegisterHealthRouteOptions {
  keyCache: Pick<KeySourceCache, 'isFresh' | 'getSnapshot' | 'refresh'>;
  info: ServiceInfo;
}

export async function registerHealthRoute(app: FastifyInstance, options: RegisterHealthRouteOptions) {
  const { keyCache, info } = options;

  const health = async () => ({
    status: 'healthy' as const,
    service: info.service,
    timestamp: new Date().toISOString(),
    tenant_id: info.tenantId,
    client_id: info.clientId,
  });

  app.get('/', health);
  app.get('/health', health);

  // Readiness probe: ready once a fresh key set is held or can be fetched
  app.get('/ready', async (request, reply) => {
    if (!keyCache.isFresh()) {
      const refreshed = await keyCache.refresh();
      if (!refreshed.ok) {
        reply.code(503);
        return { status: 'not-ready', error: refreshed.error.reason } as const;
      }
    }
    const snapshot = keyCache.getSnapshot();
    reply.code(200);
    return {
      status: 'ready',
      keys: snapshot ? snapshot.keys.size : 0,
      keysExpireAt: snapshot ? new Date(snapshot.expiresAt).toISOString() : null,
    } as const;
  });
}
