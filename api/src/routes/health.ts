import type { FastifyInstance } from 'fastify';

import { API_VERSION } from './sharedSchemas.js';

export async function registerHealthRoutes(app: FastifyInstance) {
  app.get('/health', async (request) => {
    const { catalog, store, poller, storageDriver } = request.server.container;
    const items = await store.listAll();

    const catalogStatus: 'up' | 'down' = catalog.isReady && catalog.size > 0 ? 'up' : 'down';
    const status: 'ok' | 'degraded' = catalogStatus === 'up' ? 'ok' : 'degraded';

    return {
      status,
      catalog: {
        status: catalogStatus,
        ready: catalog.isReady,
        size: catalog.size,
      },
      subscriptions: {
        storage: storageDriver,
        location: store.location,
        items: items.length,
        subscribers: new Set(items.flatMap((item) => item.subscribers)).size,
      },
      poller: { ...poller.metrics },
      version: API_VERSION,
      generatedAt: new Date().toISOString(),
    };
  });
}
