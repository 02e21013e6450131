import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';

// Health probes run every few seconds; keep them out of the info log.
const QUIET_ROUTES = new Set(['/api/health']);

export const requestLoggingPlugin: FastifyPluginAsync = fp(async (app) => {
  app.addHook('onRequest', async (request) => {
    const level = QUIET_ROUTES.has(request.url) ? 'debug' : 'info';
    request.log[level]({ reqId: request.id, method: request.method, url: request.url }, 'request received');
  });

  app.addHook('onResponse', async (request, reply) => {
    const level = QUIET_ROUTES.has(request.url) ? 'debug' : 'info';
    request.log[level](
      {
        reqId: request.id,
        statusCode: reply.statusCode,
        durationMs: Math.round(reply.elapsedTime),
      },
      'request completed',
    );
  });
});
