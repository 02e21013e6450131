import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { authorizeAdmin, dispatchSummarySchema, errorResponseSchema } from './sharedSchemas.js';

const pollPayloadSchema = z
  .object({
    wait: z.boolean().default(false),
  })
  .default({});

const pollStartedSchema = z.object({
  status: z.literal('started'),
  traceId: z.string(),
});

const pollFinishedSchema = z.object({
  status: z.literal('finished'),
  summary: dispatchSummarySchema,
  traceId: z.string(),
});

const refreshResponseSchema = z.object({
  outcome: z.discriminatedUnion('status', [
    z.object({ status: z.literal('synced'), entries: z.number().int(), pages: z.number().int(), collisions: z.number().int() }),
    z.object({ status: z.literal('failed'), reason: z.string(), source: z.enum(['memory', 'snapshot', 'empty']) }),
  ]),
  catalogSize: z.number().int(),
  traceId: z.string(),
});

export async function registerAdminRoutes(app: FastifyInstance) {
  app.post(
    '/poll',
    {
      schema: {
        body: pollPayloadSchema,
        response: {
          200: pollFinishedSchema,
          202: pollStartedSchema,
          401: errorResponseSchema,
          403: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const traceId = String(request.id);
      reply.header('x-trace-id', traceId);
      if (!authorizeAdmin(request, reply, traceId)) {
        return reply;
      }

      const { wait } = pollPayloadSchema.parse(request.body);
      const { watch } = request.server.container;
      if (wait) {
        const summary = await watch.forcePoll();
        return reply.status(200).send({ status: 'finished', summary, traceId });
      }
      void watch.forcePoll().catch((error: unknown) => {
        request.log.error({ err: error }, 'forced price check failed');
      });
      return reply.status(202).send({ status: 'started', traceId });
    },
  );

  app.post(
    '/catalog/refresh',
    {
      schema: {
        response: {
          200: refreshResponseSchema,
          401: errorResponseSchema,
          403: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const traceId = String(request.id);
      reply.header('x-trace-id', traceId);
      if (!authorizeAdmin(request, reply, traceId)) {
        return reply;
      }

      const { container } = request.server;
      const outcome = await container.refreshCatalog();
      request.log.info({ outcome }, 'app list refresh finished');
      return reply.status(200).send({ outcome, catalogSize: container.catalog.size, traceId });
    },
  );
}
