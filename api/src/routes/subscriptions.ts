import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';

import { parseSubscriberAddress } from '../../../subscriptions/subscriber_address.js';
import { formatWatchList, type CommandFailure } from '../services/watchService.js';
import {
  addressSchema,
  authorizeAdmin,
  errorResponseSchema,
  sendError,
  watchEntrySchema,
} from './sharedSchemas.js';

const commandPayloadSchema = z.object({
  query: z.string().trim().min(1).max(200),
  address: addressSchema,
});

const listQuerySchema = z.object({
  address: addressSchema,
});

const subscribeResponseSchema = z.object({
  appid: z.string(),
  name: z.string(),
  alreadySubscribed: z.boolean(),
  message: z.string(),
  traceId: z.string(),
});

const unsubscribeResponseSchema = z.object({
  appid: z.string(),
  name: z.string(),
  itemRemoved: z.boolean(),
  message: z.string(),
  traceId: z.string(),
});

const listResponseSchema = z.object({
  address: z.string(),
  subscriptions: z.array(watchEntrySchema),
  message: z.string(),
  traceId: z.string(),
});

const listAllResponseSchema = z.object({
  items: z.array(watchEntrySchema.extend({ subscribers: z.array(z.string()), subscriberLabels: z.array(z.string()) })),
  traceId: z.string(),
});

const FAILURE_STATUS: Record<CommandFailure['kind'], { statusCode: number; code: string }> = {
  invalid: { statusCode: 400, code: 'invalid_request' },
  not_found: { statusCode: 404, code: 'game_not_found' },
  unavailable: { statusCode: 503, code: 'catalog_unavailable' },
};

export async function registerSubscriptionRoutes(app: FastifyInstance) {
  app.post(
    '/subscriptions',
    {
      schema: {
        body: commandPayloadSchema,
        response: {
          200: subscribeResponseSchema,
          201: subscribeResponseSchema,
          400: errorResponseSchema,
          404: errorResponseSchema,
          503: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const traceId = String(request.id);
      reply.header('x-trace-id', traceId);

      const body = commandPayloadSchema.parse(request.body);
      const result = await request.server.container.watch.subscribe(body.query, body.address);
      if (result.kind !== 'subscribed') {
        return sendFailure(reply, result, traceId);
      }
      const { appid, name, alreadySubscribed, message } = result;
      return reply.status(alreadySubscribed ? 200 : 201).send({ appid, name, alreadySubscribed, message, traceId });
    },
  );

  app.delete(
    '/subscriptions',
    {
      schema: {
        body: commandPayloadSchema,
        response: {
          200: unsubscribeResponseSchema,
          400: errorResponseSchema,
          404: errorResponseSchema,
          503: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const traceId = String(request.id);
      reply.header('x-trace-id', traceId);

      const body = commandPayloadSchema.parse(request.body);
      const result = await request.server.container.watch.unsubscribe(body.query, body.address);
      if (result.kind !== 'unsubscribed') {
        return sendFailure(reply, result, traceId);
      }
      const { appid, name, itemRemoved, message } = result;
      return reply.status(200).send({ appid, name, itemRemoved, message, traceId });
    },
  );

  app.get(
    '/subscriptions',
    {
      schema: {
        querystring: listQuerySchema,
        response: {
          200: listResponseSchema,
          400: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const traceId = String(request.id);
      reply.header('x-trace-id', traceId);

      const { address } = listQuerySchema.parse(request.query);
      if (parseSubscriberAddress(address).kind === 'unknown') {
        return sendError(reply, 400, 'invalid_request', `Unrecognized subscriber address "${address}".`, traceId);
      }
      const subscriptions = await request.server.container.watch.list(address);
      return reply.status(200).send({ address, subscriptions, message: formatWatchList(subscriptions), traceId });
    },
  );

  app.get(
    '/subscriptions/all',
    {
      schema: {
        response: {
          200: listAllResponseSchema,
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
      const items = await request.server.container.watch.listAll();
      return reply.status(200).send({ items, traceId });
    },
  );
}

function sendFailure(reply: FastifyReply, failure: CommandFailure, traceId: string) {
  const { statusCode, code } = FAILURE_STATUS[failure.kind];
  return sendError(reply, statusCode, code, failure.message, traceId);
}
