import crypto from 'node:crypto';

import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

export const API_VERSION = 'v1';

export const ADMIN_TOKEN_HEADER = 'x-admin-token';

export const errorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    traceId: z.string(),
    details: z.array(z.string()).optional(),
  }),
});

export const addressSchema = z.string().trim().min(3).max(256);

export const watchEntrySchema = z.object({
  appid: z.string(),
  name: z.string(),
  region: z.string(),
  lastPrice: z.number().nullable(),
  originalPrice: z.number().nullable(),
  discount: z.number().nullable(),
  currency: z.string().nullable(),
  purchaseUrl: z.string(),
});

export const dispatchSummarySchema = z.object({
  received: z.number().int(),
  sent: z.number().int(),
  skipped: z.number().int(),
  failed: z.number().int(),
});

export function sendError(
  reply: FastifyReply,
  statusCode: number,
  code: string,
  message: string,
  traceId: string,
  details?: string[],
) {
  return reply.status(statusCode).send({
    error: {
      code,
      message,
      traceId,
      ...(details ? { details } : {}),
    },
  });
}

/**
 * Admin routes need `x-admin-token` to match `ADMIN_TOKEN`. With no token
 * configured they are disabled outright. Returns false once it has replied.
 */
export function authorizeAdmin(request: FastifyRequest, reply: FastifyReply, traceId: string): boolean {
  const expected = request.server.container.config.adminToken;
  if (!expected) {
    sendError(reply, 403, 'admin_disabled', 'Admin routes are disabled; set ADMIN_TOKEN to enable them', traceId);
    return false;
  }
  const provided = request.headers[ADMIN_TOKEN_HEADER];
  if (typeof provided !== 'string' || !tokensMatch(provided, expected)) {
    sendError(reply, 401, 'unauthorized', 'Missing or invalid admin token', traceId);
    return false;
  }
  return true;
}

function tokensMatch(provided: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(provided).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}
