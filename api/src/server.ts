import Fastify, { type FastifyError } from 'fastify';
import { ZodError } from 'zod';
import { type ZodTypeProvider, validatorCompiler, serializerCompiler } from 'fastify-type-provider-zod';
import { fileURLToPath } from 'node:url';

import { loadConfig } from './config.js';
import { buildContainer, type ContainerDeps } from './container.js';
import { requestLoggingPlugin } from './plugins/requestLogging.js';
import { registerAdminRoutes } from './routes/admin.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerSubscriptionRoutes } from './routes/subscriptions.js';

export type CreateServerOptions = {
  env?: NodeJS.ProcessEnv;
  deps?: ContainerDeps;
};

export async function createServer(options: CreateServerOptions = {}) {
  const config = loadConfig(options.env);
  const container = await buildContainer({ config, deps: options.deps });

  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  })
    .withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.decorate('container', container);

  app.setErrorHandler((error: unknown, request, reply) => {
    const traceId = String(request.id);
    if (error instanceof ZodError) {
      const details = error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
      reply.header('x-trace-id', traceId);
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_FAILED',
          message: 'One or more parameters are invalid',
          details,
          traceId,
        },
      });
    }

    const fastifyError = isFastifyError(error) ? error : null;
    const statusCode = fastifyError?.statusCode ?? 500;
    const normalizedStatus = statusCode >= 400 && statusCode < 600 ? statusCode : 500;
    const message = fastifyError && fastifyError.message.length > 0 ? fastifyError.message : 'Unexpected error';
    if (normalizedStatus >= 500) {
      request.log.error({ err: error }, 'unhandled error');
    } else {
      request.log.warn({ err: error }, 'request rejected');
    }
    reply.header('x-trace-id', traceId);
    return reply.status(normalizedStatus).send({
      error: {
        code: normalizedStatus >= 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST',
        message,
        traceId,
      },
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const traceId = String(request.id);
    reply.header('x-trace-id', traceId);
    return reply.status(404).send({
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.raw.url ?? request.url} not found`,
        traceId,
      },
    });
  });

  app.addHook('onClose', async () => {
    await container.close();
  });

  await app.register(requestLoggingPlugin);
  await app.register(async (router) => {
    await registerHealthRoutes(router);
    await registerSubscriptionRoutes(router);
    await registerAdminRoutes(router);
  }, { prefix: '/api' });

  return app;
}

function isFastifyError(error: unknown): error is FastifyError {
  return error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number';
}

async function start() {
  const app = await createServer();
  const { config } = app.container;
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Listening on http://${config.host}:${config.port}`);
    app.container.start();
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info(`Received ${signal}, closing`);
      void app.close().then(undefined, (error: unknown) => {
        app.log.error({ err: error }, 'Failed to close cleanly');
        process.exitCode = 1;
      });
    });
  }
}

const isEntryPoint = process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1];

if (isEntryPoint) {
  void start().catch((error: unknown) => {
    console.error('Server failed to start:', error);
    process.exit(1);
  });
}
