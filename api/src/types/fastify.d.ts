import type { AppContainer } from '../container.js';

// Decorated once in createServer; route handlers reach services through it.
declare module 'fastify' {
  interface FastifyInstance {
    container: AppContainer;
  }
}
