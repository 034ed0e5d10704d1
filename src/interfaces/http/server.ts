import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { ExportMeta } from '../../infrastructure/mock/synthetic-export.js';
import exportRoutes from './export-routes.js';

export interface MockServerOptions {
  registry: ReadonlyMap<string, ExportMeta>;
  logLevel?: string | undefined;
  chunkLimit?: number | undefined;
}

/**
 * Builds the mock export service. Not started; callers `listen()` or,
 * in tests, `inject()`.
 */
export async function buildMockServer(options: MockServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logLevel ? { level: options.logLevel } : false,
  });

  await fastify.register(exportRoutes, {
    registry: options.registry,
    chunkLimit: options.chunkLimit,
  });

  fastify.get('/health', async () => ({ status: 'ok' }));

  return fastify;
}
