import { buildExports, EXPORT_SPECS, loadConfig } from './infrastructure/index.js';
import { buildMockServer } from './interfaces/http/server.js';

/**
 * Local stand-in for the export service, serving deterministic
 * synthetic exports (demo, small, large).
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const registry = buildExports(EXPORT_SPECS);

  const fastify = await buildMockServer({ registry, logLevel: config.logLevel });

  const shutdown = (): void => {
    fastify.log.info('Shutting down mock export server...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await fastify.listen({ host: config.mockServer.host, port: config.mockServer.port });
  fastify.log.info(
    { exports: [...registry.keys()], downloads: [...registry.values()].map((e) => e.downloads.size) },
    'Mock export server ready',
  );
}

main().catch((err: unknown) => {
  console.error('Fatal: mock export server failed to start', err);
  process.exit(1);
});
