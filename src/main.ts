import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createDocumentPipeline } from './pipeline/factory.js';
import { createServer } from './server.js';

async function start() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: config.env === 'development' });

  const { service } = createDocumentPipeline(config, logger);
  const app = await createServer({ service, logger, corsDev: config.server.corsDev });

  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info({
    port: config.server.port,
    backends: (await service.stats()).backends,
    maxConcurrentRuns: config.worker.maxConcurrentRuns,
  }, 'Document pipeline started');

  // Graceful shutdown
  const signals = ['SIGINT', 'SIGTERM'] as const;
  for (const signal of signals) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      );
    });
  }
}

start().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
