import { loadConfig, type Config } from './config/index.js';
import { logger } from './utils/logger.js';
import { ComplianceService } from './services/tools/ComplianceService.js';
import { buildServer } from './api/server.js';

let config: Config;
try {
  config = loadConfig();
} catch (error) {
  console.error(`\n❌ ${error instanceof Error ? error.message : String(error)}\n`);
  console.error('Check .env and compare with .env.example\n');
  process.exit(1);
}

logger.info('Initializing services...');

const service = ComplianceService.open(config);
await service.schema.ensureSchema();

const fastify = await buildServer(service);

const shutdown = async (signal: string) => {
  logger.info({ signal }, 'Shutting down');
  await fastify.close();
  await service.close();
  process.exit(0);
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch(error => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

try {
  await fastify.listen({ port: config.server.port, host: config.server.host });
  logger.info({ port: config.server.port, db: config.store.path }, 'Server listening');
} catch (error) {
  logger.error({ error }, 'Failed to start server');
  await service.close();
  process.exit(1);
}
