import Fastify, { type FastifyInstance } from 'fastify';
import { logger } from '../utils/logger.js';
import { registerRoutes } from './routes.js';
import { ToolDispatcher } from '../services/tools/ToolDispatcher.js';
import type { ComplianceService } from '../services/tools/ComplianceService.js';

export async function buildServer(service: ComplianceService): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: false });

  fastify.addHook('onResponse', async (request, reply) => {
    logger.debug({ method: request.method, url: request.url, statusCode: reply.statusCode }, 'Request completed');
  });

  await registerRoutes(fastify, service, new ToolDispatcher(service));
  return fastify;
}
