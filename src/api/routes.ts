import type { FastifyInstance } from 'fastify';
import { createHealthHandler, createToolCallHandler, createToolListHandler } from './handlers/tools.handler.js';
import { healthResponseSchema, toolListResponseSchema, toolParamsSchema } from './schemas/tools.schema.js';
import type { ComplianceService } from '../services/tools/ComplianceService.js';
import type { ToolDispatcher } from '../services/tools/ToolDispatcher.js';

export async function registerRoutes(
  fastify: FastifyInstance,
  service: ComplianceService,
  dispatcher: ToolDispatcher
) {
  fastify.get('/health', {
    schema: {
      response: { 200: healthResponseSchema },
    },
    handler: createHealthHandler(service),
  });

  fastify.get('/tools', {
    schema: {
      response: { 200: toolListResponseSchema },
    },
    handler: createToolListHandler(dispatcher),
  });

  fastify.post('/tools/:name', {
    schema: {
      params: toolParamsSchema,
    },
    handler: createToolCallHandler(dispatcher),
  });
}
