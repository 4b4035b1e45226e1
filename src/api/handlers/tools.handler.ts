import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ErrorKind } from '../../utils/errors.js';
import type { ToolDispatcher } from '../../services/tools/ToolDispatcher.js';
import type { ComplianceService } from '../../services/tools/ComplianceService.js';

interface ToolParams {
  name: string;
}

export const STATUS_BY_KIND: Record<ErrorKind, number> = {
  ValidationError: 400,
  NotFound: 404,
  SchemaMissing: 503,
  StorageError: 500,
};

export function createToolCallHandler(dispatcher: ToolDispatcher) {
  return async (request: FastifyRequest<{ Params: ToolParams; Body: unknown }>, reply: FastifyReply) => {
    const result = await dispatcher.call(request.params.name, request.body);
    if (!result.ok) {
      return reply.code(STATUS_BY_KIND[result.error.kind]).send({
        error: result.error.code,
        kind: result.error.kind,
        message: result.error.message,
      });
    }
    return reply.code(200).send(result);
  };
}

export function createToolListHandler(dispatcher: ToolDispatcher) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({ tools: dispatcher.listTools() });
  };
}

export function createHealthHandler(service: ComplianceService) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    const storeOk = service.store.testConnection();
    const resolution = service.schema.describe();
    const catalog = resolution?.ok ? resolution.source.probe : 'unavailable';

    return reply.code(200).send({
      status: storeOk && resolution?.ok ? 'ok' : 'degraded',
      store: storeOk,
      catalog,
      timestamp: new Date().toISOString(),
    });
  };
}
