import { logger } from '../../utils/logger.js';
import { generateCallId } from '../../utils/uuid.js';
import { isCoreError, toStorageError, type ErrorKind } from '../../utils/errors.js';
import type { AuditReport, ComplianceCheck } from '../analytics/types.js';
import type { ComplianceService, GeneratedEvidence, RequirementDetail, SearchResult } from './ComplianceService.js';
import {
  TOOL_DESCRIPTORS,
  decodeToolRequest,
  type OperationName,
  type ToolDescriptor,
  type ToolRequest,
} from './ToolRequest.js';

export interface ToolResponses {
  search_requirements: SearchResult;
  get_requirement_detail: RequirementDetail;
  generate_evidence: GeneratedEvidence;
  check_compliance: ComplianceCheck;
  create_audit_report: AuditReport;
}

export interface ToolFailure {
  kind: ErrorKind;
  code: string;
  message: string;
}

export type ToolResult =
  | { [K in OperationName]: { ok: true; operation: K; data: ToolResponses[K] } }[OperationName]
  | { ok: false; operation: string; error: ToolFailure };

/**
 * Dispatch boundary between the transport and the core. Every failure,
 * expected or not, comes back as a `{ ok: false }` result.
 */
export class ToolDispatcher {
  constructor(private readonly service: ComplianceService) {}

  listTools(): readonly ToolDescriptor[] {
    return TOOL_DESCRIPTORS;
  }

  /** Decodes a raw invocation, then dispatches it. */
  async call(name: string, args: unknown): Promise<ToolResult> {
    let request: ToolRequest;
    try {
      request = decodeToolRequest(name, args);
    } catch (error) {
      return this.failure(name, error);
    }
    return this.dispatch(request);
  }

  async dispatch(request: ToolRequest): Promise<ToolResult> {
    const callId = generateCallId(request.operation);
    logger.debug({ callId, args: request.args }, 'Tool call started');
    try {
      const result = await this.execute(request);
      logger.debug({ callId }, 'Tool call finished');
      return result;
    } catch (error) {
      return this.failure(request.operation, error, callId);
    }
  }

  private async execute(request: ToolRequest): Promise<ToolResult> {
    switch (request.operation) {
      case 'search_requirements':
        return {
          ok: true,
          operation: request.operation,
          data: await this.service.searchRequirements(request.args.keyword),
        };
      case 'get_requirement_detail':
        return {
          ok: true,
          operation: request.operation,
          data: await this.service.getRequirementDetail(request.args.item_code),
        };
      case 'generate_evidence':
        return {
          ok: true,
          operation: request.operation,
          data: await this.service.generateEvidence(
            request.args.item_code,
            request.args.evidence_type,
            request.args.content
          ),
        };
      case 'check_compliance':
        return {
          ok: true,
          operation: request.operation,
          data: await this.service.checkCompliance(request.args.category),
        };
      case 'create_audit_report':
        return {
          ok: true,
          operation: request.operation,
          data: await this.service.createAuditReport({
            startDate: request.args.start_date,
            endDate: request.args.end_date,
          }),
        };
    }
  }

  private failure(operation: string, error: unknown, callId?: string): ToolResult {
    const coreError = isCoreError(error) ? error : toStorageError(error, operation);
    const log = { callId, operation, kind: coreError.kind, error };
    if (coreError.kind === 'StorageError') {
      logger.error(log, 'Tool call failed');
    } else {
      logger.info(log, 'Tool call rejected');
    }
    return {
      ok: false,
      operation,
      error: { kind: coreError.kind, code: coreError.code, message: coreError.message },
    };
  }
}
