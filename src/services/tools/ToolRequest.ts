import { z } from 'zod';
import { NotFoundError, ValidationError } from '../../utils/errors.js';

const requiredText = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .refine(value => value.trim().length > 0, `${field} is required`);

const optionalText = (field: string) =>
  z
    .string({ invalid_type_error: `${field} must be a string` })
    .optional()
    .nullable()
    .transform(value => (value === undefined || value === null || value.trim() === '' ? undefined : value.trim()));

export const toolArgumentSchemas = {
  search_requirements: z.object({
    // passed through untrimmed: surrounding spaces are part of the search text
    keyword: z
      .string({ required_error: 'keyword is required', invalid_type_error: 'keyword must be a string' })
      .min(1, 'keyword is required'),
  }),
  get_requirement_detail: z.object({
    item_code: requiredText('item_code'),
  }),
  generate_evidence: z.object({
    item_code: requiredText('item_code'),
    evidence_type: requiredText('evidence_type'),
    content: requiredText('content'),
  }),
  check_compliance: z.object({
    category: optionalText('category'),
  }),
  create_audit_report: z.object({
    start_date: optionalText('start_date'),
    end_date: optionalText('end_date'),
  }),
};

export type OperationName = keyof typeof toolArgumentSchemas;

export type ToolArguments<K extends OperationName> = z.output<(typeof toolArgumentSchemas)[K]>;

export type ToolRequest = {
  [K in OperationName]: { operation: K; args: ToolArguments<K> };
}[OperationName];

export function isOperationName(name: string): name is OperationName {
  return Object.prototype.hasOwnProperty.call(toolArgumentSchemas, name);
}

function parseArgs<S extends z.ZodTypeAny>(operation: string, schema: S, args: unknown): z.output<S> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => issue.message);
    throw new ValidationError(`Invalid arguments for ${operation}: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/** Turns an operation name and a loose argument bag into a typed request. */
export function decodeToolRequest(name: string, args: unknown): ToolRequest {
  if (!isOperationName(name)) {
    throw new NotFoundError(`Unknown operation: ${name}`, { operation: name });
  }

  switch (name) {
    case 'search_requirements':
      return { operation: name, args: parseArgs(name, toolArgumentSchemas.search_requirements, args) };
    case 'get_requirement_detail':
      return { operation: name, args: parseArgs(name, toolArgumentSchemas.get_requirement_detail, args) };
    case 'generate_evidence':
      return { operation: name, args: parseArgs(name, toolArgumentSchemas.generate_evidence, args) };
    case 'check_compliance':
      return { operation: name, args: parseArgs(name, toolArgumentSchemas.check_compliance, args) };
    case 'create_audit_report':
      return { operation: name, args: parseArgs(name, toolArgumentSchemas.create_audit_report, args) };
  }
}

export interface ToolDescriptor {
  name: OperationName;
  description: string;
  params: Array<{ name: string; required: boolean; description: string }>;
}

export const TOOL_DESCRIPTORS: readonly ToolDescriptor[] = [
  {
    name: 'search_requirements',
    description: 'Case-insensitive substring search over requirement title, description, requirement text and category',
    params: [{ name: 'keyword', required: true, description: 'Text to look for, e.g. 접근권한, 로그, 암호' }],
  },
  {
    name: 'get_requirement_detail',
    description: 'One requirement with its most recent evidence records',
    params: [{ name: 'item_code', required: true, description: 'Item code such as 1.1.1 or 2.3.1' }],
  },
  {
    name: 'generate_evidence',
    description: 'Records a completed evidence entry for a requirement',
    params: [
      { name: 'item_code', required: true, description: 'Item code the evidence supports' },
      { name: 'evidence_type', required: true, description: 'Kind of evidence: document, log, screenshot, ...' },
      { name: 'content', required: true, description: 'Evidence content or description' },
    ],
  },
  {
    name: 'check_compliance',
    description: 'Coverage counts and rates, overall and per category',
    params: [{ name: 'category', required: false, description: 'Restrict the check to one category' }],
  },
  {
    name: 'create_audit_report',
    description: 'Evidence activity report for an inclusive date window',
    params: [
      { name: 'start_date', required: false, description: 'YYYY-MM-DD, defaults to the report epoch' },
      { name: 'end_date', required: false, description: 'YYYY-MM-DD, defaults to today (UTC)' },
    ],
  },
];
