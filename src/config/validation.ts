import { z } from 'zod';

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const configSchema = z
  .object({
    server: z.object({
      nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
      port: z.number().int().positive().default(3000),
      host: z.string().min(1).default('127.0.0.1'),
      logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    }),
    store: z.object({
      path: z.string().min(1).default('./data/isms_p.db'),
      busyTimeoutMs: z.number().int().nonnegative().default(5000),
      maxRetries: z.number().int().nonnegative().default(5),
      retryBaseDelayMs: z.number().int().nonnegative().default(25),
      retryMaxDelayMs: z.number().int().positive().default(1000),
      workers: z.number().int().positive().default(4),
      searchIndex: z.boolean().default(true),
    }),
    compliance: z.object({
      okThreshold: z.number().min(0).max(100).default(80),
      warnThreshold: z.number().min(0).max(100).default(50),
      reportEpoch: isoDate.default('2020-01-01'),
      recentEvidenceLimit: z.number().int().positive().default(5),
    }),
  })
  .refine(c => c.compliance.warnThreshold <= c.compliance.okThreshold, {
    message: 'warn threshold must not exceed ok threshold',
    path: ['compliance', 'warnThreshold'],
  });

export type Config = z.infer<typeof configSchema>;
export type StoreConfig = Config['store'];
export type ComplianceConfig = Config['compliance'];
