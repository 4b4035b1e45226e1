import 'dotenv/config';
import { ZodError } from 'zod';
import { ValidationError } from '../utils/errors.js';
import { configSchema, type Config } from './validation.js';

export type { Config, StoreConfig, ComplianceConfig } from './validation.js';

type Env = Record<string, string | undefined>;

const int = (value: string | undefined): number | undefined =>
  value !== undefined && value !== '' ? Number.parseInt(value, 10) : undefined;

const float = (value: string | undefined): number | undefined =>
  value !== undefined && value !== '' ? Number.parseFloat(value) : undefined;

const text = (value: string | undefined): string | undefined =>
  value !== undefined && value !== '' ? value : undefined;

export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    server: {
      nodeEnv: text(env.NODE_ENV),
      port: int(env.PORT),
      host: text(env.HOST),
      logLevel: text(env.LOG_LEVEL),
    },
    store: {
      path: text(env.ISMS_DB_PATH),
      busyTimeoutMs: int(env.STORE_BUSY_TIMEOUT_MS),
      maxRetries: int(env.STORE_MAX_RETRIES),
      retryBaseDelayMs: int(env.STORE_RETRY_BASE_DELAY_MS),
      retryMaxDelayMs: int(env.STORE_RETRY_MAX_DELAY_MS),
      workers: int(env.STORE_WORKERS),
      searchIndex: env.SEARCH_INDEX_ENABLED !== undefined ? env.SEARCH_INDEX_ENABLED !== 'false' : undefined,
    },
    compliance: {
      okThreshold: float(env.COMPLIANCE_OK_THRESHOLD),
      warnThreshold: float(env.COMPLIANCE_WARN_THRESHOLD),
      reportEpoch: text(env.REPORT_EPOCH),
      recentEvidenceLimit: int(env.RECENT_EVIDENCE_LIMIT),
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationError(`Invalid configuration (${issues.join('; ')})`, issues);
    }
    throw error;
  }
}
