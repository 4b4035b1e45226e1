import { setTimeout as sleep } from 'timers/promises';
import { sqliteCode } from '../../utils/errors.js';

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryHooks {
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
  wait?: (delayMs: number) => Promise<unknown>;
}

const CONTENTION_CODES = new Set([
  'SQLITE_BUSY',
  'SQLITE_BUSY_SNAPSHOT',
  'SQLITE_BUSY_RECOVERY',
  'SQLITE_BUSY_TIMEOUT',
  'SQLITE_LOCKED',
  'SQLITE_LOCKED_SHAREDCACHE',
]);

export function isContention(error: unknown): boolean {
  const code = sqliteCode(error);
  return code !== undefined && CONTENTION_CODES.has(code);
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
}

/**
 * Runs `fn`, retrying lock contention up to `maxRetries` times with
 * exponential backoff. Any other failure, or the last contention failure,
 * is rethrown as-is.
 */
export async function withRetry<T>(
  fn: () => T,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<T> {
  const wait = hooks.wait ?? sleep;
  for (let attempt = 0; ; attempt++) {
    try {
      return fn();
    } catch (error) {
      if (!isContention(error) || attempt >= policy.maxRetries) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, policy);
      hooks.onRetry?.(attempt + 1, delayMs, error);
      await wait(delayMs);
    }
  }
}
