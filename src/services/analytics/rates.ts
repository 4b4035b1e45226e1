import type { ComplianceThresholds, ComplianceTier } from './types.js';

export const DEFAULT_THRESHOLDS: ComplianceThresholds = { ok: 80, warn: 50 };

/** covered/total as a percentage with one decimal; 0 when there is nothing to cover. */
export function complianceRate(covered: number, total: number): number {
  if (total <= 0) return 0;
  const rate = Math.round((covered / total) * 1000) / 10;
  return Math.min(100, Math.max(0, rate));
}

export function classifyRate(rate: number, thresholds: ComplianceThresholds = DEFAULT_THRESHOLDS): ComplianceTier {
  if (rate >= thresholds.ok) return 'ok';
  if (rate >= thresholds.warn) return 'warn';
  return 'fail';
}
