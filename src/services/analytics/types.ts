export type ComplianceTier = 'ok' | 'warn' | 'fail';

export interface ComplianceThresholds {
  /** Rates at or above this are `ok`. */
  ok: number;
  /** Rates at or above this (and below `ok`) are `warn`; anything lower is `fail`. */
  warn: number;
}

export interface CoverageSummary {
  total: number;
  covered: number;
  rate: number;
}

export interface CategoryCoverage extends CoverageSummary {
  category: string;
}

export interface ItemCoverage {
  itemCode: string;
  title: string;
  category: string;
  evidenceCount: number;
  covered: boolean;
}

export interface ComplianceCheck {
  category: string | null;
  overall: CoverageSummary;
  status: ComplianceTier;
  categories: CategoryCoverage[];
  items: ItemCoverage[];
}

export interface ReportPeriod {
  start: string;
  end: string;
}

export interface WindowedEvidence {
  id: number;
  itemCode: string;
  title: string;
  evidenceType: string;
  createdAt: string;
}

export interface AuditReport {
  period: ReportPeriod;
  totalRequirements: number;
  coveredInWindow: number;
  totalEvidenceInWindow: number;
  rate: number;
  recommendation: ComplianceTier;
  perCategory: Array<{ category: string; coveredCount: number }>;
  recentEvidence: WindowedEvidence[];
  generatedAt: string;
}
