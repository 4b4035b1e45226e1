import { logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import type { SqliteStore } from '../storage/SqliteStore.js';
import type { SchemaAdapter } from '../schema/SchemaAdapter.js';
import { CATALOG_RELATION, EVIDENCE_TABLE } from '../schema/sql.js';
import { DEFAULT_THRESHOLDS, classifyRate, complianceRate } from './rates.js';
import type { AuditReport, ComplianceThresholds, ReportPeriod } from './types.js';

export interface ReportWindow {
  startDate?: string;
  endDate?: string;
}

export interface ReportOptions {
  thresholds?: ComplianceThresholds;
  /** Window start used when the caller gives none. */
  epoch?: string;
  recentLimit?: number;
  clock?: () => Date;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function parseReportDate(value: string, field: string): string {
  const parsed = new Date(`${value}T00:00:00Z`);
  if (!DATE_PATTERN.test(value) || Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== value) {
    throw new ValidationError(`${field} must be a calendar date in YYYY-MM-DD form, got '${value}'`, { field, value });
  }
  return value;
}

// Timestamps are ISO-8601, so their first ten characters compare as dates.
const IN_WINDOW = `substr(e.created_at, 1, 10) BETWEEN @start AND @end`;

/** Evidence activity inside an inclusive date window, joined to the catalog. */
export class AuditReportBuilder {
  private readonly thresholds: ComplianceThresholds;
  private readonly epoch: string;
  private readonly recentLimit: number;
  private readonly clock: () => Date;

  constructor(
    private readonly store: SqliteStore,
    private readonly schema: SchemaAdapter,
    options: ReportOptions = {}
  ) {
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    this.epoch = options.epoch ?? '2020-01-01';
    this.recentLimit = options.recentLimit ?? 10;
    this.clock = options.clock ?? (() => new Date());
  }

  resolvePeriod(window: ReportWindow = {}): ReportPeriod {
    const start = window.startDate !== undefined ? parseReportDate(window.startDate, 'start_date') : this.epoch;
    const end =
      window.endDate !== undefined
        ? parseReportDate(window.endDate, 'end_date')
        : this.clock().toISOString().slice(0, 10);
    if (start > end) {
      throw new ValidationError(`start_date ${start} is after end_date ${end}`, { start, end });
    }
    return { start, end };
  }

  async build(window: ReportWindow = {}): Promise<AuditReport> {
    const period = this.resolvePeriod(window);
    await this.schema.requireCatalog();

    const report = await this.store.read('report.build', db => {
      const params = { start: period.start, end: period.end };

      const totals = db
        .prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${CATALOG_RELATION}`)
        .get();

      const windowed = db
        .prepare<[typeof params], { covered: number; evidence: number }>(`
          SELECT COUNT(DISTINCT e.item_code) AS covered, COUNT(e.id) AS evidence
          FROM ${EVIDENCE_TABLE} e
          JOIN ${CATALOG_RELATION} r ON r.item_code = e.item_code
          WHERE ${IN_WINDOW}
        `)
        .get(params);

      const perCategory = db
        .prepare<[typeof params], { category: string; covered_count: number }>(`
          SELECT r.category AS category,
                 COUNT(DISTINCT CASE WHEN e.id IS NOT NULL THEN r.item_code END) AS covered_count
          FROM ${CATALOG_RELATION} r
          LEFT JOIN ${EVIDENCE_TABLE} e ON e.item_code = r.item_code AND ${IN_WINDOW}
          GROUP BY r.category
          ORDER BY r.category
        `)
        .all(params);

      const recent = db
        .prepare<[typeof params & { limit: number }], {
          id: number;
          item_code: string;
          title: string;
          evidence_type: string;
          created_at: string;
        }>(`
          SELECT e.id, e.item_code, r.title, e.evidence_type, e.created_at
          FROM ${EVIDENCE_TABLE} e
          JOIN ${CATALOG_RELATION} r ON r.item_code = e.item_code
          WHERE ${IN_WINDOW}
          ORDER BY e.created_at DESC, e.id ASC
          LIMIT @limit
        `)
        .all({ ...params, limit: this.recentLimit });

      return {
        totalRequirements: totals?.total ?? 0,
        coveredInWindow: windowed?.covered ?? 0,
        totalEvidenceInWindow: windowed?.evidence ?? 0,
        perCategory: perCategory.map(row => ({ category: row.category, coveredCount: row.covered_count })),
        recentEvidence: recent.map(row => ({
          id: row.id,
          itemCode: row.item_code,
          title: row.title,
          evidenceType: row.evidence_type,
          createdAt: row.created_at,
        })),
      };
    });

    const rate = complianceRate(report.coveredInWindow, report.totalRequirements);
    logger.debug({ period, rate }, 'Audit report built');
    return {
      period,
      ...report,
      rate,
      recommendation: classifyRate(rate, this.thresholds),
      generatedAt: this.clock().toISOString(),
    };
  }
}
