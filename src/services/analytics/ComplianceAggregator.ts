import { logger } from '../../utils/logger.js';
import type { Connection, SqliteStore } from '../storage/SqliteStore.js';
import type { SchemaAdapter } from '../schema/SchemaAdapter.js';
import { CATALOG_RELATION, EVIDENCE_TABLE } from '../schema/sql.js';
import { DEFAULT_THRESHOLDS, classifyRate, complianceRate } from './rates.js';
import type {
  CategoryCoverage,
  ComplianceCheck,
  ComplianceThresholds,
  ComplianceTier,
  CoverageSummary,
  ItemCoverage,
} from './types.js';

const HAS_EVIDENCE = `EXISTS (SELECT 1 FROM ${EVIDENCE_TABLE} e WHERE e.item_code = r.item_code)`;

const TOTALS = `
  SELECT COUNT(*) AS total, COALESCE(SUM(${HAS_EVIDENCE}), 0) AS covered
  FROM ${CATALOG_RELATION} r
`;

const ITEMS = `
  SELECT r.item_code, r.title, r.category,
         (SELECT COUNT(*) FROM ${EVIDENCE_TABLE} e WHERE e.item_code = r.item_code) AS evidence_count
  FROM ${CATALOG_RELATION} r
`;

type CountRow = { total: number; covered: number };
type ItemRow = { item_code: string; title: string; category: string; evidence_count: number };

function summarize(db: Connection, category?: string): CoverageSummary {
  const row =
    category === undefined
      ? db.prepare<[], CountRow>(TOTALS).get()
      : db.prepare<[string], CountRow>(`${TOTALS} WHERE r.category = ?`).get(category);
  const total = row?.total ?? 0;
  const covered = row?.covered ?? 0;
  return { total, covered, rate: complianceRate(covered, total) };
}

function rollup(db: Connection): CategoryCoverage[] {
  return db
    .prepare<[], CountRow & { category: string }>(`
      SELECT r.category AS category, COUNT(*) AS total, SUM(${HAS_EVIDENCE}) AS covered
      FROM ${CATALOG_RELATION} r
      GROUP BY r.category
      ORDER BY r.category
    `)
    .all()
    .map(row => ({
      category: row.category,
      total: row.total,
      covered: row.covered,
      rate: complianceRate(row.covered, row.total),
    }));
}

function itemCoverage(db: Connection, category?: string): ItemCoverage[] {
  const rows =
    category === undefined
      ? db.prepare<[], ItemRow>(`${ITEMS} ORDER BY r.item_code`).all()
      : db.prepare<[string], ItemRow>(`${ITEMS} WHERE r.category = ? ORDER BY r.item_code`).all(category);
  return rows.map(row => ({
    itemCode: row.item_code,
    title: row.title,
    category: row.category,
    evidenceCount: row.evidence_count,
    covered: row.evidence_count > 0,
  }));
}

/**
 * Coverage counts recomputed from the store on every call; nothing is cached.
 * Each public method reads inside one transaction, so the figures it returns
 * describe a single snapshot.
 */
export class ComplianceAggregator {
  constructor(
    private readonly store: SqliteStore,
    private readonly schema: SchemaAdapter,
    private readonly thresholds: ComplianceThresholds = DEFAULT_THRESHOLDS
  ) {}

  async overall(category?: string): Promise<CoverageSummary> {
    await this.schema.requireCatalog();
    return this.store.read('compliance.overall', db => summarize(db, category));
  }

  async byCategory(): Promise<CategoryCoverage[]> {
    await this.schema.requireCatalog();
    return this.store.read('compliance.byCategory', db => rollup(db));
  }

  async items(category?: string): Promise<ItemCoverage[]> {
    await this.schema.requireCatalog();
    return this.store.read('compliance.items', db => itemCoverage(db, category));
  }

  classify(rate: number): ComplianceTier {
    return classifyRate(rate, this.thresholds);
  }

  /** Overall figures plus the per-category rollup, both narrowed to `category` when given. */
  async check(category?: string): Promise<ComplianceCheck> {
    await this.schema.requireCatalog();
    const snapshot = await this.store.read('compliance.check', db => ({
      overall: summarize(db, category),
      categories: rollup(db).filter(c => category === undefined || c.category === category),
      items: itemCoverage(db, category),
    }));

    logger.debug({ category, ...snapshot.overall }, 'Compliance check computed');
    return {
      category: category ?? null,
      overall: snapshot.overall,
      status: this.classify(snapshot.overall.rate),
      categories: snapshot.categories,
      items: snapshot.items,
    };
  }
}
