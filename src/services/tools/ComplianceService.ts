import type { Config } from '../../config/index.js';
import type { Requirement } from '../../domain/entities/Requirement.js';
import type { Evidence, EvidenceStatus } from '../../domain/entities/Evidence.js';
import { SqliteStore } from '../storage/SqliteStore.js';
import { SchemaAdapter } from '../schema/SchemaAdapter.js';
import { RequirementCatalog } from '../catalog/RequirementCatalog.js';
import { CatalogProvisioner } from '../catalog/CatalogProvisioner.js';
import { EvidenceStore } from '../evidence/EvidenceStore.js';
import { KeywordSearch } from '../search/KeywordSearch.js';
import { ComplianceAggregator } from '../analytics/ComplianceAggregator.js';
import { AuditReportBuilder, type ReportWindow } from '../analytics/AuditReportBuilder.js';
import type { AuditReport, ComplianceCheck } from '../analytics/types.js';

export interface SearchResult {
  keyword: string;
  count: number;
  requirements: Requirement[];
}

export interface RequirementDetail {
  requirement: Requirement;
  evidence: Evidence[];
  evidenceCount: number;
}

export interface GeneratedEvidence {
  id: number;
  itemCode: string;
  title: string;
  evidenceType: string;
  content: string;
  status: EvidenceStatus;
  createdAt: string;
}

export interface ServiceOptions {
  clock?: () => Date;
}

/**
 * The storage/aggregation core behind the five tool operations. Each
 * component runs the schema adapter before touching the store.
 */
export class ComplianceService {
  readonly schema: SchemaAdapter;
  readonly catalog: RequirementCatalog;
  readonly provisioner: CatalogProvisioner;
  readonly evidence: EvidenceStore;
  readonly search: KeywordSearch;
  readonly aggregator: ComplianceAggregator;
  readonly reports: AuditReportBuilder;
  private readonly recentEvidenceLimit: number;

  constructor(
    readonly store: SqliteStore,
    compliance: Config['compliance'],
    options: ServiceOptions = {}
  ) {
    const clock = options.clock ?? (() => new Date());
    const thresholds = { ok: compliance.okThreshold, warn: compliance.warnThreshold };

    this.schema = new SchemaAdapter(store);
    this.catalog = new RequirementCatalog(store, this.schema);
    this.provisioner = new CatalogProvisioner(store, this.schema, clock);
    this.evidence = new EvidenceStore(store, this.schema, clock);
    this.search = new KeywordSearch(store, this.schema);
    this.aggregator = new ComplianceAggregator(store, this.schema, thresholds);
    this.reports = new AuditReportBuilder(store, this.schema, {
      thresholds,
      epoch: compliance.reportEpoch,
      clock,
    });
    this.recentEvidenceLimit = compliance.recentEvidenceLimit;
  }

  static open(config: Pick<Config, 'store' | 'compliance'>, options: ServiceOptions = {}): ComplianceService {
    return new ComplianceService(new SqliteStore(config.store), config.compliance, options);
  }

  async searchRequirements(keyword: string): Promise<SearchResult> {
    const requirements = await this.search.search(keyword);
    return { keyword, count: requirements.length, requirements };
  }

  async getRequirementDetail(itemCode: string): Promise<RequirementDetail> {
    const requirement = await this.catalog.get(itemCode.trim());
    const evidence = await this.evidence.recent(requirement.itemCode, this.recentEvidenceLimit);
    const evidenceCount = await this.evidence.countFor(requirement.itemCode);
    return { requirement, evidence, evidenceCount };
  }

  async generateEvidence(itemCode: string, evidenceType: string, content: string): Promise<GeneratedEvidence> {
    const record = await this.evidence.insert({ itemCode, evidenceType, content });
    return {
      id: record.id,
      itemCode: record.itemCode,
      title: record.title,
      evidenceType: record.evidenceType,
      content: record.content,
      status: record.status,
      createdAt: record.createdAt,
    };
  }

  checkCompliance(category?: string): Promise<ComplianceCheck> {
    return this.aggregator.check(category);
  }

  createAuditReport(window: ReportWindow = {}): Promise<AuditReport> {
    return this.reports.build(window);
  }

  close(): Promise<void> {
    return this.store.close();
  }
}
