import { logger } from '../../utils/logger.js';
import { SchemaMissingError } from '../../utils/errors.js';
import type { Connection, SqliteStore } from '../storage/SqliteStore.js';
import {
  DEFAULT_PROBES,
  columnsOf,
  legacyEvidenceProbe,
  objectType,
  type CatalogSource,
  type SchemaProbe,
} from './probes.js';
import {
  CREATE_EVIDENCE_TABLE,
  CREATE_SEARCH_INDEX,
  EVIDENCE_COLUMN_PATCHES,
  EVIDENCE_INDEXES,
  EVIDENCE_TABLE,
  EVIDENCE_TOUCH_TRIGGER,
  POPULATE_SEARCH_INDEX,
  SEARCH_INDEX,
  SEARCH_INDEX_DEFINITION_QUERY,
  SEARCH_INDEX_TOKENIZER,
  SEARCH_INDEX_TRIGGER_NAMES,
  SEARCH_INDEX_TRIGGERS,
  copyEvidenceFrom,
} from './sql.js';

export type SchemaResolution =
  | { ok: true; source: CatalogSource; searchIndex: boolean }
  | { ok: false; reasons: string[] };

/**
 * Brings the store to the canonical shape before any other component runs.
 * Objects are only ever created when absent. The first resolution, usable or
 * not, is kept until `invalidate()`; a storage failure is not kept.
 */
export class SchemaAdapter {
  private resolution: Promise<SchemaResolution> | null = null;
  private settled: SchemaResolution | null = null;

  constructor(
    private readonly store: SqliteStore,
    private readonly probes: readonly SchemaProbe[] = DEFAULT_PROBES
  ) {}

  ensureSchema(): Promise<SchemaResolution> {
    if (!this.resolution) {
      const pending = this.store
        .write('ensureSchema', db => this.adapt(db))
        .then(resolution => {
          this.settled = resolution;
          return resolution;
        })
        .catch((error: unknown) => {
          this.resolution = null;
          throw error;
        });
      this.resolution = pending;
    }
    return this.resolution;
  }

  /** Resolves the catalog source or fails with `SchemaMissing`. */
  async requireCatalog(): Promise<CatalogSource> {
    const resolution = await this.ensureSchema();
    if (!resolution.ok) {
      throw new SchemaMissingError(
        `No usable requirement catalog: ${resolution.reasons.join('; ')}`,
        { reasons: resolution.reasons }
      );
    }
    return resolution.source;
  }

  async hasSearchIndex(): Promise<boolean> {
    const resolution = await this.ensureSchema();
    return resolution.ok && resolution.searchIndex;
  }

  /** Last settled resolution, without touching the store. */
  describe(): SchemaResolution | null {
    return this.settled;
  }

  invalidate(): void {
    this.resolution = null;
    this.settled = null;
  }

  private adapt(db: Connection): SchemaResolution {
    this.ensureEvidenceTable(db);

    const reasons: string[] = [];
    for (const probe of this.probes) {
      const outcome = probe.run(db);
      if (outcome.status === 'usable') {
        const searchIndex = outcome.source.kind === 'table' && this.ensureSearchIndex(db);
        logger.info(
          { probe: probe.name, version: probe.version, kind: outcome.source.kind, synthesized: outcome.source.synthesized, searchIndex },
          'Requirement catalog resolved'
        );
        return { ok: true, source: outcome.source, searchIndex };
      }
      if (outcome.status === 'incompatible') {
        reasons.push(`${probe.name}: ${outcome.reason}`);
      }
    }

    if (reasons.length === 0) {
      reasons.push('no known catalog tables found');
    }
    logger.warn({ reasons }, 'Requirement catalog unavailable; catalog operations will fail');
    return { ok: false, reasons };
  }

  private ensureEvidenceTable(db: Connection): void {
    if (!objectType(db, EVIDENCE_TABLE)) {
      db.exec(CREATE_EVIDENCE_TABLE);
      logger.info({ table: EVIDENCE_TABLE }, 'Created evidence table');
      this.adoptLegacyEvidence(db);
    } else {
      const columns = columnsOf(db, EVIDENCE_TABLE);
      for (const patch of EVIDENCE_COLUMN_PATCHES) {
        if (!columns.has(patch.column)) {
          db.exec(patch.ddl);
          logger.info({ table: EVIDENCE_TABLE, column: patch.column }, 'Added missing evidence column');
        }
      }
    }
    EVIDENCE_INDEXES.forEach(ddl => db.exec(ddl));
    db.exec(EVIDENCE_TOUCH_TRIGGER);
  }

  private adoptLegacyEvidence(db: Connection): void {
    const outcome = legacyEvidenceProbe(db);
    if (outcome.status === 'incompatible') {
      logger.warn({ reason: outcome.reason }, 'Legacy evidence log not copied');
    } else if (outcome.status === 'usable') {
      const { changes } = db.prepare(copyEvidenceFrom(outcome.source)).run();
      logger.info({ from: outcome.source.table, rows: changes }, 'Copied legacy evidence into evidence table');
    }
  }

  private ensureSearchIndex(db: Connection): boolean {
    if (!this.store.searchIndexEnabled) return false;

    const existing = db.prepare<[string], { sql: string | null }>(SEARCH_INDEX_DEFINITION_QUERY).get(SEARCH_INDEX);
    if (existing && !existing.sql?.includes(SEARCH_INDEX_TOKENIZER)) {
      SEARCH_INDEX_TRIGGER_NAMES.forEach(name => db.exec(`DROP TRIGGER IF EXISTS ${name}`));
      db.exec(`DROP TABLE ${SEARCH_INDEX}`);
      logger.info({ index: SEARCH_INDEX }, 'Dropped search index built without folded text');
    }

    if (!objectType(db, SEARCH_INDEX)) {
      try {
        db.exec(CREATE_SEARCH_INDEX);
      } catch (error) {
        logger.warn({ error }, 'Search index unavailable; keyword search will scan the catalog');
        return false;
      }
      db.exec(POPULATE_SEARCH_INDEX);
      logger.info({ index: SEARCH_INDEX }, 'Created and populated search index');
    }
    SEARCH_INDEX_TRIGGERS.forEach(ddl => db.exec(ddl));
    return true;
  }
}
