import { logger } from '../../utils/logger.js';
import { NotFoundError, StorageError, ValidationError } from '../../utils/errors.js';
import { toEvidence, type Evidence, type EvidenceRow } from '../../domain/entities/Evidence.js';
import type { SqliteStore } from '../storage/SqliteStore.js';
import type { SchemaAdapter } from '../schema/SchemaAdapter.js';
import { CATALOG_RELATION, EVIDENCE_TABLE } from '../schema/sql.js';

export interface NewEvidence {
  itemCode: string;
  evidenceType: string;
  content: string;
}

/** An inserted record with the title of the requirement it supports. */
export interface RecordedEvidence extends Evidence {
  title: string;
}

/** Append-only evidence records with referential and status enforcement. */
export class EvidenceStore {
  constructor(
    private readonly store: SqliteStore,
    private readonly schema: SchemaAdapter,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Inserts a completed evidence record and returns it. The requirement
   * lookup and the insert share one transaction, so an unknown item code
   * never leaves a row behind and the returned title matches the committed row.
   */
  async insert(input: NewEvidence): Promise<RecordedEvidence> {
    const itemCode = input.itemCode.trim();
    const evidenceType = input.evidenceType.trim();
    const { content } = input;
    const empty = Object.entries({ item_code: itemCode, evidence_type: evidenceType, content: content.trim() })
      .filter(([, value]) => value.length === 0)
      .map(([field]) => field);
    if (empty.length > 0) {
      throw new ValidationError(`Missing required field(s): ${empty.join(', ')}`, { fields: empty });
    }

    await this.schema.requireCatalog();
    const now = this.clock().toISOString();

    const { row, title } = await this.store.write('evidence.insert', db => {
      const requirement = db
        .prepare<[string], { title: string }>(`SELECT title FROM ${CATALOG_RELATION} WHERE item_code = ?`)
        .get(itemCode);
      if (!requirement) {
        throw new NotFoundError(`Requirement not found: ${itemCode}`, { itemCode });
      }
      const inserted = db
        .prepare<[string, string, string, string, string], EvidenceRow>(`
          INSERT INTO ${EVIDENCE_TABLE} (item_code, evidence_type, content, status, created_at, updated_at)
          VALUES (?, ?, ?, 'completed', ?, ?)
          RETURNING id, item_code, evidence_type, content, status, created_at, updated_at
        `)
        .get(itemCode, evidenceType, content, now, now);
      return { row: inserted, title: requirement.title };
    });

    if (!row) {
      throw new StorageError(`evidence.insert failed: no row returned for ${itemCode}`);
    }
    logger.debug({ id: row.id, itemCode }, 'Evidence recorded');
    return { ...toEvidence(row), title };
  }

  /** Newest first; rows with the same timestamp keep insertion order. */
  async recent(itemCode: string, limit: number): Promise<Evidence[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`limit must be a positive integer, got ${limit}`);
    }
    await this.schema.ensureSchema();
    const rows = await this.store.read('evidence.recent', db =>
      db
        .prepare<[string, number], EvidenceRow>(`
          SELECT id, item_code, evidence_type, content, status, created_at, updated_at
          FROM ${EVIDENCE_TABLE}
          WHERE item_code = ?
          ORDER BY created_at DESC, id ASC
          LIMIT ?
        `)
        .all(itemCode, limit)
    );
    return rows.map(toEvidence);
  }

  async countFor(itemCode: string): Promise<number> {
    await this.schema.ensureSchema();
    const row = await this.store.read('evidence.countFor', db =>
      db.prepare<[string], { n: number }>(`SELECT COUNT(*) AS n FROM ${EVIDENCE_TABLE} WHERE item_code = ?`).get(itemCode)
    );
    return row?.n ?? 0;
  }

  /** Distinct catalog items (optionally in one category) with at least one evidence row. */
  async countDistinctCovered(category?: string): Promise<number> {
    await this.schema.requireCatalog();
    const sql = `
      SELECT COUNT(*) AS n FROM ${CATALOG_RELATION} r
      WHERE EXISTS (SELECT 1 FROM ${EVIDENCE_TABLE} e WHERE e.item_code = r.item_code)
    `;
    const row = await this.store.read('evidence.countDistinctCovered', db =>
      category === undefined
        ? db.prepare<[], { n: number }>(sql).get()
        : db.prepare<[string], { n: number }>(`${sql} AND r.category = ?`).get(category)
    );
    return row?.n ?? 0;
  }
}
