import type { Connection } from '../storage/SqliteStore.js';
import { REQUIREMENT_COLUMNS } from '../../domain/entities/Requirement.js';
import {
  CATALOG_RELATION,
  COLUMNS_QUERY,
  OBJECT_TYPE_QUERY,
  quoteIdent,
  quoteLiteral,
} from './sql.js';

export type ProbeName = 'canonical' | 'legacy-isms' | 'controls-sections';

export type RelationKind = 'table' | 'view';

export interface CatalogSource {
  probe: ProbeName;
  version: number;
  relation: typeof CATALOG_RELATION;
  kind: RelationKind;
  /** True when this call created the compatibility view. */
  synthesized: boolean;
}

export type ProbeOutcome =
  | { status: 'usable'; source: CatalogSource }
  | { status: 'absent' }
  | { status: 'incompatible'; reason: string };

export interface SchemaProbe {
  name: ProbeName;
  version: number;
  run(db: Connection): ProbeOutcome;
}

export function objectType(db: Connection, name: string): RelationKind | null {
  const row = db.prepare<[string], { type: string }>(OBJECT_TYPE_QUERY).get(name);
  if (row?.type === 'table' || row?.type === 'view') return row.type;
  return null;
}

export function columnsOf(db: Connection, name: string): Set<string> {
  const rows = db.prepare<[string], { name: string }>(COLUMNS_QUERY).all(name);
  return new Set(rows.map(row => row.name.toLowerCase()));
}

const firstPresent = (columns: Set<string>, candidates: readonly string[]): string | null =>
  candidates.find(candidate => columns.has(candidate)) ?? null;

const chapterExpr = (column: string): string =>
  `CASE WHEN instr(${column}, '.') > 0 THEN substr(${column}, 1, instr(${column}, '.') - 1) ELSE ${column} END`;

function catalogNameTaken(db: Connection): ProbeOutcome | null {
  const existing = objectType(db, CATALOG_RELATION);
  return existing
    ? { status: 'incompatible', reason: `${CATALOG_RELATION} ${existing} exists with a non-canonical shape` }
    : null;
}

export const canonicalProbe: SchemaProbe = {
  name: 'canonical',
  version: 3,
  run(db) {
    const kind = objectType(db, CATALOG_RELATION);
    if (!kind) return { status: 'absent' };

    const columns = columnsOf(db, CATALOG_RELATION);
    const missing = REQUIREMENT_COLUMNS.filter(column => !columns.has(column));
    if (missing.length > 0) {
      return { status: 'incompatible', reason: `${CATALOG_RELATION} lacks columns: ${missing.join(', ')}` };
    }

    return {
      status: 'usable',
      source: { probe: 'canonical', version: 3, relation: CATALOG_RELATION, kind, synthesized: false },
    };
  },
};

const LEGACY_TABLE = 'isms_requirements';

export const LEGACY_COLUMN_CANDIDATES = {
  title: ['title', 'item_title'],
  description: ['description', 'detailed_explanation', 'key_checks'],
  requirementText: ['requirement_text', 'requirement', 'certification_criteria', 'check_items'],
  category: ['category'],
  controlObjective: ['control_objective'],
} as const;

/** Single-table catalog used by earlier releases, in any of its column layouts. */
export const legacyIsmsProbe: SchemaProbe = {
  name: 'legacy-isms',
  version: 2,
  run(db) {
    if (objectType(db, LEGACY_TABLE) !== 'table') return { status: 'absent' };

    const columns = columnsOf(db, LEGACY_TABLE);
    const title = firstPresent(columns, LEGACY_COLUMN_CANDIDATES.title);
    if (!columns.has('item_code') || !title) {
      return { status: 'incompatible', reason: `${LEGACY_TABLE} has no item_code/title columns` };
    }
    const taken = catalogNameTaken(db);
    if (taken) return taken;

    const column = (name: string | null): string => (name ? quoteIdent(name) : 'NULL');
    const category = firstPresent(columns, LEGACY_COLUMN_CANDIDATES.category);

    db.exec(`
      CREATE VIEW ${CATALOG_RELATION} AS
      SELECT
        item_code,
        ${category ? `COALESCE(${quoteIdent(category)}, ${chapterExpr('item_code')})` : chapterExpr('item_code')} AS category,
        ${quoteIdent(title)} AS title,
        ${column(firstPresent(columns, LEGACY_COLUMN_CANDIDATES.description))} AS description,
        ${column(firstPresent(columns, LEGACY_COLUMN_CANDIDATES.requirementText))} AS requirement_text,
        ${column(firstPresent(columns, LEGACY_COLUMN_CANDIDATES.controlObjective))} AS control_objective
      FROM ${LEGACY_TABLE}
    `);

    return {
      status: 'usable',
      source: { probe: 'legacy-isms', version: 2, relation: CATALOG_RELATION, kind: 'view', synthesized: true },
    };
  },
};

export const SECTION_LABELS = {
  detailedExplanation: ['detailed explanation', 'detailed_explanation', '상세설명', '상세 설명'],
  keyChecks: ['key checks', 'key_checks', '주요 확인사항', '주요확인사항'],
  certificationCriteria: ['certification criteria', 'certification_criteria', '인증기준', '인증 기준'],
} as const;

function sectionText(labels: readonly string[]): string {
  const list = labels.map(quoteLiteral).join(', ');
  return `(SELECT s.content FROM control_sections s
           WHERE s.control_id = c.control_id AND lower(trim(s.label)) IN (${list})
           ORDER BY s.rowid LIMIT 1)`;
}

/** Normalized pair: `controls(control_id, name)` + `control_sections(control_id, label, content)`. */
export const controlsSectionsProbe: SchemaProbe = {
  name: 'controls-sections',
  version: 1,
  run(db) {
    if (objectType(db, 'controls') !== 'table' || objectType(db, 'control_sections') !== 'table') {
      return { status: 'absent' };
    }

    const controls = columnsOf(db, 'controls');
    const sections = columnsOf(db, 'control_sections');
    const missing = [
      ...['control_id', 'name'].filter(c => !controls.has(c)).map(c => `controls.${c}`),
      ...['control_id', 'label', 'content'].filter(c => !sections.has(c)).map(c => `control_sections.${c}`),
    ];
    if (missing.length > 0) {
      return { status: 'incompatible', reason: `missing columns: ${missing.join(', ')}` };
    }
    const taken = catalogNameTaken(db);
    if (taken) return taken;

    db.exec(`
      CREATE VIEW ${CATALOG_RELATION} AS
      SELECT
        c.control_id AS item_code,
        ${chapterExpr('c.control_id')} AS category,
        c.name AS title,
        COALESCE(${sectionText(SECTION_LABELS.detailedExplanation)}, ${sectionText(SECTION_LABELS.keyChecks)}) AS description,
        ${sectionText(SECTION_LABELS.certificationCriteria)} AS requirement_text,
        NULL AS control_objective
      FROM controls c
    `);

    return {
      status: 'usable',
      source: { probe: 'controls-sections', version: 1, relation: CATALOG_RELATION, kind: 'view', synthesized: true },
    };
  },
};

export const LEGACY_EVIDENCE_TABLE = 'evidence_logs';

const LEGACY_EVIDENCE_COLUMNS = ['item_code', 'evidence_type', 'content'] as const;

export interface LegacyEvidenceSource {
  table: typeof LEGACY_EVIDENCE_TABLE;
  withIds: boolean;
  withCreatedAt: boolean;
}

export type EvidenceProbeOutcome =
  | { status: 'usable'; source: LegacyEvidenceSource }
  | { status: 'absent' }
  | { status: 'incompatible'; reason: string };

/** Evidence log written alongside the legacy single-table catalog. */
export function legacyEvidenceProbe(db: Connection): EvidenceProbeOutcome {
  if (objectType(db, LEGACY_EVIDENCE_TABLE) !== 'table') return { status: 'absent' };

  const columns = columnsOf(db, LEGACY_EVIDENCE_TABLE);
  const missing = LEGACY_EVIDENCE_COLUMNS.filter(column => !columns.has(column));
  if (missing.length > 0) {
    return { status: 'incompatible', reason: `${LEGACY_EVIDENCE_TABLE} lacks columns: ${missing.join(', ')}` };
  }
  return {
    status: 'usable',
    source: { table: LEGACY_EVIDENCE_TABLE, withIds: columns.has('id'), withCreatedAt: columns.has('created_at') },
  };
}

export const DEFAULT_PROBES: readonly SchemaProbe[] = [canonicalProbe, legacyIsmsProbe, controlsSectionsProbe];
