export const CATALOG_RELATION = 'requirements';
export const EVIDENCE_TABLE = 'evidences';
export const SEARCH_INDEX = 'requirements_search';

const NOW = `strftime('%Y-%m-%dT%H:%M:%fZ', 'now')`;

export const quoteIdent = (name: string): string => `"${name.replace(/"/g, '""')}"`;

export const quoteLiteral = (value: string): string => `'${value.replace(/'/g, "''")}'`;

export const OBJECT_TYPE_QUERY = `
  SELECT type FROM sqlite_master
  WHERE name = ? AND type IN ('table', 'view')
`;

export const COLUMNS_QUERY = `SELECT name FROM pragma_table_info(?)`;

export const CREATE_REQUIREMENTS_TABLE = `
  CREATE TABLE ${CATALOG_RELATION} (
    item_code         TEXT PRIMARY KEY,
    category          TEXT NOT NULL,
    title             TEXT NOT NULL,
    description       TEXT,
    requirement_text  TEXT,
    control_objective TEXT,
    created_at        TEXT NOT NULL DEFAULT (${NOW}),
    updated_at        TEXT NOT NULL DEFAULT (${NOW})
  )
`;

export const CREATE_EVIDENCE_TABLE = `
  CREATE TABLE ${EVIDENCE_TABLE} (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    item_code     TEXT NOT NULL,
    evidence_type TEXT NOT NULL,
    content       TEXT NOT NULL,
    status        TEXT NOT NULL DEFAULT 'pending'
                  CHECK (status IN ('pending', 'completed', 'rejected')),
    created_at    TEXT NOT NULL DEFAULT (${NOW}),
    updated_at    TEXT NOT NULL DEFAULT (${NOW})
  )
`;

/** Columns added in place to an evidence table that predates them. */
export const EVIDENCE_COLUMN_PATCHES: ReadonlyArray<{ column: string; ddl: string }> = [
  {
    column: 'status',
    ddl: `ALTER TABLE ${EVIDENCE_TABLE} ADD COLUMN status TEXT NOT NULL DEFAULT 'completed'
          CHECK (status IN ('pending', 'completed', 'rejected'))`,
  },
  {
    column: 'updated_at',
    ddl: `ALTER TABLE ${EVIDENCE_TABLE} ADD COLUMN updated_at TEXT`,
  },
];

/**
 * One-time copy of a legacy evidence log into a freshly created evidence
 * table. Ids are kept so AUTOINCREMENT continues past them; `YYYY-MM-DD HH:MM:SS`
 * stamps are rewritten as ISO-8601 UTC.
 */
export function copyEvidenceFrom(source: { table: string; withIds: boolean; withCreatedAt: boolean }): string {
  const id = source.withIds ? 'id, ' : '';
  const stamp = source.withCreatedAt ? `COALESCE(strftime('%Y-%m-%dT%H:%M:%fZ', created_at), created_at, ${NOW})` : NOW;
  return `
    INSERT INTO ${EVIDENCE_TABLE} (${id}item_code, evidence_type, content, status, created_at, updated_at)
    SELECT ${id}item_code, evidence_type, content, 'completed', stamp, stamp
    FROM (
      SELECT ${id}item_code, evidence_type, content, ${stamp} AS stamp
      FROM ${quoteIdent(source.table)}
      WHERE item_code IS NOT NULL AND evidence_type IS NOT NULL AND content IS NOT NULL
      ORDER BY rowid
    )
  `;
}

export const EVIDENCE_INDEXES = [
  `CREATE INDEX IF NOT EXISTS idx_evidences_item_code ON ${EVIDENCE_TABLE}(item_code)`,
  `CREATE INDEX IF NOT EXISTS idx_evidences_created_at ON ${EVIDENCE_TABLE}(created_at)`,
];

// The WHEN guard stops the inner UPDATE from firing the trigger again even
// with recursive_triggers on.
export const EVIDENCE_TOUCH_TRIGGER = `
  CREATE TRIGGER IF NOT EXISTS evidences_touch_updated_at
  AFTER UPDATE ON ${EVIDENCE_TABLE}
  FOR EACH ROW
  WHEN NEW.updated_at IS OLD.updated_at AND NEW.updated_at IS NOT ${NOW}
  BEGIN
    UPDATE ${EVIDENCE_TABLE} SET updated_at = ${NOW} WHERE id = NEW.id;
  END
`;

// Shadow rows hold casefold() text and the tokenizer keeps case, so a MATCH
// on a folded needle agrees with instr(casefold(field), needle).
export const SEARCH_INDEX_TOKENIZER = `trigram case_sensitive 1`;

export const CREATE_SEARCH_INDEX = `
  CREATE VIRTUAL TABLE ${SEARCH_INDEX} USING fts5(
    item_code UNINDEXED,
    title,
    description,
    requirement_text,
    category,
    tokenize = '${SEARCH_INDEX_TOKENIZER}'
  )
`;

export const SEARCH_INDEX_DEFINITION_QUERY = `SELECT sql FROM sqlite_master WHERE name = ?`;

const SEARCH_FIELDS = 'item_code, title, description, requirement_text, category';

const folded = (row: 'NEW' | 'r') =>
  `${row}.item_code, casefold(${row}.title), casefold(${row}.description), ` +
  `casefold(${row}.requirement_text), casefold(${row}.category)`;

export const SEARCH_INDEX_TRIGGER_NAMES = ['ai', 'ad', 'au'].map(suffix => `${SEARCH_INDEX}_${suffix}`);

export const SEARCH_INDEX_TRIGGERS = [
  `CREATE TRIGGER IF NOT EXISTS ${SEARCH_INDEX}_ai AFTER INSERT ON ${CATALOG_RELATION} BEGIN
     INSERT INTO ${SEARCH_INDEX} (${SEARCH_FIELDS}) VALUES (${folded('NEW')});
   END`,
  `CREATE TRIGGER IF NOT EXISTS ${SEARCH_INDEX}_ad AFTER DELETE ON ${CATALOG_RELATION} BEGIN
     DELETE FROM ${SEARCH_INDEX} WHERE item_code = OLD.item_code;
   END`,
  `CREATE TRIGGER IF NOT EXISTS ${SEARCH_INDEX}_au AFTER UPDATE ON ${CATALOG_RELATION} BEGIN
     DELETE FROM ${SEARCH_INDEX} WHERE item_code = OLD.item_code;
     INSERT INTO ${SEARCH_INDEX} (${SEARCH_FIELDS}) VALUES (${folded('NEW')});
   END`,
];

export const POPULATE_SEARCH_INDEX = `
  INSERT INTO ${SEARCH_INDEX} (${SEARCH_FIELDS})
  SELECT ${folded('r')} FROM ${CATALOG_RELATION} r
`;
