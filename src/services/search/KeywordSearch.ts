import { logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import { toRequirement, type Requirement, type RequirementRow } from '../../domain/entities/Requirement.js';
import type { SqliteStore } from '../storage/SqliteStore.js';
import type { SchemaAdapter } from '../schema/SchemaAdapter.js';
import { SELECT_REQUIREMENT } from '../catalog/RequirementCatalog.js';
import { SEARCH_INDEX } from '../schema/sql.js';

export const SEARCHED_FIELDS = ['title', 'description', 'requirement_text', 'category'] as const;

// trigram index can only narrow needles of three characters or more
const MIN_INDEXED_LENGTH = 3;

const FIELD_MATCH = SEARCHED_FIELDS.map(field => `instr(casefold(${field}), @needle) > 0`).join(' OR ');

export type SearchStrategy = 'index' | 'scan';

/**
 * Case-insensitive substring search over the catalog text fields. When the
 * trigram index is live it narrows the candidates; the index holds the same
 * `casefold` text the field check uses, so both strategies return the same rows.
 */
export class KeywordSearch {
  constructor(
    private readonly store: SqliteStore,
    private readonly schema: SchemaAdapter
  ) {}

  async search(keyword: string): Promise<Requirement[]> {
    if (keyword.length === 0) {
      throw new ValidationError('keyword is required');
    }
    // whitespace is part of the needle; only case is folded
    const needle = keyword.toLowerCase();

    await this.schema.requireCatalog();
    const strategy: SearchStrategy =
      [...needle].length >= MIN_INDEXED_LENGTH && (await this.schema.hasSearchIndex()) ? 'index' : 'scan';

    const rows = await this.store.read('search.keyword', db => {
      if (strategy === 'index') {
        return db
          .prepare<[{ needle: string; phrase: string }], RequirementRow>(`
            ${SELECT_REQUIREMENT}
            WHERE item_code IN (SELECT item_code FROM ${SEARCH_INDEX} WHERE ${SEARCH_INDEX} MATCH @phrase)
              AND (${FIELD_MATCH})
            ORDER BY item_code
          `)
          .all({ needle, phrase: toPhrase(needle) });
      }
      return db
        .prepare<[{ needle: string }], RequirementRow>(`${SELECT_REQUIREMENT} WHERE ${FIELD_MATCH} ORDER BY item_code`)
        .all({ needle });
    });

    logger.debug({ keyword, strategy, matches: rows.length }, 'Keyword search');
    return rows.map(toRequirement);
  }
}

/** FTS5 string literal: the whole needle as one phrase, quotes doubled. */
export function toPhrase(needle: string): string {
  return `"${needle.replace(/"/g, '""')}"`;
}
