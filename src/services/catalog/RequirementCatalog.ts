import { NotFoundError } from '../../utils/errors.js';
import { toRequirement, type Requirement, type RequirementRow } from '../../domain/entities/Requirement.js';
import type { SqliteStore } from '../storage/SqliteStore.js';
import type { SchemaAdapter } from '../schema/SchemaAdapter.js';
import { CATALOG_RELATION } from '../schema/sql.js';

export const SELECT_REQUIREMENT = `
  SELECT item_code, category, title, description, requirement_text, control_objective
  FROM ${CATALOG_RELATION}
`;

/** Read access to the canonical requirement relation, whichever schema backs it. */
export class RequirementCatalog {
  constructor(
    private readonly store: SqliteStore,
    private readonly schema: SchemaAdapter
  ) {}

  async find(itemCode: string): Promise<Requirement | null> {
    await this.schema.requireCatalog();
    const row = await this.store.read('catalog.find', db =>
      db.prepare<[string], RequirementRow>(`${SELECT_REQUIREMENT} WHERE item_code = ?`).get(itemCode)
    );
    return row ? toRequirement(row) : null;
  }

  async get(itemCode: string): Promise<Requirement> {
    const requirement = await this.find(itemCode);
    if (!requirement) {
      throw new NotFoundError(`Requirement not found: ${itemCode}`, { itemCode });
    }
    return requirement;
  }

  /** Ordered by item_code as a string, so `2.10.1` sorts before `2.2.1`. */
  async list(category?: string): Promise<Requirement[]> {
    await this.schema.requireCatalog();
    const rows = await this.store.read('catalog.list', db =>
      category === undefined
        ? db.prepare<[], RequirementRow>(`${SELECT_REQUIREMENT} ORDER BY item_code`).all()
        : db.prepare<[string], RequirementRow>(`${SELECT_REQUIREMENT} WHERE category = ? ORDER BY item_code`).all(category)
    );
    return rows.map(toRequirement);
  }
}
