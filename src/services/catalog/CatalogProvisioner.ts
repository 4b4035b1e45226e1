import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import { chapterOf } from '../../domain/entities/Requirement.js';
import type { SqliteStore } from '../storage/SqliteStore.js';
import type { SchemaAdapter } from '../schema/SchemaAdapter.js';
import { columnsOf, objectType } from '../schema/probes.js';
import { CATALOG_RELATION, CREATE_REQUIREMENTS_TABLE, EVIDENCE_TABLE } from '../schema/sql.js';

export const requirementInputSchema = z.object({
  itemCode: z
    .string()
    .trim()
    .regex(/^\d+(\.\d+)+$/, 'item code must look like <chapter>.<section>.<item>'),
  category: z.string().trim().min(1).optional(),
  title: z.string().trim().min(1, 'title is required'),
  description: z.string().nullish(),
  requirementText: z.string().nullish(),
  controlObjective: z.string().nullish(),
});

export type RequirementInput = z.input<typeof requirementInputSchema>;

export interface ProvisionResult {
  inserted: number;
  updated: number;
}

/**
 * Loads reference requirements into the canonical table. Writes go through
 * the base table, so the search index triggers keep the shadow in the same
 * transaction.
 */
export class CatalogProvisioner {
  constructor(
    private readonly store: SqliteStore,
    private readonly schema: SchemaAdapter,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async provision(inputs: readonly RequirementInput[]): Promise<ProvisionResult> {
    const parsed = z.array(requirementInputSchema).safeParse(inputs);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationError(`Invalid requirements (${issues.join('; ')})`, issues);
    }
    const now = this.clock().toISOString();

    const result = await this.store.write('catalog.provision', db => {
      const kind = objectType(db, CATALOG_RELATION);
      if (kind === 'view') {
        throw new ValidationError(`${CATALOG_RELATION} is a read-only compatibility view`);
      }
      if (!kind) {
        db.exec(CREATE_REQUIREMENTS_TABLE);
        logger.info({ table: CATALOG_RELATION }, 'Created requirement catalog table');
      }
      const tracksUpdates = columnsOf(db, CATALOG_RELATION).has('updated_at');

      const exists = db.prepare<[string], { item_code: string }>(
        `SELECT item_code FROM ${CATALOG_RELATION} WHERE item_code = ?`
      );
      const insert = db.prepare(`
        INSERT INTO ${CATALOG_RELATION}
          (item_code, category, title, description, requirement_text, control_objective)
        VALUES (@itemCode, @category, @title, @description, @requirementText, @controlObjective)
      `);
      const update = db.prepare(`
        UPDATE ${CATALOG_RELATION}
        SET category = @category, title = @title, description = @description,
            requirement_text = @requirementText, control_objective = @controlObjective
            ${tracksUpdates ? ', updated_at = @now' : ''}
        WHERE item_code = @itemCode
      `);

      let inserted = 0;
      let updated = 0;
      for (const input of parsed.data) {
        const row = {
          itemCode: input.itemCode,
          category: input.category ?? chapterOf(input.itemCode),
          title: input.title,
          description: input.description ?? null,
          requirementText: input.requirementText ?? null,
          controlObjective: input.controlObjective ?? null,
        };
        if (exists.get(row.itemCode)) {
          update.run(tracksUpdates ? { ...row, now } : row);
          updated++;
        } else {
          insert.run(row);
          inserted++;
        }
      }
      return { inserted, updated };
    });

    this.schema.invalidate();
    await this.schema.ensureSchema();
    logger.info(result, 'Requirement catalog provisioned');
    return result;
  }

  async remove(itemCode: string): Promise<void> {
    await this.schema.requireCatalog();
    await this.store.write('catalog.remove', db => {
      if (objectType(db, CATALOG_RELATION) !== 'table') {
        throw new ValidationError(`${CATALOG_RELATION} is a read-only compatibility view`);
      }
      const found = db
        .prepare<[string], { item_code: string }>(`SELECT item_code FROM ${CATALOG_RELATION} WHERE item_code = ?`)
        .get(itemCode);
      if (!found) {
        throw new NotFoundError(`Requirement not found: ${itemCode}`, { itemCode });
      }
      const referenced = db
        .prepare<[string], { n: number }>(`SELECT COUNT(*) AS n FROM ${EVIDENCE_TABLE} WHERE item_code = ?`)
        .get(itemCode);
      if (referenced && referenced.n > 0) {
        throw new ValidationError(`Requirement ${itemCode} is referenced by ${referenced.n} evidence record(s)`, {
          itemCode,
          evidence: referenced.n,
        });
      }
      db.prepare(`DELETE FROM ${CATALOG_RELATION} WHERE item_code = ?`).run(itemCode);
    });
  }
}
