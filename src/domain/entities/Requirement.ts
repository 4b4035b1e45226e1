/** One checklist control item, identified by a dotted `<chapter>.<section>.<item>` code. */
export interface Requirement {
  itemCode: string;
  category: string;
  title: string;
  description: string | null;
  requirementText: string | null;
  /** Always null when the catalog is synthesized from the controls/sections shape. */
  controlObjective: string | null;
}

export interface RequirementRow {
  item_code: string;
  category: string | null;
  title: string;
  description: string | null;
  requirement_text: string | null;
  control_objective: string | null;
}

export const REQUIREMENT_COLUMNS = [
  'item_code',
  'category',
  'title',
  'description',
  'requirement_text',
  'control_objective',
] as const;

export function toRequirement(row: RequirementRow): Requirement {
  return {
    itemCode: row.item_code,
    category: row.category ?? chapterOf(row.item_code),
    title: row.title,
    description: row.description,
    requirementText: row.requirement_text,
    controlObjective: row.control_objective,
  };
}

/** Leading segment of an item code: `2.7.1` → `2`. */
export function chapterOf(itemCode: string): string {
  const dot = itemCode.indexOf('.');
  return dot === -1 ? itemCode : itemCode.slice(0, dot);
}
