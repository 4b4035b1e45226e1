export const EVIDENCE_STATUSES = ['pending', 'completed', 'rejected'] as const;

export type EvidenceStatus = (typeof EVIDENCE_STATUSES)[number];

export interface Evidence {
  id: number;
  itemCode: string;
  evidenceType: string;
  content: string;
  status: EvidenceStatus;
  createdAt: string;
  updatedAt: string;
}

export interface EvidenceRow {
  id: number;
  item_code: string;
  evidence_type: string;
  content: string;
  status: string | null;
  created_at: string;
  updated_at: string | null;
}

function isEvidenceStatus(value: string | null): value is EvidenceStatus {
  return EVIDENCE_STATUSES.some(status => status === value);
}

export function toEvidence(row: EvidenceRow): Evidence {
  return {
    id: row.id,
    itemCode: row.item_code,
    evidenceType: row.evidence_type,
    content: row.content,
    // rows written before the status column existed count as completed
    status: isEvidenceStatus(row.status) ? row.status : 'completed',
    createdAt: row.created_at,
    updatedAt: row.updated_at ?? row.created_at,
  };
}
