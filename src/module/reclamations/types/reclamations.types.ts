export const RECLAMATION_STATUTS = ["OPEN", "RESOLVED", "CANCELLED"] as const;
export type ReclamationStatut = (typeof RECLAMATION_STATUTS)[number];

export type Reclamation = {
  id: number;
  client_id: number;
  date: string;
  nature: string;
  statut: ReclamationStatut;
  commentaire: string | null;
  expedition_ids: number[];
  created_by: number | null;
  created_at: string;
  updated_at: string;
};

export type ReclamationStatistics = {
  total: number;
  resolved: number;
  pending: number;
  cancelled: number;
};

export type Paginated<T> = { items: T[]; total: number };
