export type TrackingLog = {
  id: number;
  expedition_id: number;
  date: string;
  lieu: string;
  statut: string;
  commentaire: string | null;
  chauffeur_id: number | null;
  created_by: number | null;
  created_at: string;
};

export type Paginated<T> = { items: T[]; total: number };
