export const INCIDENT_TYPES = ["DELAY", "LOSS", "DAMAGE", "TECHNICAL", "OTHER"] as const;
export type IncidentType = (typeof INCIDENT_TYPES)[number];

export const INCIDENT_SEVERITES = ["LOW", "MEDIUM", "HIGH", "CRITICAL"] as const;
export type IncidentSeverite = (typeof INCIDENT_SEVERITES)[number];

export const INCIDENT_PRIORITES = ["LOW", "NORMAL", "HIGH", "URGENT"] as const;
export type IncidentPriorite = (typeof INCIDENT_PRIORITES)[number];

export type ExpeditionLite = {
  id: number;
  numero: string;
  statut: string;
  client_id: number;
};

export type Incident = {
  id: number;
  type: IncidentType;
  severite: IncidentSeverite;
  priorite: IncidentPriorite;
  expedition_id: number | null;
  tournee_id: number | null;
  commentaire: string | null;
  resolution_details: string | null;
  date_resolution: string | null;
  created_by: number | null;
  created_at: string;
  updated_at: string;
  expedition?: ExpeditionLite | null;
};

export type Paginated<T> = { items: T[]; total: number };
