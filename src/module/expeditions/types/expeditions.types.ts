export const EXPEDITION_STATUTS = [
  "CREATED",
  "IN_TRANSIT",
  "SORTING",
  "OUT_FOR_DELIVERY",
  "DELIVERED",
  "FAILED",
] as const;

export type ExpeditionStatut = (typeof EXPEDITION_STATUTS)[number];

export type ClientLite = {
  id: number;
  nom: string;
  prenom: string;
  email: string;
};

export type DestinationLite = {
  id: number;
  ville: string;
  pays: string;
  zone_geographique: string;
};

export type Expedition = {
  id: number;
  numero: string;
  client_id: number;
  type_service_id: number;
  destination_id: number;
  poids: string;
  volume: string;
  description: string | null;
  montant: string;
  statut: ExpeditionStatut;
  statut_updated_at: string;
  date_creation: string;
  date_livraison: string | null;
  predicted_delivery_time: string | null;
  tournee_id: number | null;
  agent_responsable_id: number | null;
  is_active: boolean;
  created_at: string;
  updated_at: string;
};

export type ExpeditionListItem = Expedition & {
  client?: ClientLite | null;
  destination?: DestinationLite | null;
};

export type ExpeditionStatusHistoryEntry = {
  id: number;
  expedition_id: number;
  old_statut: ExpeditionStatut;
  new_statut: ExpeditionStatut;
  actor_type: "user" | "system";
  changed_by: number | null;
  notes: string | null;
  created_at: string;
};

export type Paginated<T> = { items: T[]; total: number };
