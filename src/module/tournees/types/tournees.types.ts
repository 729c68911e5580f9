import type { Expedition, ExpeditionStatut } from "../../expeditions/types/expeditions.types";

export type Tournee = {
  id: number;
  date: string;
  chauffeur_id: number;
  vehicule_id: number;
  kilometrage: string;
  kilometrage_manuel: boolean;
  consommation: string;
  consommation_manuelle: boolean;
  duree_minutes: number | null;
  created_at: string;
  updated_at: string;
};

export type TourneeListItem = Tournee & {
  nb_expeditions: number;
  chauffeur: { id: number; nom: string; prenom: string } | null;
  vehicule: { id: number; immatriculation: string } | null;
};

/** Tour row plus what the aggregator needs (vehicle rate, L/100km). */
export type TourneeForUpdate = Tournee & {
  vehicule_consommation: string;
};

export type TourneeDetail = TourneeListItem & {
  expeditions: Expedition[];
};

export type TourneeReport = {
  tournee_id: number;
  date: string;
  chauffeur: string | null;
  vehicule: string | null;
  total_expeditions: number;
  total_poids: string;
  total_volume: string;
  chiffre_affaires: string;
  kilometrage: string;
  consommation: string;
  status_breakdown: Record<ExpeditionStatut, number>;
};

export type Paginated<T> = { items: T[]; total: number };
