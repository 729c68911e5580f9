export const VEHICULE_ETATS = ["AVAILABLE", "IN_SERVICE", "MAINTENANCE", "OUT_OF_SERVICE"] as const;
export type VehiculeEtat = (typeof VEHICULE_ETATS)[number];

export type Vehicule = {
  id: number;
  immatriculation: string;
  type: string;
  /** kg */
  capacite: string;
  /** L/100 km, used for tour fuel totals */
  consommation: string;
  etat: VehiculeEtat;
  is_active: boolean;
  created_at: string;
  updated_at: string;
};

export type Paginated<T> = { items: T[]; total: number };
