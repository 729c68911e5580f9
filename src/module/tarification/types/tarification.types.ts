export type Destination = {
  id: number;
  ville: string;
  pays: string;
  zone_geographique: string;
  tarif_base: string;
  is_active: boolean;
};

export type TypeService = {
  id: number;
  nom: string;
  description: string | null;
  is_active: boolean;
};

export type Tarification = {
  id: number;
  type_service_id: number;
  destination_id: number;
  tarif_poids: string;
  tarif_volume: string;
  is_active: boolean;
  created_at: string;
  updated_at: string;
  destination?: Destination | null;
  type_service?: Pick<TypeService, "id" | "nom"> | null;
};

/** Resolved pricing inputs, all in cents (per kg, per m³, flat fee). */
export type Rate = {
  per_kg: bigint;
  per_m3: bigint;
  base_fee: bigint;
};

export type Quote = {
  type_service_id: number;
  destination_id: number;
  poids: string;
  volume: string;
  tarif_poids: string;
  tarif_volume: string;
  tarif_base: string;
  montant: string;
};

export type Paginated<T> = { items: T[]; total: number };
