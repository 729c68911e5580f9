export type Chauffeur = {
  id: number;
  /** Login account; drivers see the tours assigned to it. */
  user_id: number | null;
  nom: string;
  prenom: string;
  numero_permis: string;
  telephone: string | null;
  disponibilite: boolean;
  date_embauche: string;
  is_active: boolean;
  created_at: string;
  updated_at: string;
};

export type Paginated<T> = { items: T[]; total: number };
