export type Client = {
  id: number;
  nom: string;
  prenom: string;
  email: string;
  telephone: string | null;
  adresse: string | null;
  /** Σ TTC − Σ payments, maintained by the invoice ledger. */
  solde: string;
  date_inscription: string;
  created_by: number | null;
  is_active: boolean;
  created_at: string;
  updated_at: string;
};

export type Paginated<T> = { items: T[]; total: number };
