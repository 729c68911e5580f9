export const PAIEMENT_MODES = ["CASH", "CARD", "TRANSFER", "CHEQUE"] as const;
export type PaiementMode = (typeof PAIEMENT_MODES)[number];

export type Paiement = {
  id: number;
  facture_id: number;
  client_id: number;
  date_paiement: string;
  montant: string;
  mode: PaiementMode;
  reference: string | null;
  commentaire: string | null;
  created_at: string;
  updated_at: string;
};
