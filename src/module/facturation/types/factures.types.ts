import type { ExpeditionStatut } from "../../expeditions/types/expeditions.types";
import type { Paiement } from "./paiements.types";

export const FACTURE_PAYMENT_STATUSES = ["UNPAID", "PARTIAL", "PAID"] as const;
export type FacturePaymentStatus = (typeof FACTURE_PAYMENT_STATUSES)[number];

export const FACTURE_MODES = ["STANDARD", "EXPRESS", "URGENT"] as const;
export type FactureMode = (typeof FACTURE_MODES)[number];

export type ClientLite = {
  id: number;
  nom: string;
  prenom: string;
  email: string;
};

export type Facture = {
  id: number;
  client_id: number;
  date_emission: string;
  montant_ht: string;
  montant_tva: string;
  montant_ttc: string;
  taux_tva: string;
  statut_paiement: FacturePaymentStatus;
  mode: FactureMode;
  total_paye: string;
  reste_a_payer: string;
  created_at: string;
  updated_at: string;
  client?: ClientLite | null;
};

export type FactureExpeditionLine = {
  id: number;
  numero: string;
  montant: string;
  statut: ExpeditionStatut;
};

export type FactureDetail = Facture & {
  expeditions: FactureExpeditionLine[];
  paiements: Paiement[];
};

/** Row locked by the ledger while a payment is applied or reversed. */
export type FactureLedgerRow = {
  id: number;
  client_id: number;
  montant_ttc: string;
  statut_paiement: FacturePaymentStatus;
  total_paye: string;
};

export type Paginated<T> = { items: T[]; total: number };
