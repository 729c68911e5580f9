import { formatCents } from "../../../utils/decimal";
import { AmountExceedsBalance, InvoiceAlreadyPaid } from "../../../utils/errors";
import { HttpError } from "../../../utils/httpError";
import type { FacturePaymentStatus } from "../types/factures.types";

/** Fully paid as soon as cumulative payments reach TTC (a zero TTC invoice is PAID). */
export function paymentStatus(paid: bigint, ttc: bigint): FacturePaymentStatus {
  if (paid >= ttc) return "PAID";
  if (paid > 0n) return "PARTIAL";
  return "UNPAID";
}

/** TTC − Σ payments. Not clamped: a negative value is a broken invariant, reported by reconciliation. */
export function remainingBalance(ttc: bigint, paid: bigint): bigint {
  return ttc - paid;
}

export type LedgerState = {
  facture_id: number;
  ttc: bigint;
  paid: bigint;
};

export type LedgerOutcome = {
  paid: bigint;
  reste: bigint;
  statut: FacturePaymentStatus;
};

function outcome(ttc: bigint, paid: bigint): LedgerOutcome {
  return { paid, reste: remainingBalance(ttc, paid), statut: paymentStatus(paid, ttc) };
}

export function applyPayment(state: LedgerState, montant: bigint): LedgerOutcome {
  if (montant <= 0n) {
    throw new HttpError(422, "INVALID_AMOUNT", "Le montant du paiement doit être strictement positif");
  }
  if (paymentStatus(state.paid, state.ttc) === "PAID") {
    throw new InvoiceAlreadyPaid(state.facture_id);
  }
  const reste = remainingBalance(state.ttc, state.paid);
  if (montant > reste) {
    throw new AmountExceedsBalance(state.facture_id, formatCents(montant), formatCents(reste));
  }
  return outcome(state.ttc, state.paid + montant);
}

export function reversePayment(state: LedgerState, montant: bigint): LedgerOutcome {
  return outcome(state.ttc, state.paid - montant);
}
