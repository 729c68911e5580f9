import { eventBus, type PaiementRecordedEvent, type PaiementReversedEvent } from "../../../events/domain-events";
import { formatCents, toCents } from "../../../utils/decimal";
import { NotFoundError } from "../../../utils/errors";
import logger from "../../../utils/logger";
import { withTransaction, type DbQueryer } from "../../../utils/transaction";
import { applyPayment, reversePayment, type LedgerState } from "../lib/ledger";
import { repoGetFactureLedgerForUpdate, repoSetFactureStatut } from "../repository/factures.repository";
import {
  repoDeletePaiement,
  repoGetPaiement,
  repoInsertPaiement,
  repoListPaiements,
  repoUpdatePaiement,
} from "../repository/paiements.repository";
import { repoAdjustClientSolde } from "../repository/solde.repository";
import type { FactureLedgerRow } from "../types/factures.types";
import type { Paiement } from "../types/paiements.types";
import type {
  CreatePaiementBodyDTO,
  ListPaiementsQueryDTO,
  UpdatePaiementBodyDTO,
} from "../validators/paiements.validators";

const factureNotFound = () => new NotFoundError("FACTURE_NOT_FOUND", "Facture introuvable");
const paiementNotFound = () => new NotFoundError("PAIEMENT_NOT_FOUND", "Paiement introuvable");

async function lockLedger(tx: DbQueryer, factureId: number): Promise<{ row: FactureLedgerRow; state: LedgerState }> {
  const row = await repoGetFactureLedgerForUpdate(tx, factureId);
  if (!row) throw factureNotFound();
  return {
    row,
    state: {
      facture_id: row.id,
      ttc: toCents(row.montant_ttc, "montant_ttc"),
      paid: toCents(row.total_paye, "total_paye"),
    },
  };
}

export const svcListPaiements = (filters: ListPaiementsQueryDTO) => repoListPaiements(filters);

export const svcGetPaiement = (id: number) => repoGetPaiement(id);

export const svcUpdatePaiement = (id: number, input: UpdatePaiementBodyDTO) => repoUpdatePaiement(id, input);

/** Invoice row locked for the whole check-then-insert. */
export async function svcCreatePaiement(input: CreatePaiementBodyDTO): Promise<Paiement> {
  const montant = toCents(input.montant, "montant");

  const { paiement, event } = await withTransaction(async (tx) => {
    const { row, state } = await lockLedger(tx, input.facture_id);
    const next = applyPayment(state, montant);

    const paiement = await repoInsertPaiement(tx, input);
    if (next.statut !== row.statut_paiement) await repoSetFactureStatut(tx, row.id, next.statut);
    await repoAdjustClientSolde(tx, row.client_id, formatCents(-montant));

    const event: PaiementRecordedEvent = {
      type: "paiement.recorded",
      paiement_id: paiement.id,
      facture_id: row.id,
      client_id: row.client_id,
      montant: paiement.montant,
      statut_paiement: next.statut,
      reste_a_payer: formatCents(next.reste),
      at: paiement.created_at,
    };
    return { paiement, event };
  });

  logger.info(
    `[facturation] paiement ${paiement.id} of ${paiement.montant} on facture ${event.facture_id}: ${event.statut_paiement}, reste ${event.reste_a_payer}`
  );
  await eventBus.publish(event);
  return paiement;
}

export async function svcDeletePaiement(id: number): Promise<void> {
  // Facture id is read unlocked only to know which ledger row to lock first.
  const existing = await repoGetPaiement(id);
  if (!existing) throw paiementNotFound();

  const event = await withTransaction(async (tx) => {
    const { row, state } = await lockLedger(tx, existing.facture_id);
    const paiement = await repoGetPaiement(id, tx);
    if (!paiement || paiement.facture_id !== row.id) throw paiementNotFound();

    const montant = toCents(paiement.montant, "montant");
    const next = reversePayment(state, montant);

    await repoDeletePaiement(tx, id);
    if (next.statut !== row.statut_paiement) await repoSetFactureStatut(tx, row.id, next.statut);
    await repoAdjustClientSolde(tx, row.client_id, formatCents(montant));

    const event: PaiementReversedEvent = {
      type: "paiement.reversed",
      paiement_id: paiement.id,
      facture_id: row.id,
      client_id: row.client_id,
      montant: paiement.montant,
      statut_paiement: next.statut,
      reste_a_payer: formatCents(next.reste),
      at: new Date().toISOString(),
    };
    return event;
  });

  logger.info(`[facturation] paiement ${id} reversed on facture ${event.facture_id}: ${event.statut_paiement}`);
  await eventBus.publish(event);
}
