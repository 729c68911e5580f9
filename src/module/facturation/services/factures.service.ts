import { settings } from "../../../config/settings";
import { eventBus } from "../../../events/domain-events";
import { formatCents, formatScaled, RATE_SCALE, toCents, toRate } from "../../../utils/decimal";
import { NotFoundError } from "../../../utils/errors";
import { HttpError } from "../../../utils/httpError";
import logger from "../../../utils/logger";
import { withTransaction } from "../../../utils/transaction";
import { repoClientExists } from "../../expeditions/repository/expeditions.repository";
import { priceInvoiceFromExpeditions } from "../lib/totals";
import {
  repoDeleteFacture,
  repoGetFacture,
  repoGetFactureLedgerForUpdate,
  repoInsertFacture,
  repoLinkExpeditions,
  repoListFactures,
  repoLockExpeditionsForInvoice,
} from "../repository/factures.repository";
import { repoAdjustClientSolde } from "../repository/solde.repository";
import type { FactureDetail } from "../types/factures.types";
import type { CreateFactureBodyDTO, ListFacturesQueryDTO } from "../validators/factures.validators";

export const svcListFactures = (filters: ListFacturesQueryDTO) => repoListFactures(filters);

export const svcGetFacture = (id: number) => repoGetFacture(id);

export async function svcCreateFacture(input: CreateFactureBodyDTO): Promise<FactureDetail> {
  const taxRate = input.taux_tva !== undefined ? toRate(input.taux_tva, "taux_tva") : settings.tvaRate;
  const ids = Array.from(new Set(input.expedition_ids));

  const facture = await withTransaction(async (tx) => {
    if (!(await repoClientExists(tx, input.client_id))) {
      throw new HttpError(404, "CLIENT_NOT_FOUND", "Client introuvable");
    }

    const expeditions = await repoLockExpeditionsForInvoice(tx, ids);
    const found = new Set(expeditions.map((e) => e.id));
    const missing = ids.filter((id) => !found.has(id));
    if (missing.length > 0) {
      throw new HttpError(404, "EXPEDITION_NOT_FOUND", "Expédition introuvable", { expedition_ids: missing });
    }

    const foreign = expeditions.filter((e) => e.client_id !== input.client_id);
    if (foreign.length > 0) {
      throw new HttpError(422, "EXPEDITION_CLIENT_MISMATCH", "Les expéditions doivent appartenir au client facturé", {
        expedition_ids: foreign.map((e) => e.id),
      });
    }

    const invoiced = expeditions.filter((e) => e.facture_id !== null);
    if (invoiced.length > 0) {
      throw new HttpError(409, "EXPEDITION_ALREADY_INVOICED", "Une expédition est déjà facturée", {
        expedition_ids: invoiced.map((e) => e.id),
      });
    }

    const totals = priceInvoiceFromExpeditions(expeditions, taxRate);
    const factureId = await repoInsertFacture(tx, {
      client_id: input.client_id,
      montant_ht: formatCents(totals.montant_ht),
      montant_tva: formatCents(totals.montant_tva),
      montant_ttc: formatCents(totals.montant_ttc),
      taux_tva: formatScaled(taxRate, RATE_SCALE),
      statut_paiement: "UNPAID",
      mode: input.mode,
    });
    await repoLinkExpeditions(tx, factureId, ids);
    await repoAdjustClientSolde(tx, input.client_id, formatCents(totals.montant_ttc));

    const out = await repoGetFacture(factureId, tx);
    if (!out) throw new Error(`Facture ${factureId} not readable after insert`);
    return out;
  });

  logger.info(`[facturation] facture ${facture.id} created for client ${facture.client_id} (${facture.montant_ttc} TTC)`);

  await eventBus.publish({
    type: "facture.created",
    facture_id: facture.id,
    client_id: facture.client_id,
    montant_ttc: facture.montant_ttc,
    at: facture.created_at,
  });

  return facture;
}

/** Drops the invoice and its payments; the client's balance loses what was still owed. */
export async function svcDeleteFacture(id: number): Promise<void> {
  await withTransaction(async (tx) => {
    const ledger = await repoGetFactureLedgerForUpdate(tx, id);
    if (!ledger) throw new NotFoundError("FACTURE_NOT_FOUND", "Facture introuvable");

    const owed = toCents(ledger.montant_ttc, "montant_ttc") - toCents(ledger.total_paye, "total_paye");
    await repoDeleteFacture(tx, id);
    await repoAdjustClientSolde(tx, ledger.client_id, formatCents(-owed));
    logger.info(`[facturation] facture ${id} deleted, client ${ledger.client_id} solde adjusted by ${formatCents(-owed)}`);
  });
}
