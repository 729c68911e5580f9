import { formatCents, parseScaled, sumCents } from "../../../utils/decimal";
import type { Expedition, ExpeditionStatut } from "../../expeditions/types/expeditions.types";
import type { TourneeListItem, TourneeReport } from "../types/tournees.types";

function emptyBreakdown(): Record<ExpeditionStatut, number> {
  return { CREATED: 0, IN_TRANSIT: 0, SORTING: 0, OUT_FOR_DELIVERY: 0, DELIVERED: 0, FAILED: 0 };
}

export function buildTourneeReport(tournee: TourneeListItem, expeditions: readonly Expedition[]): TourneeReport {
  const breakdown = emptyBreakdown();
  for (const e of expeditions) breakdown[e.statut] += 1;

  return {
    tournee_id: tournee.id,
    date: tournee.date,
    chauffeur: tournee.chauffeur ? `${tournee.chauffeur.nom} ${tournee.chauffeur.prenom}` : null,
    vehicule: tournee.vehicule?.immatriculation ?? null,
    total_expeditions: expeditions.length,
    total_poids: formatCents(sumCents(expeditions.map((e) => parseScaled(e.poids, 2, "poids")))),
    total_volume: formatCents(sumCents(expeditions.map((e) => parseScaled(e.volume, 2, "volume")))),
    chiffre_affaires: formatCents(sumCents(expeditions.map((e) => parseScaled(e.montant, 2, "montant")))),
    kilometrage: tournee.kilometrage,
    consommation: tournee.consommation,
    status_breakdown: breakdown,
  };
}
