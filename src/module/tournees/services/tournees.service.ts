import { settings } from "../../../config/settings";
import { formatCents, parseScaled } from "../../../utils/decimal";
import { NotFoundError } from "../../../utils/errors";
import { HttpError } from "../../../utils/httpError";
import logger from "../../../utils/logger";
import { withTransaction, type DbQueryer } from "../../../utils/transaction";
import { ALL_ACCESS, type AccessScope } from "../../auth/lib/access-scope";
import { isTerminal } from "../../expeditions/lib/status-machine";
import {
  repoGetExpedition,
  repoGetExpeditionForUpdate,
  repoListExpeditionsOfTournee,
  repoSetExpeditionTournee,
} from "../../expeditions/repository/expeditions.repository";
import { perExpeditionEstimator, recompute, type DistanceEstimator } from "../lib/aggregate";
import { buildTourneeReport } from "../lib/report";
import {
  repoCountTourneeExpeditions,
  repoCreateTournee,
  repoDeleteTournee,
  repoGetTournee,
  repoGetTourneeForUpdate,
  repoListTournees,
  repoSaveTourneeTotals,
  repoUpdateTourneeHeader,
} from "../repository/tournees.repository";
import type { Tournee, TourneeDetail, TourneeForUpdate, TourneeReport } from "../types/tournees.types";
import type { CreateTourneeBodyDTO, ListTourneesQueryDTO, UpdateTourneeBodyDTO } from "../validators/tournees.validators";

let estimateDistance: DistanceEstimator = perExpeditionEstimator(settings.tourKmPerExpedition);

export function setDistanceEstimator(next: DistanceEstimator) {
  estimateDistance = next;
}

const tourneeNotFound = () => new NotFoundError("TOURNEE_NOT_FOUND", "Tournée introuvable");
const expeditionNotFound = () => new NotFoundError("EXPEDITION_NOT_FOUND", "Expédition introuvable");

/** Caller holds the tour lock. */
async function recomputeLocked(tx: DbQueryer, tournee: TourneeForUpdate): Promise<Tournee> {
  const count = await repoCountTourneeExpeditions(tx, tournee.id);
  const totals = recompute(
    {
      kilometrage: parseScaled(tournee.kilometrage, 2, "kilometrage"),
      kilometrage_manuel: tournee.kilometrage_manuel,
      consommation: parseScaled(tournee.consommation, 2, "consommation"),
      consommation_manuelle: tournee.consommation_manuelle,
    },
    count,
    parseScaled(tournee.vehicule_consommation, 2, "vehicule.consommation"),
    estimateDistance
  );
  const saved = await repoSaveTourneeTotals(tx, tournee.id, totals);
  logger.info(
    `[tournees] tournee ${tournee.id} recomputed: ${count} expedition(s), ${formatCents(totals.kilometrage)} km, ${formatCents(totals.consommation)} L`
  );
  return saved;
}

async function lockTournee(tx: DbQueryer, id: number): Promise<TourneeForUpdate> {
  const tournee = await repoGetTourneeForUpdate(tx, id);
  if (!tournee) throw tourneeNotFound();
  return tournee;
}

export async function svcCreateTournee(input: CreateTourneeBodyDTO): Promise<Tournee> {
  const tournee = await repoCreateTournee(input);
  logger.info(`[tournees] created tournee ${tournee.id} on ${tournee.date}`);
  return tournee;
}

export const svcListTournees = (filters: ListTourneesQueryDTO, scope: AccessScope) => repoListTournees(filters, scope);

export async function svcGetTournee(id: number, scope: AccessScope): Promise<TourneeDetail | null> {
  const tournee = await repoGetTournee(id, scope);
  if (!tournee) return null;
  const expeditions = await repoListExpeditionsOfTournee(id);
  return { ...tournee, expeditions };
}

export async function svcRecomputeTournee(id: number): Promise<Tournee> {
  return withTransaction(async (tx) => recomputeLocked(tx, await lockTournee(tx, id)));
}

export async function svcUpdateTournee(id: number, patch: UpdateTourneeBodyDTO): Promise<Tournee> {
  return withTransaction(async (tx) => {
    await lockTournee(tx, id);
    await repoUpdateTourneeHeader(tx, id, patch);
    // re-read: the vehicle, and so its consumption rate, may have changed
    return recomputeLocked(tx, await lockTournee(tx, id));
  });
}

export async function svcDeleteTournee(id: number): Promise<boolean> {
  return withTransaction(async (tx) => {
    const tournee = await repoGetTourneeForUpdate(tx, id);
    if (!tournee) return false;
    return repoDeleteTournee(tx, id);
  });
}

/** Lock order: tour, then shipment. */
export async function svcAddExpeditionToTournee(tourneeId: number, expeditionId: number): Promise<Tournee> {
  return withTransaction(async (tx) => {
    const tournee = await lockTournee(tx, tourneeId);
    const expedition = await repoGetExpeditionForUpdate(tx, expeditionId, ALL_ACCESS);
    if (!expedition) throw expeditionNotFound();

    if (expedition.tournee_id === tourneeId) return recomputeLocked(tx, tournee);
    if (expedition.tournee_id !== null) {
      throw new HttpError(409, "EXPEDITION_ALREADY_ASSIGNED", "Expédition déjà affectée à une autre tournée", {
        tournee_id: expedition.tournee_id,
      });
    }
    if (isTerminal(expedition.statut)) {
      throw new HttpError(409, "EXPEDITION_TERMINAL", `Expédition ${expedition.numero} déjà clôturée (${expedition.statut})`);
    }

    await repoSetExpeditionTournee(tx, expeditionId, tourneeId);
    logger.info(`[tournees] ${expedition.numero} added to tournee ${tourneeId}`);
    return recomputeLocked(tx, tournee);
  });
}

export async function svcRemoveExpeditionFromTournee(tourneeId: number, expeditionId: number): Promise<Tournee> {
  return withTransaction(async (tx) => {
    const tournee = await lockTournee(tx, tourneeId);
    const expedition = await repoGetExpeditionForUpdate(tx, expeditionId, ALL_ACCESS);
    if (!expedition) throw expeditionNotFound();
    if (expedition.tournee_id !== tourneeId) {
      throw new HttpError(404, "EXPEDITION_NOT_IN_TOURNEE", "Expédition absente de cette tournée");
    }

    await repoSetExpeditionTournee(tx, expeditionId, null);
    logger.info(`[tournees] ${expedition.numero} removed from tournee ${tourneeId}`);
    return recomputeLocked(tx, tournee);
  });
}

/** Shipment-side detach: resolves the current tour, then goes through the tour lock. */
export async function svcDetachExpedition(expeditionId: number): Promise<Tournee | null> {
  const expedition = await repoGetExpedition(expeditionId, ALL_ACCESS, "");
  if (!expedition) throw expeditionNotFound();
  if (expedition.tournee_id === null) return null;
  return svcRemoveExpeditionFromTournee(expedition.tournee_id, expeditionId);
}

export async function svcTourneeReport(id: number, scope: AccessScope): Promise<TourneeReport | null> {
  const tournee = await repoGetTournee(id, scope);
  if (!tournee) return null;
  const expeditions = await repoListExpeditionsOfTournee(id);
  return buildTourneeReport(tournee, expeditions);
}
