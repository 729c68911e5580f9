import { ForbiddenError, NotFoundError } from "../../../utils/errors";
import logger from "../../../utils/logger";
import type { AccessScope } from "../../auth/lib/access-scope";
import type { AuthUser } from "../../auth/types/auth.types";
import { repoFindChauffeurIdByUser } from "../../chauffeurs/repository/chauffeurs.repository";
import {
  repoDeleteTracking,
  repoExpeditionVisible,
  repoGetTracking,
  repoInsertTracking,
  repoListTracking,
} from "../repository/tracking.repository";
import type { TrackingLog } from "../types/tracking.types";
import type { CreateTrackingBodyDTO, ListTrackingQueryDTO } from "../validators/tracking.validators";

export const svcListTracking = (filters: ListTrackingQueryDTO, scope: AccessScope) => repoListTracking(filters, scope);

export const svcGetTracking = (id: number, scope: AccessScope) => repoGetTracking(id, scope);

/**
 * Appends a checkpoint to a visible shipment. A driver is recorded as the
 * chauffeur whatever the body says. The shipment status is left untouched.
 */
export async function svcCreateTracking(
  input: CreateTrackingBodyDTO,
  user: Pick<AuthUser, "id" | "role">,
  scope: AccessScope
): Promise<TrackingLog> {
  if (!(await repoExpeditionVisible(input.expedition_id, scope))) {
    throw new NotFoundError("EXPEDITION_NOT_FOUND", "Expédition introuvable");
  }

  let chauffeurId = input.chauffeur_id ?? null;
  if (user.role === "chauffeur") {
    chauffeurId = await repoFindChauffeurIdByUser(user.id);
    if (chauffeurId === null) throw new ForbiddenError("Aucun chauffeur associé à cet utilisateur");
  }

  const log = await repoInsertTracking({
    expedition_id: input.expedition_id,
    lieu: input.lieu,
    statut: input.statut,
    commentaire: input.commentaire ?? null,
    chauffeur_id: chauffeurId,
    created_by: user.id,
    date: input.date ?? null,
  });
  logger.info(`[tracking] expedition ${log.expedition_id}: ${log.statut} at ${log.lieu}`);
  return log;
}

export const svcDeleteTracking = (id: number) => repoDeleteTracking(id);
