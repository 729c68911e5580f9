import {
  eventBus,
  type ReclamationCreatedEvent,
  type ReclamationStatusChangedEvent,
} from "../../../events/domain-events";
import { NotFoundError } from "../../../utils/errors";
import { HttpError } from "../../../utils/httpError";
import logger from "../../../utils/logger";
import { withTransaction } from "../../../utils/transaction";
import type { Actor } from "../../auth/types/auth.types";
import {
  repoActiveClientExists,
  repoForeignExpeditionIds,
  repoGetReclamation,
  repoGetReclamationForUpdate,
  repoInsertReclamation,
  repoListReclamations,
  repoReclamationStatistics,
  repoUpdateReclamationStatut,
} from "../repository/reclamations.repository";
import type { Reclamation } from "../types/reclamations.types";
import type {
  CreateReclamationBodyDTO,
  ListReclamationsQueryDTO,
  ReclamationStatisticsQueryDTO,
  UpdateReclamationStatusBodyDTO,
} from "../validators/reclamations.validators";

export const svcListReclamations = (filters: ListReclamationsQueryDTO) => repoListReclamations(filters);

export const svcGetReclamation = (id: number) => repoGetReclamation(id);

export const svcReclamationStatistics = (query: ReclamationStatisticsQueryDTO) => repoReclamationStatistics(query.client_id);

/** Linked shipments must all belong to the complaining client. */
export async function svcCreateReclamation(input: CreateReclamationBodyDTO, actor: Actor): Promise<Reclamation> {
  const createdBy = actor.kind === "user" ? actor.id : null;

  const reclamation = await withTransaction(async (tx) => {
    if (!(await repoActiveClientExists(tx, input.client_id))) {
      throw new NotFoundError("CLIENT_NOT_FOUND", "Client introuvable");
    }
    const foreign = await repoForeignExpeditionIds(tx, input.client_id, input.expedition_ids);
    if (foreign.length > 0) {
      throw new HttpError(422, "EXPEDITION_CLIENT_MISMATCH", "Expéditions n'appartenant pas à ce client", {
        expedition_ids: foreign,
      });
    }
    return repoInsertReclamation(tx, {
      client_id: input.client_id,
      nature: input.nature,
      commentaire: input.commentaire ?? null,
      expedition_ids: input.expedition_ids,
      created_by: createdBy,
    });
  });

  const created: ReclamationCreatedEvent = {
    type: "reclamation.created",
    reclamation_id: reclamation.id,
    client_id: reclamation.client_id,
    nature: reclamation.nature,
    expedition_ids: reclamation.expedition_ids,
    created_by: createdBy,
    at: reclamation.created_at,
  };

  logger.info(`[reclamations] reclamation ${reclamation.id} opened for client ${reclamation.client_id}`);
  await eventBus.publish(created);
  return reclamation;
}

/** OPEN is the only state that moves; RESOLVED and CANCELLED are final. */
export async function svcUpdateReclamationStatus(id: number, input: UpdateReclamationStatusBodyDTO): Promise<Reclamation> {
  const { before, after } = await withTransaction(async (tx) => {
    const current = await repoGetReclamationForUpdate(tx, id);
    if (!current) throw new NotFoundError("RECLAMATION_NOT_FOUND", "Réclamation introuvable");
    if (current.statut !== "OPEN" || input.statut === "OPEN") {
      throw new HttpError(409, "RECLAMATION_STATUS_CONFLICT", `Réclamation ${current.statut} : passage à ${input.statut} impossible`, {
        from: current.statut,
        to: input.statut,
      });
    }
    const after = await repoUpdateReclamationStatut(tx, id, input.statut, input.commentaire);
    return { before: current, after };
  });

  const changed: ReclamationStatusChangedEvent = {
    type: "reclamation.status_changed",
    reclamation_id: after.id,
    client_id: after.client_id,
    old_statut: before.statut,
    new_statut: after.statut,
    at: after.updated_at,
  };

  logger.info(`[reclamations] reclamation ${after.id} ${before.statut} -> ${after.statut}`);
  await eventBus.publish(changed);
  return after;
}
