import {
  eventBus,
  type DomainEvent,
  type IncidentCreatedEvent,
  type IncidentResolvedEvent,
} from "../../../events/domain-events";
import { NotFoundError } from "../../../utils/errors";
import { HttpError } from "../../../utils/httpError";
import logger from "../../../utils/logger";
import { withTransaction } from "../../../utils/transaction";
import type { AccessScope } from "../../auth/lib/access-scope";
import { systemActor, type Actor } from "../../auth/types/auth.types";
import { isTerminal } from "../../expeditions/lib/status-machine";
import { repoGetExpeditionForUpdate } from "../../expeditions/repository/expeditions.repository";
import { applyTransition } from "../../expeditions/services/status.service";
import {
  repoExpeditionClientId,
  repoGetIncident,
  repoGetIncidentForUpdate,
  repoInsertIncident,
  repoListIncidents,
  repoResolveIncident,
} from "../repository/incidents.repository";
import type { Incident } from "../types/incidents.types";
import type { CreateIncidentBodyDTO, ListIncidentsQueryDTO, ResolveIncidentBodyDTO } from "../validators/incidents.validators";

export const svcListIncidents = (filters: ListIncidentsQueryDTO, scope: AccessScope) => repoListIncidents(filters, scope);

export const svcGetIncident = (id: number, scope: AccessScope) => repoGetIncident(id, scope);

/**
 * Records the incident. A CRITICAL one on a live shipment fails that shipment
 * in the same transaction, as the system actor.
 */
export async function svcCreateIncident(input: CreateIncidentBodyDTO, actor: Actor, scope: AccessScope): Promise<Incident> {
  const createdBy = actor.kind === "user" ? actor.id : null;

  const { incident, events } = await withTransaction(async (tx) => {
    const expedition =
      input.expedition_id != null ? await repoGetExpeditionForUpdate(tx, input.expedition_id, scope) : null;
    if (input.expedition_id != null && !expedition) {
      throw new NotFoundError("EXPEDITION_NOT_FOUND", "Expédition introuvable");
    }

    const incident = await repoInsertIncident(tx, {
      type: input.type,
      severite: input.severite,
      priorite: input.priorite,
      expedition_id: input.expedition_id ?? null,
      tournee_id: input.tournee_id ?? null,
      commentaire: input.commentaire ?? null,
      created_by: createdBy,
    });

    const created: IncidentCreatedEvent = {
      type: "incident.created",
      incident_id: incident.id,
      incident_type: incident.type,
      severite: incident.severite,
      expedition_id: incident.expedition_id,
      tournee_id: incident.tournee_id,
      client_id: expedition ? expedition.client_id : null,
      created_by: createdBy,
      at: incident.created_at,
    };
    const events: DomainEvent[] = [created];

    if (incident.severite === "CRITICAL" && expedition) {
      if (isTerminal(expedition.statut)) {
        logger.warn(
          `[incidents] critical incident ${incident.id}: ${expedition.numero} already ${expedition.statut}, left as is`
        );
      } else {
        const { event } = await applyTransition(
          tx,
          expedition,
          "FAILED",
          systemActor(`incident ${incident.id} CRITICAL`),
          `Incident critique #${incident.id}`
        );
        events.push(event);
      }
    }

    return { incident, events };
  });

  logger.info(`[incidents] incident ${incident.id} (${incident.type}/${incident.severite}) created`);
  await eventBus.publishAll(events);
  return incident;
}

export async function svcResolveIncident(id: number, input: ResolveIncidentBodyDTO): Promise<Incident> {
  const incident = await withTransaction(async (tx) => {
    const current = await repoGetIncidentForUpdate(tx, id);
    if (!current) throw new NotFoundError("INCIDENT_NOT_FOUND", "Incident introuvable");
    if (current.date_resolution !== null) {
      throw new HttpError(409, "INCIDENT_ALREADY_RESOLVED", "Incident déjà résolu", {
        date_resolution: current.date_resolution,
      });
    }
    return repoResolveIncident(tx, id, input.resolution_details, new Date());
  });

  const clientId = incident.expedition_id !== null ? await repoExpeditionClientId(incident.expedition_id) : null;
  const resolved: IncidentResolvedEvent = {
    type: "incident.resolved",
    incident_id: incident.id,
    expedition_id: incident.expedition_id,
    client_id: clientId,
    at: incident.date_resolution ?? incident.updated_at,
  };

  logger.info(`[incidents] incident ${incident.id} resolved`);
  await eventBus.publish(resolved);
  return incident;
}
