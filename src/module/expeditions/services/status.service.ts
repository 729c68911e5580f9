import type { ExpeditionStatusChangedEvent } from "../../../events/domain-events";
import { ForbiddenError } from "../../../utils/errors";
import logger from "../../../utils/logger";
import type { DbQueryer } from "../../../utils/transaction";
import { toEventActor, type Actor } from "../../auth/types/auth.types";
import { actorMayTransition, assertAllowedTransition } from "../lib/status-machine";
import { repoInsertStatusHistory, repoUpdateExpeditionStatut } from "../repository/expeditions.repository";
import type { Expedition, ExpeditionStatut } from "../types/expeditions.types";

export type TransitionResult = {
  expedition: Expedition;
  event: ExpeditionStatusChangedEvent;
};

/**
 * Applies one transition on a row the caller has locked, inside the caller's
 * transaction. The event is returned, not published: callers publish it
 * once the transaction has committed.
 */
export async function applyTransition(
  tx: DbQueryer,
  current: Expedition,
  target: ExpeditionStatut,
  actor: Actor,
  notes: string | null = null,
  now: Date = new Date()
): Promise<TransitionResult> {
  assertAllowedTransition(current.statut, target);
  if (!actorMayTransition(actor, target)) {
    throw new ForbiddenError(`Rôle non autorisé pour passer en ${target}`);
  }

  const expedition = await repoUpdateExpeditionStatut(tx, current.id, target, now);
  await repoInsertStatusHistory(tx, {
    expedition_id: current.id,
    old_statut: current.statut,
    new_statut: target,
    actor_type: actor.kind,
    changed_by: actor.kind === "user" ? actor.id : null,
    notes,
    at: now,
  });

  logger.info(
    `[expeditions] ${current.numero} ${current.statut} -> ${target} (${actor.kind === "user" ? `user ${actor.id}` : `system: ${actor.reason}`})`
  );

  return {
    expedition,
    event: {
      type: "expedition.status_changed",
      expedition_id: current.id,
      numero: current.numero,
      client_id: current.client_id,
      old_statut: current.statut,
      new_statut: target,
      actor: toEventActor(actor),
      at: now.toISOString(),
    },
  };
}
