import { eventBus } from "../../../events/domain-events";
import { formatCents, toCents } from "../../../utils/decimal";
import { DuplicateIdentifier, NotFoundError, PricingRequired, TariffNotFound } from "../../../utils/errors";
import { HttpError } from "../../../utils/httpError";
import logger from "../../../utils/logger";
import { getPgErrorInfo } from "../../../utils/pg";
import { withSavepoint, withTransaction, type DbQueryer } from "../../../utils/transaction";
import { ALL_ACCESS, type AccessScope } from "../../auth/lib/access-scope";
import type { Actor } from "../../auth/types/auth.types";
import { repoGetTypeServiceNom } from "../../tarification/repository/tarification.repository";
import { svcPriceExpedition } from "../../tarification/services/tarification.service";
import { RuleBasedPredictor, type DeliveryTimePredictor } from "../lib/predictor";
import { isTerminal, nextStatut, parseStatut } from "../lib/status-machine";
import {
  repoClientExists,
  repoGetExpedition,
  repoGetExpeditionForUpdate,
  repoInsertExpedition,
  repoListExpeditions,
  repoListStatusHistory,
  repoNextNumero,
  repoSetPrediction,
  type InsertExpeditionRow,
} from "../repository/expeditions.repository";
import type { Expedition, ExpeditionStatut } from "../types/expeditions.types";
import type { CreateExpeditionBodyDTO, ListExpeditionsQueryDTO } from "../validators/expeditions.validators";
import { applyTransition, type TransitionResult } from "./status.service";

let predictor: DeliveryTimePredictor = new RuleBasedPredictor();

export function setDeliveryTimePredictor(next: DeliveryTimePredictor) {
  predictor = next;
}

function isNumeroCollision(err: unknown): boolean {
  const { code, constraint } = getPgErrorInfo(err);
  return code === "23505" && constraint === "expedition_numero_key";
}

async function insertOnce(tx: DbQueryer, row: Omit<InsertExpeditionRow, "numero">, numero: string) {
  return withSavepoint(tx, "expedition_numero", () => repoInsertExpedition(tx, { ...row, numero }));
}

/** Sequence-backed numero; one retry with a fresh value on a unique violation. */
async function insertWithNumero(tx: DbQueryer, row: Omit<InsertExpeditionRow, "numero">): Promise<Expedition> {
  const first = await repoNextNumero(tx);
  try {
    return await insertOnce(tx, row, first);
  } catch (err) {
    if (!isNumeroCollision(err)) throw err;
    logger.warn(`[expeditions] numero ${first} already taken, retrying`);
  }

  const second = await repoNextNumero(tx);
  try {
    return await insertOnce(tx, row, second);
  } catch (err) {
    if (isNumeroCollision(err)) throw new DuplicateIdentifier(second);
    throw err;
  }
}

/** Tariff price in cents; a caller-supplied amount is only used when no tariff exists. */
async function resolveMontant(tx: DbQueryer, input: CreateExpeditionBodyDTO): Promise<bigint> {
  try {
    return await svcPriceExpedition(input.type_service_id, input.destination_id, input.poids, input.volume, tx);
  } catch (err) {
    if (!(err instanceof TariffNotFound)) throw err;
    if (input.montant === undefined) {
      throw new PricingRequired(input.type_service_id, input.destination_id);
    }
    logger.info(
      `[expeditions] no tariff for service ${input.type_service_id} / destination ${input.destination_id}, using supplied montant`
    );
    return toCents(input.montant, "montant");
  }
}

async function attachPrediction(expedition: Expedition): Promise<Expedition> {
  try {
    const typeServiceNom = await repoGetTypeServiceNom(expedition.type_service_id);
    const hours = await predictor.predict({
      poids: expedition.poids,
      volume: expedition.volume,
      type_service_nom: typeServiceNom,
    });
    if (hours === null) return expedition;
    const predicted = await repoSetPrediction(expedition.id, hours);
    return { ...expedition, predicted_delivery_time: predicted };
  } catch (err) {
    logger.error(`[expeditions] delivery-time prediction failed for ${expedition.numero}`, err);
    return expedition;
  }
}

export async function svcCreateExpedition(input: CreateExpeditionBodyDTO, actor: Actor): Promise<Expedition> {
  const agentId =
    actor.kind === "user" && actor.role === "agent" ? actor.id : input.agent_responsable_id ?? null;

  const created = await withTransaction(async (tx) => {
    if (!(await repoClientExists(tx, input.client_id, { activeOnly: true }))) {
      throw new HttpError(404, "CLIENT_NOT_FOUND", "Client introuvable");
    }
    const montant = await resolveMontant(tx, input);
    return insertWithNumero(tx, {
      client_id: input.client_id,
      type_service_id: input.type_service_id,
      destination_id: input.destination_id,
      poids: input.poids,
      volume: input.volume,
      description: input.description ?? null,
      montant: formatCents(montant),
      agent_responsable_id: agentId,
    });
  });

  logger.info(`[expeditions] created ${created.numero} for client ${created.client_id} (${created.montant})`);

  const expedition = await attachPrediction(created);

  await eventBus.publish({
    type: "expedition.created",
    expedition_id: expedition.id,
    numero: expedition.numero,
    client_id: expedition.client_id,
    agent_responsable_id: expedition.agent_responsable_id,
    montant: expedition.montant,
    at: expedition.date_creation,
  });

  return expedition;
}

export async function svcListExpeditions(filters: ListExpeditionsQueryDTO, scope: AccessScope) {
  const statut = filters.statut ? parseStatut(filters.statut) : undefined;
  return repoListExpeditions(filters, statut, scope);
}

export const svcGetExpedition = (id: number, scope: AccessScope, include?: string) => repoGetExpedition(id, scope, include);

export async function svcGetStatusHistory(id: number, scope: AccessScope) {
  const expedition = await repoGetExpedition(id, scope, "");
  if (!expedition) throw new NotFoundError("EXPEDITION_NOT_FOUND", "Expédition introuvable");
  return repoListStatusHistory(id);
}

export async function svcTransitionExpedition(
  id: number,
  targetRaw: string,
  actor: Actor,
  scope: AccessScope,
  notes: string | null = null
): Promise<Expedition> {
  const target = parseStatut(targetRaw);

  const { expedition, event } = await withTransaction(async (tx) => {
    const current = await repoGetExpeditionForUpdate(tx, id, scope);
    if (!current) throw new NotFoundError("EXPEDITION_NOT_FOUND", "Expédition introuvable");
    return applyTransition(tx, current, target, actor, notes);
  });

  await eventBus.publish(event);
  return expedition;
}

/**
 * Moves a shipment one step forward only if it is still in `expected`.
 * Returns null (skip) when it moved meanwhile or is terminal.
 */
export async function svcAdvanceIfStill(
  id: number,
  expected: ExpeditionStatut,
  actor: Actor,
  notes: string | null = null
): Promise<TransitionResult | null> {
  const result = await withTransaction(async (tx) => {
    const current = await repoGetExpeditionForUpdate(tx, id, ALL_ACCESS);
    if (!current || current.statut !== expected || isTerminal(current.statut)) return null;
    const target = nextStatut(current.statut);
    if (!target) return null;
    return applyTransition(tx, current, target, actor, notes);
  });

  if (result) await eventBus.publish(result.event);
  return result;
}
