import { InvalidTransition, UnknownStatus } from "../../../utils/errors";
import type { Actor } from "../../auth/types/auth.types";
import { EXPEDITION_STATUTS, type ExpeditionStatut } from "../types/expeditions.types";

const HAPPY_PATH: readonly ExpeditionStatut[] = ["CREATED", "IN_TRANSIT", "SORTING", "OUT_FOR_DELIVERY", "DELIVERED"];

const ALLOWED: Record<ExpeditionStatut, readonly ExpeditionStatut[]> = {
  CREATED: ["IN_TRANSIT", "SORTING", "OUT_FOR_DELIVERY", "DELIVERED", "FAILED"],
  IN_TRANSIT: ["SORTING", "OUT_FOR_DELIVERY", "DELIVERED", "FAILED"],
  SORTING: ["OUT_FOR_DELIVERY", "DELIVERED", "FAILED"],
  OUT_FOR_DELIVERY: ["DELIVERED", "FAILED"],
  DELIVERED: [],
  FAILED: [],
};

export function isExpeditionStatut(value: string): value is ExpeditionStatut {
  return EXPEDITION_STATUTS.some((s) => s === value);
}

/** Accepts "in_transit" as well as "IN_TRANSIT". */
export function parseStatut(value: string): ExpeditionStatut {
  const normalized = value.trim().toUpperCase();
  if (!isExpeditionStatut(normalized)) throw new UnknownStatus(value);
  return normalized;
}

export function isTerminal(statut: ExpeditionStatut): boolean {
  return ALLOWED[statut].length === 0;
}

/** Next step on the happy path; null once terminal. */
export function nextStatut(statut: ExpeditionStatut): ExpeditionStatut | null {
  if (isTerminal(statut)) return null;
  const idx = HAPPY_PATH.indexOf(statut);
  return HAPPY_PATH[idx + 1] ?? null;
}

export function assertAllowedTransition(from: ExpeditionStatut, to: ExpeditionStatut) {
  if (isTerminal(from)) throw new InvalidTransition(from, to, "terminal");
  if (!ALLOWED[from].includes(to)) throw new InvalidTransition(from, to);
}

/** The system actor (sweep, incident cascade) bypasses role checks. */
export function actorMayTransition(actor: Actor, to: ExpeditionStatut): boolean {
  if (actor.kind === "system") return true;
  if (to === "FAILED") return actor.role === "admin" || actor.role === "agent";
  return true;
}
