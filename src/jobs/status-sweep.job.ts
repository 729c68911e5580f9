import { settings, type Settings } from "../config/settings";
import logger from "../utils/logger";
import { systemActor } from "../module/auth/types/auth.types";
import { repoFindStaleExpeditionIds } from "../module/expeditions/repository/expeditions.repository";
import { svcAdvanceIfStill } from "../module/expeditions/services/expeditions.service";
import type { ExpeditionStatut } from "../module/expeditions/types/expeditions.types";
import type { JobSummary } from "./scheduler";

const HOUR_MS = 60 * 60 * 1000;

export type SweepRule = { from: ExpeditionStatut; afterMs: number };

/** How long a shipment may sit in each status before the sweep moves it one step. */
export function sweepRules(
  config: Pick<
    Settings,
    | "SWEEP_CREATED_TO_TRANSIT_HOURS"
    | "SWEEP_TRANSIT_TO_SORTING_HOURS"
    | "SWEEP_SORTING_TO_DELIVERY_HOURS"
    | "SWEEP_AUTO_DELIVER_DAYS"
  > = settings
): SweepRule[] {
  const rules: SweepRule[] = [
    { from: "CREATED", afterMs: config.SWEEP_CREATED_TO_TRANSIT_HOURS * HOUR_MS },
    { from: "IN_TRANSIT", afterMs: config.SWEEP_TRANSIT_TO_SORTING_HOURS * HOUR_MS },
    { from: "SORTING", afterMs: config.SWEEP_SORTING_TO_DELIVERY_HOURS * HOUR_MS },
  ];
  // 0 turns automatic delivery off.
  if (config.SWEEP_AUTO_DELIVER_DAYS > 0) {
    rules.push({ from: "OUT_FOR_DELIVERY", afterMs: config.SWEEP_AUTO_DELIVER_DAYS * 24 * HOUR_MS });
  }
  return rules;
}

export async function runStatusSweep(now: Date = new Date(), rules: SweepRule[] = sweepRules()): Promise<JobSummary> {
  let advanced = 0;
  let skipped = 0;
  let failed = 0;
  const actor = systemActor("status sweep");

  for (const rule of rules) {
    const ids = await repoFindStaleExpeditionIds(rule.from, new Date(now.getTime() - rule.afterMs));
    for (const id of ids) {
      try {
        const result = await svcAdvanceIfStill(id, rule.from, actor, "Avancement automatique");
        if (result) advanced += 1;
        else skipped += 1;
      } catch (err) {
        failed += 1;
        logger.error(`[jobs] status sweep could not advance expedition ${id}`, err);
      }
    }
  }

  return { advanced, skipped, failed };
}
