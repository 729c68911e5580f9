import { settings } from "../config/settings";
import { repoArchiveDeliveredBefore } from "../module/expeditions/repository/expeditions.repository";
import type { JobSummary } from "./scheduler";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Delivered shipments older than the cutoff leave the active lists. */
export async function runArchive(now: Date = new Date(), afterDays: number = settings.ARCHIVE_AFTER_DAYS): Promise<JobSummary> {
  const archived = await repoArchiveDeliveredBefore(new Date(now.getTime() - afterDays * DAY_MS));
  return { archived };
}
