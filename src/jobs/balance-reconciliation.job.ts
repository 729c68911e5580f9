import logger from "../utils/logger";
import { withTransaction } from "../utils/transaction";
import {
  repoComputeExpectedSolde,
  repoListSoldeDrift,
  repoLockClientSolde,
  repoSetClientSolde,
} from "../module/facturation/repository/solde.repository";
import type { JobSummary } from "./scheduler";

/**
 * Brings every client's stored solde back to Σ TTC − Σ payments.
 * Drift is re-measured under the client row lock before anything is written.
 */
export async function runBalanceReconciliation(): Promise<JobSummary> {
  const candidates = await repoListSoldeDrift();
  let corrected = 0;

  for (const candidate of candidates) {
    const fixed = await withTransaction(async (tx) => {
      const stored = await repoLockClientSolde(tx, candidate.client_id);
      if (stored === null) return false;
      const expected = await repoComputeExpectedSolde(tx, candidate.client_id);
      if (stored === expected) return false;
      await repoSetClientSolde(tx, candidate.client_id, expected);
      logger.warn(`[jobs] client ${candidate.client_id} solde drift: stored ${stored}, expected ${expected}; corrected`);
      return true;
    });
    if (fixed) corrected += 1;
  }

  return { checked: candidates.length, corrected };
}
