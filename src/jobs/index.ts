import { settings } from "../config/settings";
import { runArchive } from "./archive.job";
import { runBalanceReconciliation } from "./balance-reconciliation.job";
import { JobScheduler } from "./scheduler";
import { runStatusSweep } from "./status-sweep.job";

const MINUTE_MS = 60 * 1000;

export const JOB_NAMES = ["status-sweep", "balance-reconciliation", "archive"] as const;

export function createJobScheduler(config = settings): JobScheduler {
  return new JobScheduler()
    .register({
      name: "status-sweep",
      intervalMs: config.SWEEP_INTERVAL_MINUTES * MINUTE_MS,
      run: () => runStatusSweep(),
    })
    .register({
      name: "balance-reconciliation",
      intervalMs: config.RECONCILE_INTERVAL_MINUTES * MINUTE_MS,
      run: runBalanceReconciliation,
    })
    .register({
      name: "archive",
      intervalMs: 24 * 60 * MINUTE_MS,
      run: () => runArchive(),
    });
}

export const jobScheduler = createJobScheduler();
