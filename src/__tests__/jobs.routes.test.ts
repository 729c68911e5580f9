import request from "supertest";
import { beforeEach, describe, it, expect, vi } from "vitest";

const jobs = vi.hoisted(() => ({
  runStatusSweep: vi.fn(),
  runBalanceReconciliation: vi.fn(),
  runArchive: vi.fn(),
}));

vi.mock("pg", () => ({
  Pool: vi.fn(() => ({ on: vi.fn(), query: vi.fn(), connect: vi.fn() })),
}));

vi.mock("../jobs/status-sweep.job", () => ({ runStatusSweep: jobs.runStatusSweep }));
vi.mock("../jobs/balance-reconciliation.job", () => ({ runBalanceReconciliation: jobs.runBalanceReconciliation }));
vi.mock("../jobs/archive.job", () => ({ runArchive: jobs.runArchive }));

import app from "../config/app";
import { bearer } from "./helpers/tokens";

beforeEach(() => {
  vi.resetAllMocks();
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("/api/v1/jobs", () => {
  it("lists the registered jobs for admins", async () => {
    const res = await request(app).get("/api/v1/jobs").set("Authorization", bearer("admin"));

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ items: ["status-sweep", "balance-reconciliation", "archive"] });
  });

  it("is closed to agents", async () => {
    const res = await request(app).get("/api/v1/jobs").set("Authorization", bearer("agent"));

    expect(res.status).toBe(403);
  });

  it("runs a job on demand", async () => {
    jobs.runArchive.mockResolvedValueOnce({ archived: 2 });

    const res = await request(app).post("/api/v1/jobs/archive/run").set("Authorization", bearer("admin"));

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: "completed", job: "archive", summary: { archived: 2 } });
    expect(jobs.runArchive).toHaveBeenCalledTimes(1);
  });

  it("answers 409 while the same job is running", async () => {
    let release: () => void = () => undefined;
    jobs.runBalanceReconciliation.mockImplementationOnce(
      () =>
        new Promise((resolve) => {
          release = () => resolve({ checked: 0, corrected: 0 });
        })
    );

    const first = request(app).post("/api/v1/jobs/balance-reconciliation/run").set("Authorization", bearer("admin")).then((r) => r);
    await vi.waitFor(() => expect(jobs.runBalanceReconciliation).toHaveBeenCalledTimes(1));

    const second = await request(app).post("/api/v1/jobs/balance-reconciliation/run").set("Authorization", bearer("admin"));
    expect(second.status).toBe(409);
    expect(second.body).toEqual({ status: "skipped", job: "balance-reconciliation", reason: "already_running" });

    release();
    expect((await first).status).toBe(200);
  });

  it("answers 404 for an unknown job", async () => {
    const res = await request(app).post("/api/v1/jobs/nope/run").set("Authorization", bearer("admin"));

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "JOB_NOT_FOUND", message: "Tâche inconnue" });
  });
});
