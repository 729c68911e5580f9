import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  tx: { query: vi.fn() },
  repoActiveClientExists: vi.fn(),
  repoForeignExpeditionIds: vi.fn(),
  repoInsertReclamation: vi.fn(),
  repoGetReclamationForUpdate: vi.fn(),
  repoUpdateReclamationStatut: vi.fn(),
}));

vi.mock("../utils/transaction", () => ({
  withTransaction: async <T>(fn: (tx: typeof mocks.tx) => Promise<T>) => fn(mocks.tx),
}));

vi.mock("../module/reclamations/repository/reclamations.repository", () => ({
  repoActiveClientExists: mocks.repoActiveClientExists,
  repoForeignExpeditionIds: mocks.repoForeignExpeditionIds,
  repoInsertReclamation: mocks.repoInsertReclamation,
  repoGetReclamationForUpdate: mocks.repoGetReclamationForUpdate,
  repoUpdateReclamationStatut: mocks.repoUpdateReclamationStatut,
  repoListReclamations: vi.fn(),
  repoGetReclamation: vi.fn(),
  repoReclamationStatistics: vi.fn(),
}));

import { eventBus, type DomainEvent } from "../events/domain-events";
import {
  svcCreateReclamation,
  svcUpdateReclamationStatus,
} from "../module/reclamations/services/reclamations.service";
import type { Reclamation } from "../module/reclamations/types/reclamations.types";

const agent = { kind: "user" as const, id: 4, role: "agent" as const };

function reclamation(overrides: Partial<Reclamation> = {}): Reclamation {
  return {
    id: 21,
    client_id: 2,
    date: "2026-03-05",
    nature: "Colis endommagé",
    statut: "OPEN",
    commentaire: null,
    expedition_ids: [12, 13],
    created_by: 4,
    created_at: "2026-03-05T10:00:00.000Z",
    updated_at: "2026-03-05T10:00:00.000Z",
    ...overrides,
  };
}

const complaint = { client_id: 2, nature: "Colis endommagé", expedition_ids: [12, 13] };

let published: DomainEvent[] = [];
let offs: Array<() => void> = [];

beforeEach(() => {
  vi.resetAllMocks();
  published = [];
  offs = [
    eventBus.subscribe("reclamation.created", (e) => void published.push(e)),
    eventBus.subscribe("reclamation.status_changed", (e) => void published.push(e)),
  ];
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

afterEach(() => {
  offs.forEach((off) => off());
  vi.restoreAllMocks();
});

describe("svcCreateReclamation", () => {
  it("links the client's shipments and announces the complaint", async () => {
    mocks.repoActiveClientExists.mockResolvedValueOnce(true);
    mocks.repoForeignExpeditionIds.mockResolvedValueOnce([]);
    mocks.repoInsertReclamation.mockResolvedValueOnce(reclamation());

    const out = await svcCreateReclamation(complaint, agent);

    expect(out.id).toBe(21);
    expect(mocks.repoForeignExpeditionIds).toHaveBeenCalledWith(mocks.tx, 2, [12, 13]);
    expect(mocks.repoInsertReclamation).toHaveBeenCalledWith(mocks.tx, {
      client_id: 2,
      nature: "Colis endommagé",
      commentaire: null,
      expedition_ids: [12, 13],
      created_by: 4,
    });
    expect(published).toEqual([
      {
        type: "reclamation.created",
        reclamation_id: 21,
        client_id: 2,
        nature: "Colis endommagé",
        expedition_ids: [12, 13],
        created_by: 4,
        at: "2026-03-05T10:00:00.000Z",
      },
    ]);
  });

  it("refuses a shipment of another client", async () => {
    mocks.repoActiveClientExists.mockResolvedValueOnce(true);
    mocks.repoForeignExpeditionIds.mockResolvedValueOnce([13]);

    await expect(svcCreateReclamation(complaint, agent)).rejects.toMatchObject({
      status: 422,
      code: "EXPEDITION_CLIENT_MISMATCH",
      details: { expedition_ids: [13] },
    });
    expect(mocks.repoInsertReclamation).not.toHaveBeenCalled();
    expect(published).toEqual([]);
  });

  it("reports an unknown or deactivated client", async () => {
    mocks.repoActiveClientExists.mockResolvedValueOnce(false);

    await expect(svcCreateReclamation(complaint, agent)).rejects.toMatchObject({ status: 404, code: "CLIENT_NOT_FOUND" });
    expect(mocks.repoForeignExpeditionIds).not.toHaveBeenCalled();
  });
});

describe("svcUpdateReclamationStatus", () => {
  it("resolves an open complaint once", async () => {
    mocks.repoGetReclamationForUpdate.mockResolvedValueOnce(reclamation());
    mocks.repoUpdateReclamationStatut.mockResolvedValueOnce(
      reclamation({ statut: "RESOLVED", commentaire: "Remboursé", updated_at: "2026-03-06T09:00:00.000Z" })
    );

    const out = await svcUpdateReclamationStatus(21, { statut: "RESOLVED", commentaire: "Remboursé" });

    expect(out.statut).toBe("RESOLVED");
    expect(mocks.repoUpdateReclamationStatut).toHaveBeenCalledWith(mocks.tx, 21, "RESOLVED", "Remboursé");
    expect(published).toEqual([
      {
        type: "reclamation.status_changed",
        reclamation_id: 21,
        client_id: 2,
        old_statut: "OPEN",
        new_statut: "RESOLVED",
        at: "2026-03-06T09:00:00.000Z",
      },
    ]);
  });

  it("refuses to reopen or move a closed complaint", async () => {
    mocks.repoGetReclamationForUpdate.mockResolvedValueOnce(reclamation({ statut: "CANCELLED" }));

    await expect(svcUpdateReclamationStatus(21, { statut: "RESOLVED" })).rejects.toMatchObject({
      status: 409,
      code: "RECLAMATION_STATUS_CONFLICT",
      details: { from: "CANCELLED", to: "RESOLVED" },
    });
    expect(mocks.repoUpdateReclamationStatut).not.toHaveBeenCalled();
    expect(published).toEqual([]);
  });

  it("treats OPEN as no change", async () => {
    mocks.repoGetReclamationForUpdate.mockResolvedValueOnce(reclamation());

    await expect(svcUpdateReclamationStatus(21, { statut: "OPEN" })).rejects.toMatchObject({ status: 409 });
  });

  it("answers 404 for an unknown complaint", async () => {
    mocks.repoGetReclamationForUpdate.mockResolvedValueOnce(null);

    await expect(svcUpdateReclamationStatus(99, { statut: "CANCELLED" })).rejects.toMatchObject({
      status: 404,
      code: "RECLAMATION_NOT_FOUND",
    });
  });
});
