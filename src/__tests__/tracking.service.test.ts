import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  repoExpeditionVisible: vi.fn(),
  repoInsertTracking: vi.fn(),
  repoFindChauffeurIdByUser: vi.fn(),
}));

vi.mock("../module/tracking/repository/tracking.repository", () => ({
  repoExpeditionVisible: mocks.repoExpeditionVisible,
  repoInsertTracking: mocks.repoInsertTracking,
  repoListTracking: vi.fn(),
  repoGetTracking: vi.fn(),
  repoDeleteTracking: vi.fn(),
}));

vi.mock("../module/chauffeurs/repository/chauffeurs.repository", () => ({
  repoFindChauffeurIdByUser: mocks.repoFindChauffeurIdByUser,
}));

import { ALL_ACCESS, scopeForUser } from "../module/auth/lib/access-scope";
import { svcCreateTracking } from "../module/tracking/services/tracking.service";
import type { TrackingLog } from "../module/tracking/types/tracking.types";
import { ForbiddenError } from "../utils/errors";
import { userFor } from "./helpers/tokens";

function log(overrides: Partial<TrackingLog> = {}): TrackingLog {
  return {
    id: 50,
    expedition_id: 12,
    date: "2026-03-02T09:00:00.000Z",
    lieu: "Entrepôt Lyon",
    statut: "Arrivé au dépôt",
    commentaire: null,
    chauffeur_id: null,
    created_by: 4,
    created_at: "2026-03-02T09:00:00.000Z",
    ...overrides,
  };
}

const checkpoint = { expedition_id: 12, lieu: "Entrepôt Lyon", statut: "Arrivé au dépôt", chauffeur_id: 2 };

beforeEach(() => {
  vi.resetAllMocks();
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("svcCreateTracking", () => {
  it("records the driver behind the login, whatever the body says", async () => {
    const driver = userFor("chauffeur");
    mocks.repoExpeditionVisible.mockResolvedValueOnce(true);
    mocks.repoFindChauffeurIdByUser.mockResolvedValueOnce(8);
    mocks.repoInsertTracking.mockResolvedValueOnce(log({ chauffeur_id: 8, created_by: 7 }));

    const out = await svcCreateTracking(checkpoint, driver, scopeForUser(driver));

    expect(mocks.repoExpeditionVisible).toHaveBeenCalledWith(12, { kind: "chauffeur", userId: 7 });
    expect(mocks.repoInsertTracking).toHaveBeenCalledWith({
      expedition_id: 12,
      lieu: "Entrepôt Lyon",
      statut: "Arrivé au dépôt",
      commentaire: null,
      chauffeur_id: 8,
      created_by: 7,
      date: null,
    });
    expect(out.chauffeur_id).toBe(8);
  });

  it("keeps the chauffeur_id given by an agent", async () => {
    mocks.repoExpeditionVisible.mockResolvedValueOnce(true);
    mocks.repoInsertTracking.mockResolvedValueOnce(log({ chauffeur_id: 2 }));

    await svcCreateTracking({ ...checkpoint, date: "2026-03-02T08:30:00+01:00" }, userFor("agent"), ALL_ACCESS);

    expect(mocks.repoFindChauffeurIdByUser).not.toHaveBeenCalled();
    expect(mocks.repoInsertTracking).toHaveBeenCalledWith(
      expect.objectContaining({ chauffeur_id: 2, created_by: 4, date: "2026-03-02T08:30:00+01:00" })
    );
  });

  it("hides a shipment outside the caller's scope", async () => {
    mocks.repoExpeditionVisible.mockResolvedValueOnce(false);

    await expect(svcCreateTracking(checkpoint, userFor("agent"), scopeForUser(userFor("agent")))).rejects.toMatchObject({
      status: 404,
      code: "EXPEDITION_NOT_FOUND",
    });
    expect(mocks.repoInsertTracking).not.toHaveBeenCalled();
  });

  it("refuses a driver login with no driver profile", async () => {
    const driver = userFor("chauffeur");
    mocks.repoExpeditionVisible.mockResolvedValueOnce(true);
    mocks.repoFindChauffeurIdByUser.mockResolvedValueOnce(null);

    await expect(svcCreateTracking(checkpoint, driver, scopeForUser(driver))).rejects.toBeInstanceOf(ForbiddenError);
    expect(mocks.repoInsertTracking).not.toHaveBeenCalled();
  });
});
