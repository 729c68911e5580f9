import request from "supertest";
import { beforeEach, describe, it, expect, vi } from "vitest";

const svc = vi.hoisted(() => ({
  svcListChauffeurs: vi.fn(),
  svcGetChauffeur: vi.fn(),
  svcCreateChauffeur: vi.fn(),
  svcUpdateChauffeur: vi.fn(),
  svcDeactivateChauffeur: vi.fn(),
}));

vi.mock("pg", () => ({
  Pool: vi.fn(() => ({ on: vi.fn(), query: vi.fn(), connect: vi.fn() })),
}));

vi.mock("../module/chauffeurs/services/chauffeurs.service", () => svc);

import app from "../config/app";
import { bearer } from "./helpers/tokens";

const body = { nom: "Martin", prenom: "Paul", numero_permis: " b-123456 ", date_embauche: "2025-09-01" };

beforeEach(() => {
  vi.resetAllMocks();
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("POST /api/v1/chauffeurs", () => {
  it("uppercases the licence and defaults to available", async () => {
    svc.svcCreateChauffeur.mockResolvedValueOnce({ id: 3, numero_permis: "B-123456" });

    const res = await request(app).post("/api/v1/chauffeurs").set("Authorization", bearer("agent")).send(body);

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ chauffeur: { id: 3, numero_permis: "B-123456" } });
    expect(svc.svcCreateChauffeur).toHaveBeenCalledWith({
      nom: "Martin",
      prenom: "Paul",
      numero_permis: "B-123456",
      disponibilite: true,
      date_embauche: "2025-09-01",
    });
  });

  it("rejects a licence with spaces inside", async () => {
    const res = await request(app)
      .post("/api/v1/chauffeurs")
      .set("Authorization", bearer("admin"))
      .send({ ...body, numero_permis: "B 123" });

    expect(res.status).toBe(400);
    expect(res.body.details.fieldErrors.numero_permis).toEqual(["Numéro de permis invalide"]);
  });

  it("is closed to drivers", async () => {
    const res = await request(app).post("/api/v1/chauffeurs").set("Authorization", bearer("chauffeur")).send(body);

    expect(res.status).toBe(403);
  });
});

describe("DELETE /api/v1/chauffeurs/:id", () => {
  it("is admin only", async () => {
    const res = await request(app).delete("/api/v1/chauffeurs/3").set("Authorization", bearer("agent"));

    expect(res.status).toBe(403);
    expect(svc.svcDeactivateChauffeur).not.toHaveBeenCalled();
  });

  it("deactivates as admin", async () => {
    svc.svcDeactivateChauffeur.mockResolvedValueOnce(true);

    const res = await request(app).delete("/api/v1/chauffeurs/3").set("Authorization", bearer("admin"));

    expect(res.status).toBe(204);
    expect(svc.svcDeactivateChauffeur).toHaveBeenCalledWith(3);
  });
});

describe("GET /api/v1/chauffeurs", () => {
  it("filters on availability", async () => {
    svc.svcListChauffeurs.mockResolvedValueOnce({ items: [], total: 0 });

    const res = await request(app).get("/api/v1/chauffeurs?disponibilite=false").set("Authorization", bearer("admin"));

    expect(res.status).toBe(200);
    expect(svc.svcListChauffeurs).toHaveBeenCalledWith(expect.objectContaining({ disponibilite: false, sortBy: "nom" }));
  });

  it("answers 404 for an unknown driver", async () => {
    svc.svcGetChauffeur.mockResolvedValueOnce(null);

    const res = await request(app).get("/api/v1/chauffeurs/42").set("Authorization", bearer("agent"));

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "CHAUFFEUR_NOT_FOUND", message: "Chauffeur introuvable" });
  });
});
