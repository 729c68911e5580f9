import request from "supertest";
import { beforeEach, describe, it, expect, vi } from "vitest";

const svc = vi.hoisted(() => ({
  svcListVehicules: vi.fn(),
  svcGetVehicule: vi.fn(),
  svcCreateVehicule: vi.fn(),
  svcUpdateVehicule: vi.fn(),
  svcDeactivateVehicule: vi.fn(),
}));

vi.mock("pg", () => ({
  Pool: vi.fn(() => ({ on: vi.fn(), query: vi.fn(), connect: vi.fn() })),
}));

vi.mock("../module/vehicules/services/vehicules.service", () => svc);

import app from "../config/app";
import { bearer } from "./helpers/tokens";

const body = { immatriculation: "ab-123-cd", type: "Fourgon", capacite: 1200, consommation: "9.5" };

beforeEach(() => {
  vi.resetAllMocks();
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("POST /api/v1/vehicules", () => {
  it("normalises the plate and starts AVAILABLE", async () => {
    svc.svcCreateVehicule.mockResolvedValueOnce({ id: 5, immatriculation: "AB-123-CD" });

    const res = await request(app).post("/api/v1/vehicules").set("Authorization", bearer("admin")).send(body);

    expect(res.status).toBe(201);
    expect(svc.svcCreateVehicule).toHaveBeenCalledWith({
      immatriculation: "AB-123-CD",
      type: "Fourgon",
      capacite: "1200",
      consommation: "9.5",
      etat: "AVAILABLE",
    });
  });

  it("rejects a consumption the column cannot hold", async () => {
    const res = await request(app)
      .post("/api/v1/vehicules")
      .set("Authorization", bearer("admin"))
      .send({ ...body, consommation: "10000" });

    expect(res.status).toBe(400);
    expect(res.body.details.fieldErrors.consommation).toEqual(["consommation ne peut pas dépasser 9999.99"]);
    expect(svc.svcCreateVehicule).not.toHaveBeenCalled();
  });

  it("rejects an unknown state", async () => {
    const res = await request(app)
      .post("/api/v1/vehicules")
      .set("Authorization", bearer("agent"))
      .send({ ...body, etat: "BROKEN" });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("VALIDATION_ERROR");
  });
});

describe("PATCH /api/v1/vehicules/:id", () => {
  it("sends maintenance through", async () => {
    svc.svcUpdateVehicule.mockResolvedValueOnce({ id: 5, etat: "MAINTENANCE" });

    const res = await request(app)
      .patch("/api/v1/vehicules/5")
      .set("Authorization", bearer("agent"))
      .send({ etat: "MAINTENANCE" });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ vehicule: { id: 5, etat: "MAINTENANCE" } });
    expect(svc.svcUpdateVehicule).toHaveBeenCalledWith(5, { etat: "MAINTENANCE" });
  });

  it("answers 404 for an unknown vehicle", async () => {
    svc.svcUpdateVehicule.mockResolvedValueOnce(null);

    const res = await request(app).patch("/api/v1/vehicules/5").set("Authorization", bearer("admin")).send({ type: "Porteur" });

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "VEHICULE_NOT_FOUND", message: "Véhicule introuvable" });
  });
});

describe("GET /api/v1/vehicules", () => {
  it("is closed to drivers", async () => {
    const res = await request(app).get("/api/v1/vehicules").set("Authorization", bearer("chauffeur"));

    expect(res.status).toBe(403);
    expect(svc.svcListVehicules).not.toHaveBeenCalled();
  });
});
