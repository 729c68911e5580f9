import request from "supertest";
import { beforeEach, describe, it, expect, vi } from "vitest";

const svc = vi.hoisted(() => ({
  svcRateFor: vi.fn(),
  svcPriceExpedition: vi.fn(),
  svcQuote: vi.fn(),
  svcListTarifications: vi.fn(),
  svcGetTarification: vi.fn(),
  svcCreateTarification: vi.fn(),
  svcUpdateTarification: vi.fn(),
  svcDeactivateTarification: vi.fn(),
  svcListDestinations: vi.fn(),
  svcListTypesService: vi.fn(),
  svcCreateDestination: vi.fn(),
  svcUpdateDestination: vi.fn(),
  svcCreateTypeService: vi.fn(),
  svcUpdateTypeService: vi.fn(),
  rateFromRow: vi.fn(),
}));

vi.mock("pg", () => ({
  Pool: vi.fn(() => ({ on: vi.fn(), query: vi.fn(), connect: vi.fn() })),
}));

vi.mock("../module/tarification/services/tarification.service", () => svc);

import app from "../config/app";
import { bearer } from "./helpers/tokens";

const destination = { ville: " Lyon ", pays: "France", zone_geographique: "EU-Ouest", tarif_base: 12.5 };

beforeEach(() => {
  vi.resetAllMocks();
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("POST /api/v1/tarifs/destinations", () => {
  it("creates as admin", async () => {
    svc.svcCreateDestination.mockResolvedValueOnce({ id: 3, ville: "Lyon" });

    const res = await request(app).post("/api/v1/tarifs/destinations").set("Authorization", bearer("admin")).send(destination);

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ destination: { id: 3, ville: "Lyon" } });
    expect(svc.svcCreateDestination).toHaveBeenCalledWith({
      ville: "Lyon",
      pays: "France",
      zone_geographique: "EU-Ouest",
      tarif_base: "12.5",
    });
  });

  it("is admin only", async () => {
    const res = await request(app).post("/api/v1/tarifs/destinations").set("Authorization", bearer("agent")).send(destination);

    expect(res.status).toBe(403);
    expect(svc.svcCreateDestination).not.toHaveBeenCalled();
  });

  it("rejects a base fee the column cannot hold", async () => {
    const res = await request(app)
      .post("/api/v1/tarifs/destinations")
      .set("Authorization", bearer("admin"))
      .send({ ...destination, tarif_base: "1000000.00" });

    expect(res.status).toBe(400);
    expect(res.body.details.fieldErrors.tarif_base).toEqual(["tarif_base ne peut pas dépasser 999999.99"]);
  });
});

describe("PATCH /api/v1/tarifs/types-service/:id", () => {
  it("deactivates a service type", async () => {
    svc.svcUpdateTypeService.mockResolvedValueOnce({ id: 1, nom: "Express", description: null, is_active: false });

    const res = await request(app)
      .patch("/api/v1/tarifs/types-service/1")
      .set("Authorization", bearer("admin"))
      .send({ is_active: false });

    expect(res.status).toBe(200);
    expect(res.body.type_service.is_active).toBe(false);
    expect(svc.svcUpdateTypeService).toHaveBeenCalledWith(1, { is_active: false });
  });

  it("answers 404 for an unknown service type", async () => {
    svc.svcUpdateTypeService.mockResolvedValueOnce(null);

    const res = await request(app)
      .patch("/api/v1/tarifs/types-service/9")
      .set("Authorization", bearer("admin"))
      .send({ nom: "Eco" });

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "TYPE_SERVICE_NOT_FOUND", message: "Type de service introuvable" });
  });
});
