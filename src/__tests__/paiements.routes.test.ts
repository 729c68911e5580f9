import request from "supertest";
import { beforeEach, describe, it, expect, vi } from "vitest";

const svc = vi.hoisted(() => ({
  svcCreatePaiement: vi.fn(),
  svcDeletePaiement: vi.fn(),
  svcGetPaiement: vi.fn(),
  svcListPaiements: vi.fn(),
  svcUpdatePaiement: vi.fn(),
}));

vi.mock("pg", () => ({
  Pool: vi.fn(() => ({ on: vi.fn(), query: vi.fn(), connect: vi.fn() })),
}));

vi.mock("../module/facturation/services/paiements.service", () => svc);

import app from "../config/app";
import { AmountExceedsBalance } from "../utils/errors";
import { bearer } from "./helpers/tokens";

beforeEach(() => {
  vi.resetAllMocks();
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("POST /api/v1/paiements", () => {
  it("records a payment with the default mode", async () => {
    svc.svcCreatePaiement.mockResolvedValueOnce({ id: 1, facture_id: 10, montant: "300.00" });

    const res = await request(app)
      .post("/api/v1/paiements")
      .set("Authorization", bearer("agent"))
      .send({ facture_id: 10, montant: "300.00" });

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ paiement: { id: 1, facture_id: 10, montant: "300.00" } });
    expect(svc.svcCreatePaiement).toHaveBeenCalledWith(
      expect.objectContaining({ facture_id: 10, montant: "300.00", mode: "CASH" })
    );
  });

  it("rejects a negative amount before the ledger", async () => {
    const res = await request(app)
      .post("/api/v1/paiements")
      .set("Authorization", bearer("agent"))
      .send({ facture_id: 10, montant: "-5" });

    expect(res.status).toBe(400);
    expect(svc.svcCreatePaiement).not.toHaveBeenCalled();
  });

  it("rejects an amount above the column bound", async () => {
    const res = await request(app)
      .post("/api/v1/paiements")
      .set("Authorization", bearer("agent"))
      .send({ facture_id: 10, montant: "100000000" });

    expect(res.status).toBe(400);
    expect(res.body.details.fieldErrors.montant).toEqual(["montant ne peut pas dépasser 99999999.99"]);
    expect(svc.svcCreatePaiement).not.toHaveBeenCalled();
  });

  it("maps an overpayment to 422", async () => {
    svc.svcCreatePaiement.mockRejectedValueOnce(new AmountExceedsBalance(10, "400.00", "300.00"));

    const res = await request(app)
      .post("/api/v1/paiements")
      .set("Authorization", bearer("admin"))
      .send({ facture_id: 10, montant: "400" });

    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      error: "AMOUNT_EXCEEDS_BALANCE",
      message: "Le montant dépasse le reste à payer",
      details: { facture_id: 10, montant: "400.00", reste_a_payer: "300.00" },
    });
  });

  it("is closed to drivers", async () => {
    const res = await request(app)
      .post("/api/v1/paiements")
      .set("Authorization", bearer("chauffeur"))
      .send({ facture_id: 10, montant: "1" });

    expect(res.status).toBe(403);
  });
});

describe("PATCH /api/v1/paiements/:id", () => {
  it("needs at least one field", async () => {
    const res = await request(app).patch("/api/v1/paiements/1").set("Authorization", bearer("agent")).send({});

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("NO_UPDATE");
  });

  it("refuses to change the amount", async () => {
    const res = await request(app)
      .patch("/api/v1/paiements/1")
      .set("Authorization", bearer("agent"))
      .send({ montant: "1.00" });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("VALIDATION_ERROR");
    expect(svc.svcUpdatePaiement).not.toHaveBeenCalled();
  });
});

describe("DELETE /api/v1/paiements/:id", () => {
  it("is reserved to admins", async () => {
    const res = await request(app).delete("/api/v1/paiements/1").set("Authorization", bearer("agent"));

    expect(res.status).toBe(403);
    expect(svc.svcDeletePaiement).not.toHaveBeenCalled();
  });

  it("reverses the payment", async () => {
    svc.svcDeletePaiement.mockResolvedValueOnce(undefined);

    const res = await request(app).delete("/api/v1/paiements/1").set("Authorization", bearer("admin"));

    expect(res.status).toBe(204);
    expect(svc.svcDeletePaiement).toHaveBeenCalledWith(1);
  });
});
