import { describe, it, expect, vi } from "vitest";

vi.mock("../config/database", () => ({ default: { query: vi.fn() } }));

import {
  formatNumero,
  repoUpdateExpeditionStatut,
  type ExpeditionRow,
} from "../module/expeditions/repository/expeditions.repository";
import { HttpError } from "../utils/httpError";
import type { DbQueryer } from "../utils/transaction";

function row(overrides: Partial<ExpeditionRow> = {}): ExpeditionRow {
  return {
    id: "12",
    numero: "EXP000012",
    client_id: "2",
    type_service_id: "1",
    destination_id: "3",
    poids: "10.00",
    volume: "1.00",
    description: null,
    montant: "90.00",
    statut: "OUT_FOR_DELIVERY",
    statut_updated_at: "2026-03-01T08:00:00.000Z",
    date_creation: "2026-03-01T08:00:00.000Z",
    date_livraison: null,
    predicted_delivery_time: null,
    tournee_id: null,
    agent_responsable_id: 4,
    is_active: true,
    created_at: "2026-03-01T08:00:00.000Z",
    updated_at: "2026-03-01T08:00:00.000Z",
    ...overrides,
  };
}

const at = new Date("2026-03-04T15:30:00.000Z");

describe("repoUpdateExpeditionStatut", () => {
  it("only fills date_livraison for DELIVERED and never overwrites it", async () => {
    const query = vi.fn().mockResolvedValueOnce({
      rows: [row({ statut: "DELIVERED", date_livraison: "2026-03-04T15:30:00.000Z" })],
      rowCount: 1,
    });
    const tx: DbQueryer = { query };

    const updated = await repoUpdateExpeditionStatut(tx, 12, "DELIVERED", at);

    const [sql, params] = query.mock.calls[0];
    expect(params).toEqual([12, "DELIVERED", "2026-03-04T15:30:00.000Z"]);
    expect(sql).toContain("WHEN $2 = 'DELIVERED' AND date_livraison IS NULL THEN $3::timestamptz");
    expect(sql).toContain("ELSE date_livraison");
    expect(updated.statut).toBe("DELIVERED");
    expect(updated.date_livraison).toBe("2026-03-04T15:30:00.000Z");
  });

  it("leaves date_livraison empty on FAILED", async () => {
    const query = vi.fn().mockResolvedValueOnce({ rows: [row({ statut: "FAILED" })], rowCount: 1 });
    const tx: DbQueryer = { query };

    const updated = await repoUpdateExpeditionStatut(tx, 12, "FAILED", at);

    expect(query.mock.calls[0][1]).toEqual([12, "FAILED", "2026-03-04T15:30:00.000Z"]);
    expect(updated.statut).toBe("FAILED");
    expect(updated.date_livraison).toBeNull();
  });

  it("fails when the row is gone", async () => {
    const tx: DbQueryer = { query: vi.fn().mockResolvedValueOnce({ rows: [], rowCount: 0 }) };

    await expect(repoUpdateExpeditionStatut(tx, 12, "SORTING", at)).rejects.toThrow(
      "Expedition 12 vanished during status update"
    );
  });
});

describe("formatNumero", () => {
  it("pads to six digits", () => {
    expect(formatNumero(1)).toBe("EXP000001");
    expect(formatNumero(999999)).toBe("EXP999999");
  });

  it("refuses a sequence value that no longer fits", () => {
    let caught: unknown = null;
    try {
      formatNumero(1_000_000);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(HttpError);
    expect(caught).toMatchObject({ status: 503, code: "NUMERO_SEQUENCE_EXHAUSTED" });
  });
});
