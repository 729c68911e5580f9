import { beforeEach, describe, it, expect, vi } from "vitest";

const db = vi.hoisted(() => {
  const client = { query: vi.fn(), release: vi.fn() };
  return { client, pool: { connect: vi.fn(async () => client) } };
});

vi.mock("../config/database", () => ({ default: db.pool }));

import { repoGetFactureLedgerForUpdate, repoLinkExpeditions } from "../module/facturation/repository/factures.repository";
import { repoAdjustClientSolde } from "../module/facturation/repository/solde.repository";
import { withSavepoint, withTransaction, type DbQueryer } from "../utils/transaction";

const statements = () => db.client.query.mock.calls.map((call) => call[0]);

beforeEach(() => {
  db.client.query.mockReset();
  db.client.release.mockReset();
});

describe("withTransaction", () => {
  it("commits and releases on success", async () => {
    db.client.query.mockResolvedValue({ rows: [], rowCount: 0 });

    await expect(withTransaction(async () => 42)).resolves.toBe(42);

    expect(statements()).toEqual(["BEGIN", "COMMIT"]);
    expect(db.client.release).toHaveBeenCalledTimes(1);
  });

  it("rolls back, releases and rethrows on failure", async () => {
    db.client.query.mockResolvedValue({ rows: [], rowCount: 0 });

    await expect(
      withTransaction(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(statements()).toEqual(["BEGIN", "ROLLBACK"]);
    expect(db.client.release).toHaveBeenCalledTimes(1);
  });
});

describe("withSavepoint", () => {
  it("only undoes the nested work", async () => {
    const tx: DbQueryer = { query: vi.fn().mockResolvedValue({ rows: [] }) };

    await expect(
      withSavepoint(tx, "sp", async () => {
        throw new Error("dup");
      })
    ).rejects.toThrow("dup");

    expect(tx.query).toHaveBeenNthCalledWith(1, "SAVEPOINT sp");
    expect(tx.query).toHaveBeenNthCalledWith(2, "ROLLBACK TO SAVEPOINT sp");
  });
});

describe("ledger repositories", () => {
  it("turns the unique link violation into EXPEDITION_ALREADY_INVOICED", async () => {
    const violation = Object.assign(new Error("duplicate key"), {
      code: "23505",
      constraint: "facture_expedition_expedition_key",
    });
    const tx: DbQueryer = { query: vi.fn().mockRejectedValue(violation) };

    await expect(repoLinkExpeditions(tx, 10, [1, 2])).rejects.toMatchObject({
      status: 409,
      code: "EXPEDITION_ALREADY_INVOICED",
    });
  });

  it("lets other database errors through", async () => {
    const other = Object.assign(new Error("fk"), { code: "23503", constraint: "facture_expedition_facture_id_fkey" });
    const tx: DbQueryer = { query: vi.fn().mockRejectedValue(other) };

    await expect(repoLinkExpeditions(tx, 10, [1])).rejects.toBe(other);
  });

  it("fails loudly when the client row is gone", async () => {
    const tx: DbQueryer = { query: vi.fn().mockResolvedValue({ rows: [], rowCount: 0 }) };

    await expect(repoAdjustClientSolde(tx, 99, "-10.00")).rejects.toThrow("Client 99 not found while adjusting solde");
  });

  it("adjusts the balance by a signed delta", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [], rowCount: 1 });
    const tx: DbQueryer = { query };

    await repoAdjustClientSolde(tx, 2, "-300.00");

    expect(query).toHaveBeenCalledWith(expect.stringContaining("solde = solde + $2::numeric"), [2, "-300.00"]);
  });

  it("locks the invoice before summing its payments in a separate statement", async () => {
    const query = vi
      .fn()
      .mockResolvedValueOnce({
        rows: [{ id: "10", client_id: "3", montant_ttc: "600.00", statut_paiement: "PARTIAL" }],
        rowCount: 1,
      })
      .mockResolvedValueOnce({ rows: [{ total_paye: "500.00" }], rowCount: 1 });
    const tx: DbQueryer = { query };

    const ledger = await repoGetFactureLedgerForUpdate(tx, 10);

    expect(ledger).toEqual({ id: 10, client_id: 3, montant_ttc: "600.00", statut_paiement: "PARTIAL", total_paye: "500.00" });
    expect(query).toHaveBeenCalledTimes(2);
    const [lockSql, lockParams] = query.mock.calls[0];
    const [sumSql, sumParams] = query.mock.calls[1];
    expect(lockSql).toContain("FOR UPDATE");
    expect(lockSql).not.toContain("FROM paiement");
    expect(lockParams).toEqual([10]);
    expect(sumSql).toContain("SUM(montant)");
    expect(sumSql).not.toContain("FOR UPDATE");
    expect(sumParams).toEqual([10]);
  });

  it("does not sum payments of a missing invoice", async () => {
    const query = vi.fn().mockResolvedValueOnce({ rows: [], rowCount: 0 });
    const tx: DbQueryer = { query };

    await expect(repoGetFactureLedgerForUpdate(tx, 99)).resolves.toBeNull();
    expect(query).toHaveBeenCalledTimes(1);
  });
});
