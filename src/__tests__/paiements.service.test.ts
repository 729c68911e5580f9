import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  tx: { query: vi.fn() },
  repoGetFactureLedgerForUpdate: vi.fn(),
  repoSetFactureStatut: vi.fn(),
  repoInsertPaiement: vi.fn(),
  repoGetPaiement: vi.fn(),
  repoDeletePaiement: vi.fn(),
  repoListPaiements: vi.fn(),
  repoUpdatePaiement: vi.fn(),
  repoAdjustClientSolde: vi.fn(),
}));

vi.mock("../utils/transaction", () => ({
  withTransaction: async <T>(fn: (tx: typeof mocks.tx) => Promise<T>) => fn(mocks.tx),
}));

vi.mock("../module/facturation/repository/factures.repository", () => ({
  repoGetFactureLedgerForUpdate: mocks.repoGetFactureLedgerForUpdate,
  repoSetFactureStatut: mocks.repoSetFactureStatut,
}));

vi.mock("../module/facturation/repository/paiements.repository", () => ({
  repoInsertPaiement: mocks.repoInsertPaiement,
  repoGetPaiement: mocks.repoGetPaiement,
  repoDeletePaiement: mocks.repoDeletePaiement,
  repoListPaiements: mocks.repoListPaiements,
  repoUpdatePaiement: mocks.repoUpdatePaiement,
}));

vi.mock("../module/facturation/repository/solde.repository", () => ({
  repoAdjustClientSolde: mocks.repoAdjustClientSolde,
}));

import { eventBus, type DomainEvent } from "../events/domain-events";
import { svcCreatePaiement, svcDeletePaiement } from "../module/facturation/services/paiements.service";
import type { FactureLedgerRow } from "../module/facturation/types/factures.types";
import type { Paiement } from "../module/facturation/types/paiements.types";
import { AmountExceedsBalance, InvoiceAlreadyPaid } from "../utils/errors";

function ledgerRow(totalPaye: string, statut: FactureLedgerRow["statut_paiement"]): FactureLedgerRow {
  return { id: 10, client_id: 3, montant_ttc: "600.00", statut_paiement: statut, total_paye: totalPaye };
}

function paiement(id: number, montant: string): Paiement {
  return {
    id,
    facture_id: 10,
    client_id: 3,
    date_paiement: "2026-03-05",
    montant,
    mode: "TRANSFER",
    reference: null,
    commentaire: null,
    created_at: "2026-03-05T09:00:00.000Z",
    updated_at: "2026-03-05T09:00:00.000Z",
  };
}

const body = (montant: string) => ({ facture_id: 10, montant, mode: "TRANSFER" as const });

let published: DomainEvent[] = [];
let unsubscribe: () => void = () => undefined;

beforeEach(() => {
  vi.resetAllMocks();
  published = [];
  const offs = [
    eventBus.subscribe("paiement.recorded", (e) => void published.push(e)),
    eventBus.subscribe("paiement.reversed", (e) => void published.push(e)),
  ];
  unsubscribe = () => offs.forEach((off) => off());
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

afterEach(() => {
  unsubscribe();
  vi.restoreAllMocks();
});

describe("svcCreatePaiement", () => {
  it("records a partial payment and lowers the client balance", async () => {
    mocks.repoGetFactureLedgerForUpdate.mockResolvedValueOnce(ledgerRow("0.00", "UNPAID"));
    mocks.repoInsertPaiement.mockResolvedValueOnce(paiement(1, "300.00"));

    const created = await svcCreatePaiement(body("300.00"));

    expect(created.id).toBe(1);
    expect(mocks.repoSetFactureStatut).toHaveBeenCalledWith(mocks.tx, 10, "PARTIAL");
    expect(mocks.repoAdjustClientSolde).toHaveBeenCalledWith(mocks.tx, 3, "-300.00");
    expect(published).toEqual([
      {
        type: "paiement.recorded",
        paiement_id: 1,
        facture_id: 10,
        client_id: 3,
        montant: "300.00",
        statut_paiement: "PARTIAL",
        reste_a_payer: "300.00",
        at: "2026-03-05T09:00:00.000Z",
      },
    ]);
  });

  it("settles the invoice with the second half", async () => {
    mocks.repoGetFactureLedgerForUpdate.mockResolvedValueOnce(ledgerRow("300.00", "PARTIAL"));
    mocks.repoInsertPaiement.mockResolvedValueOnce(paiement(2, "300.00"));

    await svcCreatePaiement(body("300.00"));

    expect(mocks.repoSetFactureStatut).toHaveBeenCalledWith(mocks.tx, 10, "PAID");
    expect(published[0]).toMatchObject({ statut_paiement: "PAID", reste_a_payer: "0.00" });
  });

  it("does not touch the status when it stays the same", async () => {
    mocks.repoGetFactureLedgerForUpdate.mockResolvedValueOnce(ledgerRow("100.00", "PARTIAL"));
    mocks.repoInsertPaiement.mockResolvedValueOnce(paiement(3, "50.00"));

    await svcCreatePaiement(body("50.00"));

    expect(mocks.repoSetFactureStatut).not.toHaveBeenCalled();
  });

  it("refuses a payment on a settled invoice without writing anything", async () => {
    mocks.repoGetFactureLedgerForUpdate.mockResolvedValueOnce(ledgerRow("600.00", "PAID"));

    await expect(svcCreatePaiement(body("10.00"))).rejects.toBeInstanceOf(InvoiceAlreadyPaid);
    expect(mocks.repoInsertPaiement).not.toHaveBeenCalled();
    expect(mocks.repoAdjustClientSolde).not.toHaveBeenCalled();
    expect(published).toEqual([]);
  });

  it("refuses an overpayment", async () => {
    mocks.repoGetFactureLedgerForUpdate.mockResolvedValueOnce(ledgerRow("300.00", "PARTIAL"));

    await expect(svcCreatePaiement(body("300.01"))).rejects.toBeInstanceOf(AmountExceedsBalance);
    expect(mocks.repoInsertPaiement).not.toHaveBeenCalled();
  });

  it("reports a missing invoice", async () => {
    mocks.repoGetFactureLedgerForUpdate.mockResolvedValueOnce(null);

    await expect(svcCreatePaiement(body("10.00"))).rejects.toMatchObject({ status: 404, code: "FACTURE_NOT_FOUND" });
  });
});

describe("svcDeletePaiement", () => {
  it("reopens a settled invoice and restores the balance", async () => {
    mocks.repoGetPaiement.mockResolvedValueOnce(paiement(2, "300.00")).mockResolvedValueOnce(paiement(2, "300.00"));
    mocks.repoGetFactureLedgerForUpdate.mockResolvedValueOnce(ledgerRow("600.00", "PAID"));

    await svcDeletePaiement(2);

    expect(mocks.repoGetPaiement).toHaveBeenLastCalledWith(2, mocks.tx);
    expect(mocks.repoDeletePaiement).toHaveBeenCalledWith(mocks.tx, 2);
    expect(mocks.repoSetFactureStatut).toHaveBeenCalledWith(mocks.tx, 10, "PARTIAL");
    expect(mocks.repoAdjustClientSolde).toHaveBeenCalledWith(mocks.tx, 3, "300.00");
    expect(published).toHaveLength(1);
    expect(published[0]).toMatchObject({ type: "paiement.reversed", statut_paiement: "PARTIAL", reste_a_payer: "300.00" });
  });

  it("reports a missing payment", async () => {
    mocks.repoGetPaiement.mockResolvedValueOnce(null);

    await expect(svcDeletePaiement(99)).rejects.toMatchObject({ status: 404, code: "PAIEMENT_NOT_FOUND" });
    expect(mocks.repoGetFactureLedgerForUpdate).not.toHaveBeenCalled();
  });

  it("reports a payment deleted while waiting for the lock", async () => {
    mocks.repoGetPaiement.mockResolvedValueOnce(paiement(2, "300.00")).mockResolvedValueOnce(null);
    mocks.repoGetFactureLedgerForUpdate.mockResolvedValueOnce(ledgerRow("600.00", "PAID"));

    await expect(svcDeletePaiement(2)).rejects.toMatchObject({ code: "PAIEMENT_NOT_FOUND" });
    expect(mocks.repoDeletePaiement).not.toHaveBeenCalled();
  });
});
