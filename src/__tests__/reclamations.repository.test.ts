import { describe, it, expect, vi } from "vitest";

vi.mock("../config/database", () => ({ default: { query: vi.fn() } }));

import { repoForeignExpeditionIds, repoInsertReclamation } from "../module/reclamations/repository/reclamations.repository";
import type { DbQueryer } from "../utils/transaction";

describe("repoForeignExpeditionIds", () => {
  it("skips the query for no shipments", async () => {
    const query = vi.fn();

    await expect(repoForeignExpeditionIds({ query }, 2, [])).resolves.toEqual([]);
    expect(query).not.toHaveBeenCalled();
  });

  it("returns the ids the client does not own, in request order", async () => {
    const query = vi.fn().mockResolvedValueOnce({ rows: [{ id: "12" }], rowCount: 1 });

    await expect(repoForeignExpeditionIds({ query }, 2, [14, 12, 13])).resolves.toEqual([14, 13]);
    expect(query.mock.calls[0][1]).toEqual([[14, 12, 13], 2]);
  });
});

describe("repoInsertReclamation", () => {
  it("links shipments in one statement and reads the row back", async () => {
    const query = vi
      .fn()
      .mockResolvedValueOnce({ rows: [{ id: "21" }], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [], rowCount: 2 })
      .mockResolvedValueOnce({
        rows: [
          {
            id: "21",
            client_id: "2",
            date: "2026-03-05",
            nature: "Colis endommagé",
            statut: "OPEN",
            commentaire: null,
            expedition_ids: ["12", "13"],
            created_by: 4,
            created_at: "2026-03-05T10:00:00.000Z",
            updated_at: "2026-03-05T10:00:00.000Z",
          },
        ],
        rowCount: 1,
      });
    const tx: DbQueryer = { query };

    const out = await repoInsertReclamation(tx, {
      client_id: 2,
      nature: "Colis endommagé",
      commentaire: null,
      expedition_ids: [12, 13],
      created_by: 4,
    });

    expect(query).toHaveBeenCalledTimes(3);
    expect(query.mock.calls[1][0]).toContain("unnest($2::bigint[])");
    expect(query.mock.calls[1][1]).toEqual([21, [12, 13]]);
    expect(out).toMatchObject({ id: 21, client_id: 2, statut: "OPEN", expedition_ids: [12, 13] });
  });
});
