import pool from "../../../config/database";
import { toInt } from "../../../utils/pg";
import type { DbQueryer } from "../../../utils/transaction";

/** `delta` is a signed decimal string ("-12.50"). */
export async function repoAdjustClientSolde(tx: DbQueryer, clientId: number, delta: string): Promise<void> {
  const res = await tx.query(`UPDATE clients SET solde = solde + $2::numeric, updated_at = now() WHERE id = $1`, [
    clientId,
    delta,
  ]);
  if ((res.rowCount ?? 0) === 0) throw new Error(`Client ${clientId} not found while adjusting solde`);
}

export type SoldeDrift = {
  client_id: number;
  stored: string;
  expected: string;
};

/** Clients whose stored solde differs from Σ TTC − Σ payments. */
export async function repoListSoldeDrift(): Promise<SoldeDrift[]> {
  const res = await pool.query<{ client_id: string; stored: string; expected: string }>(
    `
    WITH ledger AS (
      SELECT
        f.client_id,
        SUM(f.montant_ttc - COALESCE(pp.paid, 0)) AS expected
      FROM facture f
      LEFT JOIN (SELECT facture_id, SUM(montant) AS paid FROM paiement GROUP BY facture_id) pp ON pp.facture_id = f.id
      GROUP BY f.client_id
    )
    SELECT
      c.id::text AS client_id,
      c.solde::text AS stored,
      COALESCE(l.expected, 0)::numeric(12,2)::text AS expected
    FROM clients c
    LEFT JOIN ledger l ON l.client_id = c.id
    WHERE c.solde <> COALESCE(l.expected, 0)
    ORDER BY c.id ASC
    `
  );
  return res.rows.map((r) => ({ client_id: toInt(r.client_id, "client.id"), stored: r.stored, expected: r.expected }));
}

export async function repoSetClientSolde(tx: DbQueryer, clientId: number, solde: string): Promise<void> {
  await tx.query(`UPDATE clients SET solde = $2::numeric, updated_at = now() WHERE id = $1`, [clientId, solde]);
}

/** Row lock on the client so reconciliation does not race a ledger write. */
export async function repoLockClientSolde(tx: DbQueryer, clientId: number): Promise<string | null> {
  const res = await tx.query<{ solde: string }>(`SELECT solde::text AS solde FROM clients WHERE id = $1 FOR UPDATE`, [clientId]);
  return res.rows[0]?.solde ?? null;
}

/** Σ TTC − Σ payments for one client, read inside the caller's transaction. */
export async function repoComputeExpectedSolde(tx: DbQueryer, clientId: number): Promise<string> {
  const res = await tx.query<{ expected: string }>(
    `
    SELECT (
      COALESCE((SELECT SUM(f.montant_ttc) FROM facture f WHERE f.client_id = $1), 0)
      - COALESCE((SELECT SUM(p.montant) FROM paiement p JOIN facture f ON f.id = p.facture_id WHERE f.client_id = $1), 0)
    )::numeric(12,2)::text AS expected
    `,
    [clientId]
  );
  return res.rows[0]?.expected ?? "0.00";
}
