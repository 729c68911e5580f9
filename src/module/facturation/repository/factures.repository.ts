import pool from "../../../config/database";
import { HttpError } from "../../../utils/httpError";
import { createParams, getPgErrorInfo, isoTs, sortDirection, toInt, type ListWhere } from "../../../utils/pg";
import type { DbQueryer } from "../../../utils/transaction";
import { includesSet } from "../../../utils/validators";
import { parseStatut } from "../../expeditions/lib/status-machine";
import {
  FACTURE_MODES,
  FACTURE_PAYMENT_STATUSES,
  type ClientLite,
  type Facture,
  type FactureDetail,
  type FactureExpeditionLine,
  type FactureLedgerRow,
  type FactureMode,
  type FacturePaymentStatus,
  type Paginated,
} from "../types/factures.types";
import type { ListFacturesQueryDTO } from "../validators/factures.validators";
import { mapPaiement, paiementColumnsSql, type PaiementRow } from "./paiements.repository";

function toPaymentStatus(value: string): FacturePaymentStatus {
  const found = FACTURE_PAYMENT_STATUSES.find((s) => s === value);
  if (!found) throw new Error(`Invalid facture.statut_paiement: ${value}`);
  return found;
}

function toMode(value: string): FactureMode {
  const found = FACTURE_MODES.find((m) => m === value);
  if (!found) throw new Error(`Invalid facture.mode: ${value}`);
  return found;
}

const totalPayeSql = (f = "f") =>
  `COALESCE((SELECT SUM(p.montant) FROM paiement p WHERE p.facture_id = ${f}.id), 0)`;

const factureColumnsSql = (f = "f") => `
  ${f}.id::text AS id,
  ${f}.client_id::text AS client_id,
  ${f}.date_emission::text AS date_emission,
  ${f}.montant_ht::text AS montant_ht,
  ${f}.montant_tva::text AS montant_tva,
  ${f}.montant_ttc::text AS montant_ttc,
  ${f}.taux_tva::text AS taux_tva,
  ${f}.statut_paiement,
  ${f}.mode,
  ${totalPayeSql(f)}::numeric(10,2)::text AS total_paye,
  (${f}.montant_ttc - ${totalPayeSql(f)})::numeric(10,2)::text AS reste_a_payer,
  ${isoTs(`${f}.created_at`)} AS created_at,
  ${isoTs(`${f}.updated_at`)} AS updated_at
`;

type FactureRow = Omit<Facture, "id" | "client_id" | "statut_paiement" | "mode" | "client"> & {
  id: string;
  client_id: string;
  statut_paiement: string;
  mode: string;
  client: ClientLite | null;
};

function mapFacture(r: FactureRow, includeClient: boolean): Facture {
  return {
    ...r,
    id: toInt(r.id, "facture.id"),
    client_id: toInt(r.client_id, "facture.client_id"),
    statut_paiement: toPaymentStatus(r.statut_paiement),
    mode: toMode(r.mode),
    client: includeClient ? r.client : undefined,
  };
}

const clientSelectSql = (include: boolean) =>
  include
    ? `CASE WHEN c.id IS NULL THEN NULL ELSE jsonb_build_object('id', c.id, 'nom', c.nom, 'prenom', c.prenom, 'email', c.email) END AS client`
    : "NULL AS client";

function sortColumn(sortBy: ListFacturesQueryDTO["sortBy"]) {
  switch (sortBy) {
    case "montant_ttc":
      return "f.montant_ttc";
    case "updated_at":
      return "f.updated_at";
    case "date_emission":
    default:
      return "f.date_emission";
  }
}

function buildListWhere(filters: ListFacturesQueryDTO): ListWhere {
  const where: string[] = [];
  const { values, push } = createParams();

  if (filters.client_id !== undefined) where.push(`f.client_id = ${push(filters.client_id)}`);
  if (filters.statut_paiement) where.push(`f.statut_paiement = ${push(filters.statut_paiement)}`);
  if (filters.from) where.push(`f.date_emission >= ${push(filters.from)}::date`);
  if (filters.to) where.push(`f.date_emission <= ${push(filters.to)}::date`);

  return { whereSql: where.length ? `WHERE ${where.join(" AND ")}` : "", values };
}

export async function repoListFactures(filters: ListFacturesQueryDTO): Promise<Paginated<Facture>> {
  const includeClient = includesSet(filters.include).has("client");
  const page = filters.page ?? 1;
  const pageSize = filters.pageSize ?? 20;
  const offset = (page - 1) * pageSize;
  const { whereSql, values } = buildListWhere(filters);

  const countRes = await pool.query<{ total: number }>(`SELECT COUNT(*)::int AS total FROM facture f ${whereSql}`, values);
  const total = countRes.rows[0]?.total ?? 0;

  const dataRes = await pool.query<FactureRow>(
    `
    SELECT ${factureColumnsSql()}, ${clientSelectSql(includeClient)}
    FROM facture f
    LEFT JOIN clients c ON c.id = f.client_id
    ${whereSql}
    ORDER BY ${sortColumn(filters.sortBy)} ${sortDirection(filters.sortDir)}, f.id DESC
    LIMIT $${values.length + 1}
    OFFSET $${values.length + 2}
    `,
    [...values, pageSize, offset]
  );

  return { items: dataRes.rows.map((r) => mapFacture(r, includeClient)), total };
}

export async function repoGetFacture(id: number, tx?: DbQueryer): Promise<FactureDetail | null> {
  const q = tx ?? pool;
  const res = await q.query<FactureRow>(
    `
    SELECT ${factureColumnsSql()}, ${clientSelectSql(true)}
    FROM facture f
    LEFT JOIN clients c ON c.id = f.client_id
    WHERE f.id = $1
    `,
    [id]
  );
  const row = res.rows[0] ?? null;
  if (!row) return null;

  const expRes = await q.query<{ id: string; numero: string; montant: string; statut: string }>(
    `
    SELECT e.id::text AS id, e.numero, e.montant::text AS montant, e.statut
    FROM facture_expedition fe
    JOIN expedition e ON e.id = fe.expedition_id
    WHERE fe.facture_id = $1
    ORDER BY e.id ASC
    `,
    [id]
  );
  const expeditions: FactureExpeditionLine[] = expRes.rows.map((r) => ({
    id: toInt(r.id, "expedition.id"),
    numero: r.numero,
    montant: r.montant,
    statut: parseStatut(r.statut),
  }));

  const payRes = await q.query<PaiementRow>(
    `
    SELECT ${paiementColumnsSql()}
    FROM paiement p
    JOIN facture f ON f.id = p.facture_id
    WHERE p.facture_id = $1
    ORDER BY p.date_paiement ASC, p.id ASC
    `,
    [id]
  );

  return { ...mapFacture(row, true), expeditions, paiements: payRes.rows.map(mapPaiement) };
}

export type InvoiceableExpedition = {
  id: number;
  numero: string;
  client_id: number;
  montant: string;
  facture_id: number | null;
};

/** Locks the shipments being invoiced and reports any existing invoice link. */
export async function repoLockExpeditionsForInvoice(tx: DbQueryer, ids: readonly number[]): Promise<InvoiceableExpedition[]> {
  const res = await tx.query<{ id: string; numero: string; client_id: string; montant: string; facture_id: string | null }>(
    `
    SELECT
      e.id::text AS id,
      e.numero,
      e.client_id::text AS client_id,
      e.montant::text AS montant,
      (SELECT fe.facture_id::text FROM facture_expedition fe WHERE fe.expedition_id = e.id) AS facture_id
    FROM expedition e
    WHERE e.id = ANY($1::bigint[])
    ORDER BY e.id ASC
    FOR UPDATE OF e
    `,
    [ids]
  );
  return res.rows.map((r) => ({
    id: toInt(r.id, "expedition.id"),
    numero: r.numero,
    client_id: toInt(r.client_id, "expedition.client_id"),
    montant: r.montant,
    facture_id: r.facture_id === null ? null : toInt(r.facture_id, "facture.id"),
  }));
}

export type InsertFactureRow = {
  client_id: number;
  montant_ht: string;
  montant_tva: string;
  montant_ttc: string;
  taux_tva: string;
  statut_paiement: FacturePaymentStatus;
  mode: FactureMode;
};

export async function repoInsertFacture(tx: DbQueryer, row: InsertFactureRow): Promise<number> {
  const res = await tx.query<{ id: string }>(
    `
    INSERT INTO facture (client_id, montant_ht, montant_tva, montant_ttc, taux_tva, statut_paiement, mode)
    VALUES ($1, $2::numeric, $3::numeric, $4::numeric, $5::numeric, $6, $7)
    RETURNING id::text AS id
    `,
    [row.client_id, row.montant_ht, row.montant_tva, row.montant_ttc, row.taux_tva, row.statut_paiement, row.mode]
  );
  const idRaw = res.rows[0]?.id;
  if (!idRaw) throw new Error("Failed to create facture");
  return toInt(idRaw, "facture.id");
}

export async function repoLinkExpeditions(tx: DbQueryer, factureId: number, expeditionIds: readonly number[]): Promise<void> {
  try {
    await tx.query(
      `
      INSERT INTO facture_expedition (facture_id, expedition_id)
      SELECT $1, x FROM unnest($2::bigint[]) AS x
      `,
      [factureId, expeditionIds]
    );
  } catch (err) {
    const { code, constraint } = getPgErrorInfo(err);
    if (code === "23505" && constraint === "facture_expedition_expedition_key") {
      throw new HttpError(409, "EXPEDITION_ALREADY_INVOICED", "Une expédition est déjà facturée");
    }
    throw err;
  }
}

type LedgerRow = { id: string; client_id: string; montant_ttc: string; statut_paiement: string };

/**
 * Invoice row locked FOR UPDATE, then the payment sum.
 * The sum is a second statement so it reads payments committed while this transaction waited for the lock.
 */
export async function repoGetFactureLedgerForUpdate(tx: DbQueryer, id: number): Promise<FactureLedgerRow | null> {
  const locked = await tx.query<LedgerRow>(
    `
    SELECT
      f.id::text AS id,
      f.client_id::text AS client_id,
      f.montant_ttc::text AS montant_ttc,
      f.statut_paiement
    FROM facture f
    WHERE f.id = $1
    FOR UPDATE
    `,
    [id]
  );
  const row = locked.rows[0] ?? null;
  if (!row) return null;

  const paid = await tx.query<{ total_paye: string }>(
    `SELECT COALESCE(SUM(montant), 0)::numeric(10,2)::text AS total_paye FROM paiement WHERE facture_id = $1`,
    [id]
  );

  return {
    id: toInt(row.id, "facture.id"),
    client_id: toInt(row.client_id, "facture.client_id"),
    montant_ttc: row.montant_ttc,
    statut_paiement: toPaymentStatus(row.statut_paiement),
    total_paye: paid.rows[0]?.total_paye ?? "0.00",
  };
}

export async function repoSetFactureStatut(tx: DbQueryer, id: number, statut: FacturePaymentStatus): Promise<void> {
  await tx.query(`UPDATE facture SET statut_paiement = $2, updated_at = now() WHERE id = $1`, [id, statut]);
}

/** Payments and shipment links go with it (ON DELETE CASCADE). */
export async function repoDeleteFacture(tx: DbQueryer, id: number): Promise<boolean> {
  const res = await tx.query(`DELETE FROM facture WHERE id = $1`, [id]);
  return (res.rowCount ?? 0) > 0;
}
