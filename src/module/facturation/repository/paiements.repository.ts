import pool from "../../../config/database";
import { createParams, isoTs, sortDirection, toInt, type ListWhere } from "../../../utils/pg";
import type { DbQueryer } from "../../../utils/transaction";
import type { Paginated } from "../types/factures.types";
import { PAIEMENT_MODES, type Paiement, type PaiementMode } from "../types/paiements.types";
import type { CreatePaiementBodyDTO, ListPaiementsQueryDTO, UpdatePaiementBodyDTO } from "../validators/paiements.validators";

function toMode(value: string): PaiementMode {
  const found = PAIEMENT_MODES.find((m) => m === value);
  if (!found) throw new Error(`Invalid paiement.mode: ${value}`);
  return found;
}

/** Expects `paiement p JOIN facture f`. */
export const paiementColumnsSql = (p = "p", f = "f") => `
  ${p}.id::text AS id,
  ${p}.facture_id::text AS facture_id,
  ${f}.client_id::text AS client_id,
  ${p}.date_paiement::text AS date_paiement,
  ${p}.montant::text AS montant,
  ${p}.mode,
  ${p}.reference,
  ${p}.commentaire,
  ${isoTs(`${p}.created_at`)} AS created_at,
  ${isoTs(`${p}.updated_at`)} AS updated_at
`;

export type PaiementRow = Omit<Paiement, "id" | "facture_id" | "client_id" | "mode"> & {
  id: string;
  facture_id: string;
  client_id: string;
  mode: string;
};

export function mapPaiement(r: PaiementRow): Paiement {
  return {
    ...r,
    id: toInt(r.id, "paiement.id"),
    facture_id: toInt(r.facture_id, "paiement.facture_id"),
    client_id: toInt(r.client_id, "facture.client_id"),
    mode: toMode(r.mode),
  };
}

function sortColumn(sortBy: ListPaiementsQueryDTO["sortBy"]) {
  switch (sortBy) {
    case "montant":
      return "p.montant";
    case "updated_at":
      return "p.updated_at";
    case "date_paiement":
    default:
      return "p.date_paiement";
  }
}

function buildListWhere(filters: ListPaiementsQueryDTO): ListWhere {
  const where: string[] = [];
  const { values, push } = createParams();

  if (filters.q && filters.q.trim().length > 0) {
    const p = push(`%${filters.q.trim()}%`);
    where.push(`(p.reference ILIKE ${p} OR p.commentaire ILIKE ${p})`);
  }
  if (filters.client_id !== undefined) where.push(`f.client_id = ${push(filters.client_id)}`);
  if (filters.facture_id !== undefined) where.push(`p.facture_id = ${push(filters.facture_id)}::bigint`);
  if (filters.mode) where.push(`p.mode = ${push(filters.mode)}`);
  if (filters.from) where.push(`p.date_paiement >= ${push(filters.from)}::date`);
  if (filters.to) where.push(`p.date_paiement <= ${push(filters.to)}::date`);

  return { whereSql: where.length ? `WHERE ${where.join(" AND ")}` : "", values };
}

export async function repoListPaiements(filters: ListPaiementsQueryDTO): Promise<Paginated<Paiement>> {
  const page = filters.page ?? 1;
  const pageSize = filters.pageSize ?? 20;
  const offset = (page - 1) * pageSize;
  const { whereSql, values } = buildListWhere(filters);

  const countRes = await pool.query<{ total: number }>(
    `SELECT COUNT(*)::int AS total FROM paiement p JOIN facture f ON f.id = p.facture_id ${whereSql}`,
    values
  );
  const total = countRes.rows[0]?.total ?? 0;

  const dataRes = await pool.query<PaiementRow>(
    `
    SELECT ${paiementColumnsSql()}
    FROM paiement p
    JOIN facture f ON f.id = p.facture_id
    ${whereSql}
    ORDER BY ${sortColumn(filters.sortBy)} ${sortDirection(filters.sortDir)}, p.id DESC
    LIMIT $${values.length + 1}
    OFFSET $${values.length + 2}
    `,
    [...values, pageSize, offset]
  );

  return { items: dataRes.rows.map(mapPaiement), total };
}

export async function repoGetPaiement(id: number, tx?: DbQueryer): Promise<Paiement | null> {
  const res = await (tx ?? pool).query<PaiementRow>(
    `
    SELECT ${paiementColumnsSql()}
    FROM paiement p
    JOIN facture f ON f.id = p.facture_id
    WHERE p.id = $1
    `,
    [id]
  );
  const row = res.rows[0] ?? null;
  return row ? mapPaiement(row) : null;
}

export async function repoInsertPaiement(tx: DbQueryer, input: CreatePaiementBodyDTO): Promise<Paiement> {
  const ins = await tx.query<{ id: string }>(
    `
    INSERT INTO paiement (facture_id, montant, mode, reference, commentaire)
    VALUES ($1, $2::numeric, $3, $4, $5)
    RETURNING id::text AS id
    `,
    [input.facture_id, input.montant, input.mode, input.reference ?? null, input.commentaire ?? null]
  );
  const idRaw = ins.rows[0]?.id;
  if (!idRaw) throw new Error("Failed to create paiement");
  const created = await repoGetPaiement(toInt(idRaw, "paiement.id"), tx);
  if (!created) throw new Error("Failed to read back paiement");
  return created;
}

/** Only annotation fields; amount and invoice never change after the fact. */
export async function repoUpdatePaiement(id: number, patch: UpdatePaiementBodyDTO): Promise<Paiement | null> {
  const sets: string[] = [];
  const { values, push } = createParams([id]);

  if (patch.reference !== undefined) sets.push(`reference = ${push(patch.reference)}`);
  if (patch.commentaire !== undefined) sets.push(`commentaire = ${push(patch.commentaire)}`);
  if (sets.length === 0) return repoGetPaiement(id);
  sets.push("updated_at = now()");

  const res = await pool.query(`UPDATE paiement SET ${sets.join(", ")} WHERE id = $1`, values);
  if ((res.rowCount ?? 0) === 0) return null;
  return repoGetPaiement(id);
}

export async function repoDeletePaiement(tx: DbQueryer, id: number): Promise<boolean> {
  const res = await tx.query(`DELETE FROM paiement WHERE id = $1`, [id]);
  return (res.rowCount ?? 0) > 0;
}
