import pool from "../../../config/database";
import { createParams, isoTs, sortDirection, toInt, type ListWhere } from "../../../utils/pg";
import type { DbQueryer } from "../../../utils/transaction";
import {
  RECLAMATION_STATUTS,
  type Paginated,
  type Reclamation,
  type ReclamationStatistics,
  type ReclamationStatut,
} from "../types/reclamations.types";
import type { ListReclamationsQueryDTO } from "../validators/reclamations.validators";

function toStatut(value: string): ReclamationStatut {
  const found = RECLAMATION_STATUTS.find((s) => s === value);
  if (!found) throw new Error(`Invalid reclamation.statut: ${value}`);
  return found;
}

const reclamationColumnsSql = (r = "r") => `
  ${r}.id::text AS id,
  ${r}.client_id::text AS client_id,
  ${r}.date::text AS date,
  ${r}.nature,
  ${r}.statut,
  ${r}.commentaire,
  COALESCE(
    (SELECT array_agg(re.expedition_id::text ORDER BY re.expedition_id) FROM reclamation_expedition re WHERE re.reclamation_id = ${r}.id),
    '{}'
  ) AS expedition_ids,
  ${r}.created_by,
  ${isoTs(`${r}.created_at`)} AS created_at,
  ${isoTs(`${r}.updated_at`)} AS updated_at
`;

export type ReclamationRow = Omit<Reclamation, "id" | "client_id" | "statut" | "expedition_ids"> & {
  id: string;
  client_id: string;
  statut: string;
  expedition_ids: string[];
};

export function mapReclamation(r: ReclamationRow): Reclamation {
  return {
    ...r,
    id: toInt(r.id, "reclamation.id"),
    client_id: toInt(r.client_id, "reclamation.client_id"),
    statut: toStatut(r.statut),
    expedition_ids: r.expedition_ids.map((id) => toInt(id, "reclamation.expedition_id")),
  };
}

function buildListWhere(filters: ListReclamationsQueryDTO): ListWhere {
  const where: string[] = [];
  const { values, push } = createParams();

  if (filters.client_id !== undefined) where.push(`r.client_id = ${push(filters.client_id)}`);
  if (filters.statut) where.push(`r.statut = ${push(filters.statut)}`);
  if (filters.from) where.push(`r.date >= ${push(filters.from)}::date`);
  if (filters.to) where.push(`r.date <= ${push(filters.to)}::date`);

  return { whereSql: where.length ? `WHERE ${where.join(" AND ")}` : "", values };
}

export async function repoListReclamations(filters: ListReclamationsQueryDTO): Promise<Paginated<Reclamation>> {
  const page = filters.page ?? 1;
  const pageSize = filters.pageSize ?? 20;
  const offset = (page - 1) * pageSize;
  const { whereSql, values } = buildListWhere(filters);

  const countRes = await pool.query<{ total: number }>(`SELECT COUNT(*)::int AS total FROM reclamation r ${whereSql}`, values);
  const total = countRes.rows[0]?.total ?? 0;

  const dataRes = await pool.query<ReclamationRow>(
    `
    SELECT ${reclamationColumnsSql()}
    FROM reclamation r
    ${whereSql}
    ORDER BY r.date ${sortDirection(filters.sortDir)}, r.id DESC
    LIMIT $${values.length + 1}
    OFFSET $${values.length + 2}
    `,
    [...values, pageSize, offset]
  );

  return { items: dataRes.rows.map(mapReclamation), total };
}

export async function repoGetReclamation(id: number): Promise<Reclamation | null> {
  const res = await pool.query<ReclamationRow>(`SELECT ${reclamationColumnsSql()} FROM reclamation r WHERE r.id = $1`, [id]);
  const row = res.rows[0] ?? null;
  return row ? mapReclamation(row) : null;
}

export async function repoGetReclamationForUpdate(tx: DbQueryer, id: number): Promise<Reclamation | null> {
  const res = await tx.query<ReclamationRow>(
    `SELECT ${reclamationColumnsSql()} FROM reclamation r WHERE r.id = $1 FOR UPDATE OF r`,
    [id]
  );
  const row = res.rows[0] ?? null;
  return row ? mapReclamation(row) : null;
}

export async function repoActiveClientExists(tx: DbQueryer, clientId: number): Promise<boolean> {
  const res = await tx.query(`SELECT 1 FROM clients WHERE id = $1 AND is_active = true`, [clientId]);
  return (res.rowCount ?? 0) > 0;
}

/** Ids among `ids` that are not shipments of `clientId`. */
export async function repoForeignExpeditionIds(tx: DbQueryer, clientId: number, ids: number[]): Promise<number[]> {
  if (ids.length === 0) return [];
  const res = await tx.query<{ id: string }>(
    `SELECT id::text AS id FROM expedition WHERE id = ANY($1::bigint[]) AND client_id = $2`,
    [ids, clientId]
  );
  const owned = new Set(res.rows.map((r) => toInt(r.id, "expedition.id")));
  return ids.filter((id) => !owned.has(id));
}

export type InsertReclamationRow = {
  client_id: number;
  nature: string;
  commentaire: string | null;
  expedition_ids: number[];
  created_by: number | null;
};

export async function repoInsertReclamation(tx: DbQueryer, row: InsertReclamationRow): Promise<Reclamation> {
  const res = await tx.query<{ id: string }>(
    `
    INSERT INTO reclamation (client_id, nature, commentaire, created_by)
    VALUES ($1, $2, $3, $4)
    RETURNING id::text AS id
    `,
    [row.client_id, row.nature, row.commentaire, row.created_by]
  );
  const idRaw = res.rows[0]?.id;
  if (!idRaw) throw new Error("Failed to create reclamation");
  const id = toInt(idRaw, "reclamation.id");

  if (row.expedition_ids.length > 0) {
    await tx.query(
      `
      INSERT INTO reclamation_expedition (reclamation_id, expedition_id)
      SELECT $1, unnest($2::bigint[])
      `,
      [id, row.expedition_ids]
    );
  }

  const created = await repoGetReclamationForUpdate(tx, id);
  if (!created) throw new Error(`Reclamation ${id} vanished after insert`);
  return created;
}

export async function repoUpdateReclamationStatut(
  tx: DbQueryer,
  id: number,
  statut: ReclamationStatut,
  commentaire: string | null | undefined
): Promise<Reclamation> {
  const { values, push } = createParams([id, statut]);
  const commentSql = commentaire !== undefined ? `, commentaire = ${push(commentaire)}` : "";
  const res = await tx.query<ReclamationRow>(
    `
    UPDATE reclamation
    SET statut = $2${commentSql}, updated_at = now()
    WHERE id = $1
    RETURNING ${reclamationColumnsSql("reclamation")}
    `,
    values
  );
  const row = res.rows[0];
  if (!row) throw new Error(`Reclamation ${id} vanished during status update`);
  return mapReclamation(row);
}

export async function repoReclamationStatistics(clientId?: number): Promise<ReclamationStatistics> {
  const { values, push } = createParams();
  const whereSql = clientId !== undefined ? `WHERE client_id = ${push(clientId)}` : "";
  const res = await pool.query<ReclamationStatistics>(
    `
    SELECT
      COUNT(*)::int AS total,
      (COUNT(*) FILTER (WHERE statut = 'RESOLVED'))::int AS resolved,
      (COUNT(*) FILTER (WHERE statut = 'OPEN'))::int AS pending,
      (COUNT(*) FILTER (WHERE statut = 'CANCELLED'))::int AS cancelled
    FROM reclamation
    ${whereSql}
    `,
    values
  );
  return res.rows[0] ?? { total: 0, resolved: 0, pending: 0, cancelled: 0 };
}
