import pool from "../../../config/database";
import { HttpError } from "../../../utils/httpError";
import { createParams, getPgErrorInfo, isoTs, sortDirection, toInt, type ListWhere } from "../../../utils/pg";
import { expeditionScopeSql, type AccessScope } from "../../auth/lib/access-scope";
import type { Paginated, TrackingLog } from "../types/tracking.types";
import type { ListTrackingQueryDTO } from "../validators/tracking.validators";

const trackingColumnsSql = (l = "l") => `
  ${l}.id::text AS id,
  ${l}.expedition_id::text AS expedition_id,
  ${isoTs(`${l}.date`)} AS date,
  ${l}.lieu,
  ${l}.statut,
  ${l}.commentaire,
  ${l}.chauffeur_id::text AS chauffeur_id,
  ${l}.created_by,
  ${isoTs(`${l}.created_at`)} AS created_at
`;

type TrackingRow = Omit<TrackingLog, "id" | "expedition_id" | "chauffeur_id"> & {
  id: string;
  expedition_id: string;
  chauffeur_id: string | null;
};

const mapTracking = (r: TrackingRow): TrackingLog => ({
  ...r,
  id: toInt(r.id, "tracking_log.id"),
  expedition_id: toInt(r.expedition_id, "tracking_log.expedition_id"),
  chauffeur_id: r.chauffeur_id === null ? null : toInt(r.chauffeur_id, "tracking_log.chauffeur_id"),
});

type Push = (v: unknown) => string;

/** Logs follow the visibility of their shipment. */
function trackingScopeSql(scope: AccessScope, push: Push): string | null {
  const exp = expeditionScopeSql(scope, push, "se");
  return exp ? `l.expedition_id IN (SELECT se.id FROM expedition se WHERE ${exp})` : null;
}

function buildListWhere(filters: ListTrackingQueryDTO, scope: AccessScope): ListWhere {
  const where: string[] = [];
  const { values, push } = createParams();

  const scopeSql = trackingScopeSql(scope, push);
  if (scopeSql) where.push(scopeSql);
  if (filters.expedition_id !== undefined) where.push(`l.expedition_id = ${push(filters.expedition_id)}`);
  if (filters.chauffeur_id !== undefined) where.push(`l.chauffeur_id = ${push(filters.chauffeur_id)}`);
  if (filters.statut) where.push(`l.statut = ${push(filters.statut)}`);

  return { whereSql: where.length ? `WHERE ${where.join(" AND ")}` : "", values };
}

export async function repoListTracking(filters: ListTrackingQueryDTO, scope: AccessScope): Promise<Paginated<TrackingLog>> {
  const page = filters.page ?? 1;
  const pageSize = filters.pageSize ?? 20;
  const offset = (page - 1) * pageSize;
  const { whereSql, values } = buildListWhere(filters, scope);

  const countRes = await pool.query<{ total: number }>(`SELECT COUNT(*)::int AS total FROM tracking_log l ${whereSql}`, values);
  const total = countRes.rows[0]?.total ?? 0;

  const dataRes = await pool.query<TrackingRow>(
    `
    SELECT ${trackingColumnsSql()}
    FROM tracking_log l
    ${whereSql}
    ORDER BY l.date ${sortDirection(filters.sortDir)}, l.id DESC
    LIMIT $${values.length + 1}
    OFFSET $${values.length + 2}
    `,
    [...values, pageSize, offset]
  );

  return { items: dataRes.rows.map(mapTracking), total };
}

export async function repoGetTracking(id: number, scope: AccessScope): Promise<TrackingLog | null> {
  const { values, push } = createParams([id]);
  const scopeSql = trackingScopeSql(scope, push);
  const res = await pool.query<TrackingRow>(
    `
    SELECT ${trackingColumnsSql()}
    FROM tracking_log l
    WHERE l.id = $1
    ${scopeSql ? `AND ${scopeSql}` : ""}
    `,
    values
  );
  const row = res.rows[0] ?? null;
  return row ? mapTracking(row) : null;
}

export async function repoExpeditionVisible(id: number, scope: AccessScope): Promise<boolean> {
  const { values, push } = createParams([id]);
  const scopeSql = expeditionScopeSql(scope, push);
  const res = await pool.query(`SELECT 1 FROM expedition e WHERE e.id = $1${scopeSql ? ` AND ${scopeSql}` : ""}`, values);
  return (res.rowCount ?? 0) > 0;
}

export type InsertTrackingRow = {
  expedition_id: number;
  lieu: string;
  statut: string;
  commentaire: string | null;
  chauffeur_id: number | null;
  created_by: number | null;
  date: string | null;
};

export async function repoInsertTracking(row: InsertTrackingRow): Promise<TrackingLog> {
  try {
    const res = await pool.query<TrackingRow>(
      `
      INSERT INTO tracking_log (expedition_id, lieu, statut, commentaire, chauffeur_id, created_by, date)
      VALUES ($1, $2, $3, $4, $5, $6, COALESCE($7::timestamptz, now()))
      RETURNING ${trackingColumnsSql("tracking_log")}
      `,
      [row.expedition_id, row.lieu, row.statut, row.commentaire, row.chauffeur_id, row.created_by, row.date]
    );
    const created = res.rows[0];
    if (!created) throw new Error("Failed to create tracking log");
    return mapTracking(created);
  } catch (err) {
    const { code, constraint } = getPgErrorInfo(err);
    if (code === "23503" && constraint === "tracking_log_chauffeur_id_fkey") {
      throw new HttpError(404, "CHAUFFEUR_NOT_FOUND", "Chauffeur introuvable");
    }
    throw err;
  }
}

export async function repoDeleteTracking(id: number): Promise<boolean> {
  const res = await pool.query(`DELETE FROM tracking_log WHERE id = $1`, [id]);
  return (res.rowCount ?? 0) > 0;
}
