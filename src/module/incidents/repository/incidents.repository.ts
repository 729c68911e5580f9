import pool from "../../../config/database";
import { HttpError } from "../../../utils/httpError";
import { createParams, getPgErrorInfo, isoTs, sortDirection, toInt, type ListWhere } from "../../../utils/pg";
import type { DbQueryer } from "../../../utils/transaction";
import { includesSet } from "../../../utils/validators";
import { expeditionScopeSql, tourneeScopeSql, type AccessScope } from "../../auth/lib/access-scope";
import {
  INCIDENT_PRIORITES,
  INCIDENT_SEVERITES,
  INCIDENT_TYPES,
  type ExpeditionLite,
  type Incident,
  type IncidentPriorite,
  type IncidentSeverite,
  type IncidentType,
  type Paginated,
} from "../types/incidents.types";
import type { ListIncidentsQueryDTO } from "../validators/incidents.validators";

function pick<T extends string>(allowed: readonly T[], value: string, label: string): T {
  const found = allowed.find((v) => v === value);
  if (!found) throw new Error(`Invalid ${label}: ${value}`);
  return found;
}

const incidentColumnsSql = (i = "i") => `
  ${i}.id::text AS id,
  ${i}.type,
  ${i}.severite,
  ${i}.priorite,
  ${i}.expedition_id::text AS expedition_id,
  ${i}.tournee_id::text AS tournee_id,
  ${i}.commentaire,
  ${i}.resolution_details,
  ${isoTs(`${i}.date_resolution`)} AS date_resolution,
  ${i}.created_by,
  ${isoTs(`${i}.created_at`)} AS created_at,
  ${isoTs(`${i}.updated_at`)} AS updated_at
`;

type IncidentRow = Omit<Incident, "id" | "type" | "severite" | "priorite" | "expedition_id" | "tournee_id" | "expedition"> & {
  id: string;
  type: string;
  severite: string;
  priorite: string;
  expedition_id: string | null;
  tournee_id: string | null;
  expedition?: ExpeditionLite | null;
};

function mapIncident(r: IncidentRow, includeExpedition = false): Incident {
  const { expedition, ...rest } = r;
  const out: Incident = {
    ...rest,
    id: toInt(r.id, "incident.id"),
    type: pick<IncidentType>(INCIDENT_TYPES, r.type, "incident.type"),
    severite: pick<IncidentSeverite>(INCIDENT_SEVERITES, r.severite, "incident.severite"),
    priorite: pick<IncidentPriorite>(INCIDENT_PRIORITES, r.priorite, "incident.priorite"),
    expedition_id: r.expedition_id === null ? null : toInt(r.expedition_id, "incident.expedition_id"),
    tournee_id: r.tournee_id === null ? null : toInt(r.tournee_id, "incident.tournee_id"),
  };
  if (includeExpedition) out.expedition = expedition ?? null;
  return out;
}

type Push = (v: unknown) => string;

/** Visible when the linked shipment or the linked tour is. */
function incidentScopeSql(scope: AccessScope, push: Push): string | null {
  if (scope.kind === "all") return null;
  const exp = expeditionScopeSql(scope, push, "se");
  const tour = tourneeScopeSql(scope, push, "st");
  const parts = [
    `i.expedition_id IN (SELECT se.id FROM expedition se${exp ? ` WHERE ${exp}` : ""})`,
    `i.tournee_id IN (SELECT st.id FROM tournee st${tour ? ` WHERE ${tour}` : ""})`,
  ];
  return `(${parts.join(" OR ")})`;
}

const severiteRank = `array_position(ARRAY['LOW','MEDIUM','HIGH','CRITICAL'], i.severite)`;
const prioriteRank = `array_position(ARRAY['LOW','NORMAL','HIGH','URGENT'], i.priorite)`;

function sortColumn(sortBy: ListIncidentsQueryDTO["sortBy"]) {
  switch (sortBy) {
    case "severite":
      return severiteRank;
    case "priorite":
      return prioriteRank;
    case "created_at":
    default:
      return "i.created_at";
  }
}

function buildListWhere(filters: ListIncidentsQueryDTO, scope: AccessScope): ListWhere {
  const where: string[] = [];
  const { values, push } = createParams();

  const scopeSql = incidentScopeSql(scope, push);
  if (scopeSql) where.push(scopeSql);
  if (filters.type) where.push(`i.type = ${push(filters.type)}`);
  if (filters.severite) where.push(`i.severite = ${push(filters.severite)}`);
  if (filters.priorite) where.push(`i.priorite = ${push(filters.priorite)}`);
  if (filters.expedition_id !== undefined) where.push(`i.expedition_id = ${push(filters.expedition_id)}`);
  if (filters.tournee_id !== undefined) where.push(`i.tournee_id = ${push(filters.tournee_id)}`);
  if (filters.resolved === true) where.push("i.date_resolution IS NOT NULL");
  if (filters.resolved === false) where.push("i.date_resolution IS NULL");
  if (filters.from) where.push(`i.created_at >= ${push(filters.from)}::date`);
  if (filters.to) where.push(`i.created_at < (${push(filters.to)}::date + 1)`);

  return { whereSql: where.length ? `WHERE ${where.join(" AND ")}` : "", values };
}

const expeditionSelectSql = (include: boolean) =>
  include
    ? `CASE WHEN e.id IS NULL THEN NULL ELSE jsonb_build_object('id', e.id, 'numero', e.numero, 'statut', e.statut, 'client_id', e.client_id) END AS expedition`
    : "NULL AS expedition";

export async function repoListIncidents(filters: ListIncidentsQueryDTO, scope: AccessScope): Promise<Paginated<Incident>> {
  const includeExpedition = includesSet(filters.include).has("expedition");
  const page = filters.page ?? 1;
  const pageSize = filters.pageSize ?? 20;
  const offset = (page - 1) * pageSize;
  const { whereSql, values } = buildListWhere(filters, scope);

  const countRes = await pool.query<{ total: number }>(`SELECT COUNT(*)::int AS total FROM incident i ${whereSql}`, values);
  const total = countRes.rows[0]?.total ?? 0;

  const dataRes = await pool.query<IncidentRow>(
    `
    SELECT ${incidentColumnsSql()}, ${expeditionSelectSql(includeExpedition)}
    FROM incident i
    LEFT JOIN expedition e ON e.id = i.expedition_id
    ${whereSql}
    ORDER BY ${sortColumn(filters.sortBy)} ${sortDirection(filters.sortDir)}, i.id DESC
    LIMIT $${values.length + 1}
    OFFSET $${values.length + 2}
    `,
    [...values, pageSize, offset]
  );

  return { items: dataRes.rows.map((r) => mapIncident(r, includeExpedition)), total };
}

export async function repoGetIncident(id: number, scope: AccessScope): Promise<Incident | null> {
  const { values, push } = createParams([id]);
  const scopeSql = incidentScopeSql(scope, push);
  const res = await pool.query<IncidentRow>(
    `
    SELECT ${incidentColumnsSql()}, ${expeditionSelectSql(true)}
    FROM incident i
    LEFT JOIN expedition e ON e.id = i.expedition_id
    WHERE i.id = $1
    ${scopeSql ? `AND ${scopeSql}` : ""}
    `,
    values
  );
  const row = res.rows[0] ?? null;
  return row ? mapIncident(row, true) : null;
}

export type InsertIncidentRow = {
  type: IncidentType;
  severite: IncidentSeverite;
  priorite: IncidentPriorite;
  expedition_id: number | null;
  tournee_id: number | null;
  commentaire: string | null;
  created_by: number | null;
};

export async function repoInsertIncident(tx: DbQueryer, row: InsertIncidentRow): Promise<Incident> {
  try {
    const res = await tx.query<IncidentRow>(
      `
      INSERT INTO incident (type, severite, priorite, expedition_id, tournee_id, commentaire, created_by)
      VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING ${incidentColumnsSql("incident")}
      `,
      [row.type, row.severite, row.priorite, row.expedition_id, row.tournee_id, row.commentaire, row.created_by]
    );
    const created = res.rows[0];
    if (!created) throw new Error("Failed to create incident");
    return mapIncident(created);
  } catch (err) {
    const { code, constraint } = getPgErrorInfo(err);
    if (code === "23503" && constraint === "incident_tournee_id_fkey") {
      throw new HttpError(404, "TOURNEE_NOT_FOUND", "Tournée introuvable");
    }
    if (code === "23503" && constraint === "incident_expedition_id_fkey") {
      throw new HttpError(404, "EXPEDITION_NOT_FOUND", "Expédition introuvable");
    }
    throw err;
  }
}

export async function repoGetIncidentForUpdate(tx: DbQueryer, id: number): Promise<Incident | null> {
  const res = await tx.query<IncidentRow>(`SELECT ${incidentColumnsSql()} FROM incident i WHERE i.id = $1 FOR UPDATE`, [id]);
  const row = res.rows[0] ?? null;
  return row ? mapIncident(row) : null;
}

export async function repoResolveIncident(tx: DbQueryer, id: number, details: string, at: Date): Promise<Incident> {
  const res = await tx.query<IncidentRow>(
    `
    UPDATE incident
    SET date_resolution = $2, resolution_details = $3, updated_at = now()
    WHERE id = $1
    RETURNING ${incidentColumnsSql("incident")}
    `,
    [id, at, details]
  );
  const row = res.rows[0];
  if (!row) throw new Error(`Incident ${id} vanished during resolve`);
  return mapIncident(row);
}

export async function repoExpeditionClientId(id: number, tx?: DbQueryer): Promise<number | null> {
  const res = await (tx ?? pool).query<{ client_id: string }>(`SELECT client_id::text AS client_id FROM expedition WHERE id = $1`, [id]);
  const raw = res.rows[0]?.client_id;
  return raw === undefined ? null : toInt(raw, "expedition.client_id");
}
