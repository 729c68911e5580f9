import pool from "../../../config/database";
import { formatCents } from "../../../utils/decimal";
import { HttpError } from "../../../utils/httpError";
import { createParams, getPgErrorInfo, isoTs, sortDirection, toInt, type ListWhere } from "../../../utils/pg";
import type { DbQueryer } from "../../../utils/transaction";
import { tourneeScopeSql, type AccessScope } from "../../auth/lib/access-scope";
import type { TourTotals } from "../lib/aggregate";
import type { Paginated, Tournee, TourneeForUpdate, TourneeListItem } from "../types/tournees.types";
import type { CreateTourneeBodyDTO, ListTourneesQueryDTO, UpdateTourneeBodyDTO } from "../validators/tournees.validators";

const tourneeColumnsSql = (t = "t") => `
  ${t}.id::text AS id,
  ${t}.date::text AS date,
  ${t}.chauffeur_id::text AS chauffeur_id,
  ${t}.vehicule_id::text AS vehicule_id,
  ${t}.kilometrage::text AS kilometrage,
  ${t}.kilometrage_manuel,
  ${t}.consommation::text AS consommation,
  ${t}.consommation_manuelle,
  ${t}.duree_minutes,
  ${isoTs(`${t}.created_at`)} AS created_at,
  ${isoTs(`${t}.updated_at`)} AS updated_at
`;

type TourneeRow = Omit<Tournee, "id" | "chauffeur_id" | "vehicule_id"> & {
  id: string;
  chauffeur_id: string;
  vehicule_id: string;
};

function mapTournee(r: TourneeRow): Tournee {
  return {
    ...r,
    id: toInt(r.id, "tournee.id"),
    chauffeur_id: toInt(r.chauffeur_id, "tournee.chauffeur_id"),
    vehicule_id: toInt(r.vehicule_id, "tournee.vehicule_id"),
  };
}

function rethrowFk(err: unknown): never {
  const { code, constraint } = getPgErrorInfo(err);
  if (code === "23503" && constraint === "tournee_chauffeur_id_fkey") {
    throw new HttpError(404, "CHAUFFEUR_NOT_FOUND", "Chauffeur introuvable");
  }
  if (code === "23503" && constraint === "tournee_vehicule_id_fkey") {
    throw new HttpError(404, "VEHICULE_NOT_FOUND", "Véhicule introuvable");
  }
  throw err;
}

export async function repoCreateTournee(input: CreateTourneeBodyDTO): Promise<Tournee> {
  try {
    const res = await pool.query<TourneeRow>(
      `
      INSERT INTO tournee (date, chauffeur_id, vehicule_id, duree_minutes)
      VALUES ($1::date, $2, $3, $4)
      RETURNING ${tourneeColumnsSql("tournee")}
      `,
      [input.date, input.chauffeur_id, input.vehicule_id, input.duree_minutes ?? null]
    );
    const row = res.rows[0];
    if (!row) throw new Error("Failed to create tournee");
    return mapTournee(row);
  } catch (err) {
    return rethrowFk(err);
  }
}

type ListRow = TourneeRow & {
  nb_expeditions: number;
  chauffeur: TourneeListItem["chauffeur"];
  vehicule: TourneeListItem["vehicule"];
};

const listSelectSql = `
  SELECT
    ${tourneeColumnsSql()},
    (SELECT COUNT(*)::int FROM expedition e WHERE e.tournee_id = t.id) AS nb_expeditions,
    CASE WHEN ch.id IS NULL THEN NULL ELSE jsonb_build_object('id', ch.id, 'nom', ch.nom, 'prenom', ch.prenom) END AS chauffeur,
    CASE WHEN v.id IS NULL THEN NULL ELSE jsonb_build_object('id', v.id, 'immatriculation', v.immatriculation) END AS vehicule
  FROM tournee t
  LEFT JOIN chauffeurs ch ON ch.id = t.chauffeur_id
  LEFT JOIN vehicules v ON v.id = t.vehicule_id
`;

function mapListRow(r: ListRow): TourneeListItem {
  const { nb_expeditions, chauffeur, vehicule, ...rest } = r;
  return { ...mapTournee(rest), nb_expeditions, chauffeur, vehicule };
}

function buildListWhere(filters: ListTourneesQueryDTO, scope: AccessScope): ListWhere {
  const where: string[] = [];
  const { values, push } = createParams();

  const scopeSql = tourneeScopeSql(scope, push);
  if (scopeSql) where.push(scopeSql);
  if (filters.from) where.push(`t.date >= ${push(filters.from)}::date`);
  if (filters.to) where.push(`t.date <= ${push(filters.to)}::date`);
  if (filters.chauffeur_id !== undefined) where.push(`t.chauffeur_id = ${push(filters.chauffeur_id)}`);
  if (filters.vehicule_id !== undefined) where.push(`t.vehicule_id = ${push(filters.vehicule_id)}`);

  return { whereSql: where.length ? `WHERE ${where.join(" AND ")}` : "", values };
}

export async function repoListTournees(filters: ListTourneesQueryDTO, scope: AccessScope): Promise<Paginated<TourneeListItem>> {
  const page = filters.page ?? 1;
  const pageSize = filters.pageSize ?? 20;
  const offset = (page - 1) * pageSize;
  const { whereSql, values } = buildListWhere(filters, scope);

  const countRes = await pool.query<{ total: number }>(`SELECT COUNT(*)::int AS total FROM tournee t ${whereSql}`, values);
  const total = countRes.rows[0]?.total ?? 0;

  const orderBy = filters.sortBy === "created_at" ? "t.created_at" : "t.date";
  const dataRes = await pool.query<ListRow>(
    `
    ${listSelectSql}
    ${whereSql}
    ORDER BY ${orderBy} ${sortDirection(filters.sortDir)}, t.id DESC
    LIMIT $${values.length + 1}
    OFFSET $${values.length + 2}
    `,
    [...values, pageSize, offset]
  );
  return { items: dataRes.rows.map(mapListRow), total };
}

export async function repoGetTournee(id: number, scope: AccessScope): Promise<TourneeListItem | null> {
  const { values, push } = createParams([id]);
  const scopeSql = tourneeScopeSql(scope, push);
  const res = await pool.query<ListRow>(
    `
    ${listSelectSql}
    WHERE t.id = $1
    ${scopeSql ? `AND ${scopeSql}` : ""}
    `,
    values
  );
  const row = res.rows[0] ?? null;
  return row ? mapListRow(row) : null;
}

type ForUpdateRow = TourneeRow & { vehicule_consommation: string };

/** Locks the tour row; membership changes and recomputation follow under this lock. */
export async function repoGetTourneeForUpdate(tx: DbQueryer, id: number): Promise<TourneeForUpdate | null> {
  const res = await tx.query<ForUpdateRow>(
    `
    SELECT
      ${tourneeColumnsSql()},
      v.consommation::text AS vehicule_consommation
    FROM tournee t
    JOIN vehicules v ON v.id = t.vehicule_id
    WHERE t.id = $1
    FOR UPDATE OF t
    `,
    [id]
  );
  const row = res.rows[0] ?? null;
  if (!row) return null;
  const { vehicule_consommation, ...rest } = row;
  return { ...mapTournee(rest), vehicule_consommation };
}

export async function repoCountTourneeExpeditions(tx: DbQueryer, tourneeId: number): Promise<number> {
  const res = await tx.query<{ n: number }>(`SELECT COUNT(*)::int AS n FROM expedition WHERE tournee_id = $1`, [tourneeId]);
  return res.rows[0]?.n ?? 0;
}

export async function repoSaveTourneeTotals(tx: DbQueryer, id: number, totals: TourTotals): Promise<Tournee> {
  const res = await tx.query<TourneeRow>(
    `
    UPDATE tournee
    SET
      kilometrage = $2::numeric,
      kilometrage_manuel = $3,
      consommation = $4::numeric,
      consommation_manuelle = $5,
      updated_at = now()
    WHERE id = $1
    RETURNING ${tourneeColumnsSql("tournee")}
    `,
    [id, formatCents(totals.kilometrage), totals.kilometrage_manuel, formatCents(totals.consommation), totals.consommation_manuelle]
  );
  const row = res.rows[0];
  if (!row) throw new Error(`Tournee ${id} vanished during recompute`);
  return mapTournee(row);
}

/** Header fields and manual flags. Distance/fuel values are written by repoSaveTourneeTotals. */
export async function repoUpdateTourneeHeader(tx: DbQueryer, id: number, patch: UpdateTourneeBodyDTO): Promise<void> {
  const sets: string[] = [];
  const { values, push } = createParams([id]);

  if (patch.date !== undefined) sets.push(`date = ${push(patch.date)}::date`);
  if (patch.chauffeur_id !== undefined) sets.push(`chauffeur_id = ${push(patch.chauffeur_id)}`);
  if (patch.vehicule_id !== undefined) sets.push(`vehicule_id = ${push(patch.vehicule_id)}`);
  if (patch.duree_minutes !== undefined) sets.push(`duree_minutes = ${push(patch.duree_minutes)}`);
  if (patch.kilometrage !== undefined) {
    sets.push(`kilometrage_manuel = ${push(patch.kilometrage !== null)}`);
    if (patch.kilometrage !== null) sets.push(`kilometrage = ${push(patch.kilometrage)}::numeric`);
  }
  if (patch.consommation !== undefined) {
    sets.push(`consommation_manuelle = ${push(patch.consommation !== null)}`);
    if (patch.consommation !== null) sets.push(`consommation = ${push(patch.consommation)}::numeric`);
  }

  if (sets.length === 0) {
    throw new HttpError(400, "NO_UPDATE", "No fields to update");
  }
  sets.push("updated_at = now()");

  try {
    await tx.query(`UPDATE tournee SET ${sets.join(", ")} WHERE id = $1`, values);
  } catch (err) {
    rethrowFk(err);
  }
}

export async function repoDeleteTournee(tx: DbQueryer, id: number): Promise<boolean> {
  await tx.query(`UPDATE expedition SET tournee_id = NULL, updated_at = now() WHERE tournee_id = $1`, [id]);
  const res = await tx.query(`DELETE FROM tournee WHERE id = $1`, [id]);
  return (res.rowCount ?? 0) > 0;
}
