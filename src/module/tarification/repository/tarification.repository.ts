import pool from "../../../config/database";
import { HttpError } from "../../../utils/httpError";
import { createParams, getPgErrorInfo, sortDirection, toInt, type ListWhere } from "../../../utils/pg";
import type { DbQueryer } from "../../../utils/transaction";
import { includesSet } from "../../../utils/validators";
import type { Destination, Paginated, Tarification, TypeService } from "../types/tarification.types";
import type {
  CreateDestinationBodyDTO,
  CreateTarificationBodyDTO,
  CreateTypeServiceBodyDTO,
  ListDestinationsQueryDTO,
  ListTarificationsQueryDTO,
  UpdateDestinationBodyDTO,
  UpdateTarificationBodyDTO,
  UpdateTypeServiceBodyDTO,
} from "../validators/tarification.validators";

export type RateRow = {
  tarif_poids: string;
  tarif_volume: string;
  tarif_base: string;
};

/** Active tariff of an active destination and service type, with the destination's base fee. */
export async function repoFindActiveRate(
  typeServiceId: number,
  destinationId: number,
  tx?: DbQueryer
): Promise<RateRow | null> {
  const q = tx ?? pool;
  const res = await q.query<RateRow>(
    `
    SELECT
      t.tarif_poids::text AS tarif_poids,
      t.tarif_volume::text AS tarif_volume,
      d.tarif_base::text AS tarif_base
    FROM tarification t
    JOIN destinations d ON d.id = t.destination_id
    JOIN types_service ts ON ts.id = t.type_service_id
    WHERE t.type_service_id = $1
      AND t.destination_id = $2
      AND t.is_active = true
      AND d.is_active = true
      AND ts.is_active = true
    LIMIT 1
    `,
    [typeServiceId, destinationId]
  );
  return res.rows[0] ?? null;
}

function sortColumn(sortBy: ListTarificationsQueryDTO["sortBy"]) {
  switch (sortBy) {
    case "tarif_poids":
      return "t.tarif_poids";
    case "tarif_volume":
      return "t.tarif_volume";
    case "updated_at":
    default:
      return "t.updated_at";
  }
}

function buildListWhere(filters: ListTarificationsQueryDTO): ListWhere {
  const where: string[] = [];
  const { values, push } = createParams();

  if (filters.type_service_id !== undefined) {
    where.push(`t.type_service_id = ${push(filters.type_service_id)}`);
  }
  if (filters.destination_id !== undefined) {
    where.push(`t.destination_id = ${push(filters.destination_id)}`);
  }
  if (filters.active !== undefined) {
    where.push(`t.is_active = ${push(filters.active)}`);
  }

  return {
    whereSql: where.length ? `WHERE ${where.join(" AND ")}` : "",
    values,
  };
}

const destinationSelectSql = `jsonb_build_object(
    'id', d.id,
    'ville', d.ville,
    'pays', d.pays,
    'zone_geographique', d.zone_geographique,
    'tarif_base', d.tarif_base::text,
    'is_active', d.is_active
  ) AS destination`;

const typeServiceSelectSql = `jsonb_build_object('id', ts.id, 'nom', ts.nom) AS type_service`;

type TarificationRow = Omit<Tarification, "id" | "type_service_id" | "destination_id"> & {
  id: string;
  type_service_id: string;
  destination_id: string;
};

function mapTarification(r: TarificationRow, includes: Set<string>): Tarification {
  return {
    ...r,
    id: toInt(r.id, "tarification.id"),
    type_service_id: toInt(r.type_service_id, "tarification.type_service_id"),
    destination_id: toInt(r.destination_id, "tarification.destination_id"),
    destination: includes.has("destination") ? r.destination : undefined,
    type_service: includes.has("type_service") ? r.type_service : undefined,
  };
}

const baseSelectSql = (includes: Set<string>) => `
  SELECT
    t.id::text AS id,
    t.type_service_id::text AS type_service_id,
    t.destination_id::text AS destination_id,
    t.tarif_poids::text AS tarif_poids,
    t.tarif_volume::text AS tarif_volume,
    t.is_active,
    t.created_at::text AS created_at,
    t.updated_at::text AS updated_at,
    ${includes.has("destination") ? destinationSelectSql : "NULL AS destination"},
    ${includes.has("type_service") ? typeServiceSelectSql : "NULL AS type_service"}
  FROM tarification t
  JOIN destinations d ON d.id = t.destination_id
  JOIN types_service ts ON ts.id = t.type_service_id
`;

export async function repoListTarifications(filters: ListTarificationsQueryDTO): Promise<Paginated<Tarification>> {
  const includes = includesSet(filters.include);
  const page = filters.page ?? 1;
  const pageSize = filters.pageSize ?? 20;
  const offset = (page - 1) * pageSize;

  const { whereSql, values } = buildListWhere(filters);

  const countRes = await pool.query<{ total: number }>(
    `SELECT COUNT(*)::int AS total FROM tarification t ${whereSql}`,
    values
  );
  const total = countRes.rows[0]?.total ?? 0;

  const dataSql = `
    ${baseSelectSql(includes)}
    ${whereSql}
    ORDER BY ${sortColumn(filters.sortBy)} ${sortDirection(filters.sortDir)}, t.id ASC
    LIMIT $${values.length + 1}
    OFFSET $${values.length + 2}
  `;
  const dataRes = await pool.query<TarificationRow>(dataSql, [...values, pageSize, offset]);

  return { items: dataRes.rows.map((r) => mapTarification(r, includes)), total };
}

export async function repoGetTarification(id: number, includeValue: string): Promise<Tarification | null> {
  const includes = includesSet(includeValue);
  const res = await pool.query<TarificationRow>(`${baseSelectSql(includes)} WHERE t.id = $1`, [id]);
  const row = res.rows[0] ?? null;
  return row ? mapTarification(row, includes) : null;
}

export async function repoCreateTarification(input: CreateTarificationBodyDTO): Promise<{ id: number }> {
  try {
    const ins = await pool.query<{ id: string }>(
      `
      INSERT INTO tarification (type_service_id, destination_id, tarif_poids, tarif_volume, is_active)
      VALUES ($1, $2, $3::numeric, $4::numeric, $5)
      RETURNING id::text AS id
      `,
      [input.type_service_id, input.destination_id, input.tarif_poids, input.tarif_volume, input.is_active]
    );
    const idRaw = ins.rows[0]?.id;
    if (!idRaw) throw new Error("Failed to create tarification");
    return { id: toInt(idRaw, "tarification.id") };
  } catch (err) {
    const { code, constraint } = getPgErrorInfo(err);
    if (code === "23505" && constraint === "tarification_service_destination_key") {
      throw new HttpError(409, "TARIFICATION_EXISTS", "Une tarification existe déjà pour ce service et cette destination");
    }
    if (code === "23503" && constraint === "tarification_destination_id_fkey") {
      throw new HttpError(404, "DESTINATION_NOT_FOUND", "Destination introuvable");
    }
    if (code === "23503" && constraint === "tarification_type_service_id_fkey") {
      throw new HttpError(404, "TYPE_SERVICE_NOT_FOUND", "Type de service introuvable");
    }
    throw err;
  }
}

export async function repoUpdateTarification(id: number, input: UpdateTarificationBodyDTO): Promise<{ id: number } | null> {
  const sets: string[] = [];
  const { values, push } = createParams([id]);

  if (input.tarif_poids !== undefined) sets.push(`tarif_poids = ${push(input.tarif_poids)}::numeric`);
  if (input.tarif_volume !== undefined) sets.push(`tarif_volume = ${push(input.tarif_volume)}::numeric`);
  if (input.is_active !== undefined) sets.push(`is_active = ${push(input.is_active)}`);

  if (sets.length === 0) {
    throw new HttpError(400, "NO_UPDATE", "No fields to update");
  }
  sets.push("updated_at = now()");

  const res = await pool.query<{ id: string }>(
    `UPDATE tarification SET ${sets.join(", ")} WHERE id = $1 RETURNING id::text AS id`,
    values
  );
  const row = res.rows[0] ?? null;
  return row ? { id: toInt(row.id, "tarification.id") } : null;
}

export async function repoDeactivateTarification(id: number): Promise<boolean> {
  const res = await pool.query(
    `UPDATE tarification SET is_active = false, updated_at = now() WHERE id = $1`,
    [id]
  );
  return (res.rowCount ?? 0) > 0;
}

const destinationColumnsSql = (d = "d") =>
  `${d}.id::text AS id, ${d}.ville, ${d}.pays, ${d}.zone_geographique, ${d}.tarif_base::text AS tarif_base, ${d}.is_active`;

type DestinationRow = Omit<Destination, "id"> & { id: string };

const mapDestination = (r: DestinationRow): Destination => ({ ...r, id: toInt(r.id, "destination.id") });

function destinationTaken(err: unknown): HttpError | null {
  const { code, constraint } = getPgErrorInfo(err);
  if (code === "23505" && constraint === "destinations_ville_pays_key") {
    return new HttpError(409, "DESTINATION_EXISTS", "Cette destination existe déjà");
  }
  return null;
}

export async function repoListDestinations(filters: ListDestinationsQueryDTO): Promise<Destination[]> {
  const where: string[] = [];
  const { values, push } = createParams();

  if (filters.q) {
    const p = push(`%${filters.q}%`);
    where.push(`(d.ville ILIKE ${p} OR d.pays ILIKE ${p})`);
  }
  if (filters.zone_geographique) {
    where.push(`d.zone_geographique = ${push(filters.zone_geographique)}`);
  }
  if (filters.is_active !== undefined) where.push(`d.is_active = ${push(filters.is_active)}`);

  const res = await pool.query<DestinationRow>(
    `
    SELECT ${destinationColumnsSql()}
    FROM destinations d
    ${where.length ? `WHERE ${where.join(" AND ")}` : ""}
    ORDER BY d.pays ASC, d.ville ASC
    `,
    values
  );
  return res.rows.map(mapDestination);
}

export async function repoCreateDestination(input: CreateDestinationBodyDTO): Promise<Destination> {
  try {
    const res = await pool.query<DestinationRow>(
      `
      INSERT INTO destinations (ville, pays, zone_geographique, tarif_base)
      VALUES ($1, $2, $3, $4::numeric)
      RETURNING ${destinationColumnsSql("destinations")}
      `,
      [input.ville, input.pays, input.zone_geographique, input.tarif_base]
    );
    const row = res.rows[0];
    if (!row) throw new Error("Failed to create destination");
    return mapDestination(row);
  } catch (err) {
    throw destinationTaken(err) ?? err;
  }
}

export async function repoUpdateDestination(id: number, input: UpdateDestinationBodyDTO): Promise<Destination | null> {
  const sets: string[] = [];
  const { values, push } = createParams([id]);

  if (input.ville !== undefined) sets.push(`ville = ${push(input.ville)}`);
  if (input.pays !== undefined) sets.push(`pays = ${push(input.pays)}`);
  if (input.zone_geographique !== undefined) sets.push(`zone_geographique = ${push(input.zone_geographique)}`);
  if (input.tarif_base !== undefined) sets.push(`tarif_base = ${push(input.tarif_base)}::numeric`);
  if (input.is_active !== undefined) sets.push(`is_active = ${push(input.is_active)}`);

  if (sets.length === 0) {
    throw new HttpError(400, "NO_UPDATE", "No fields to update");
  }
  sets.push("updated_at = now()");

  try {
    const res = await pool.query<DestinationRow>(
      `UPDATE destinations SET ${sets.join(", ")} WHERE id = $1 RETURNING ${destinationColumnsSql("destinations")}`,
      values
    );
    const row = res.rows[0] ?? null;
    return row ? mapDestination(row) : null;
  } catch (err) {
    throw destinationTaken(err) ?? err;
  }
}

type TypeServiceRow = Omit<TypeService, "id"> & { id: string };

const mapTypeService = (r: TypeServiceRow): TypeService => ({ ...r, id: toInt(r.id, "type_service.id") });

function typeServiceTaken(err: unknown): HttpError | null {
  const { code, constraint } = getPgErrorInfo(err);
  if (code === "23505" && constraint === "types_service_nom_key") {
    return new HttpError(409, "TYPE_SERVICE_EXISTS", "Ce type de service existe déjà");
  }
  return null;
}

export async function repoListTypesService(): Promise<TypeService[]> {
  const res = await pool.query<TypeServiceRow>(
    `SELECT ts.id::text AS id, ts.nom, ts.description, ts.is_active FROM types_service ts ORDER BY ts.nom ASC`
  );
  return res.rows.map(mapTypeService);
}

export async function repoCreateTypeService(input: CreateTypeServiceBodyDTO): Promise<TypeService> {
  try {
    const res = await pool.query<TypeServiceRow>(
      `
      INSERT INTO types_service (nom, description)
      VALUES ($1, $2)
      RETURNING id::text AS id, nom, description, is_active
      `,
      [input.nom, input.description ?? null]
    );
    const row = res.rows[0];
    if (!row) throw new Error("Failed to create type_service");
    return mapTypeService(row);
  } catch (err) {
    throw typeServiceTaken(err) ?? err;
  }
}

export async function repoUpdateTypeService(id: number, input: UpdateTypeServiceBodyDTO): Promise<TypeService | null> {
  const sets: string[] = [];
  const { values, push } = createParams([id]);

  if (input.nom !== undefined) sets.push(`nom = ${push(input.nom)}`);
  if (input.description !== undefined) sets.push(`description = ${push(input.description)}`);
  if (input.is_active !== undefined) sets.push(`is_active = ${push(input.is_active)}`);

  if (sets.length === 0) {
    throw new HttpError(400, "NO_UPDATE", "No fields to update");
  }
  sets.push("updated_at = now()");

  try {
    const res = await pool.query<TypeServiceRow>(
      `UPDATE types_service SET ${sets.join(", ")} WHERE id = $1 RETURNING id::text AS id, nom, description, is_active`,
      values
    );
    const row = res.rows[0] ?? null;
    return row ? mapTypeService(row) : null;
  } catch (err) {
    throw typeServiceTaken(err) ?? err;
  }
}

export async function repoGetTypeServiceNom(id: number, tx?: DbQueryer): Promise<string | null> {
  const q = tx ?? pool;
  const res = await q.query<{ nom: string }>(`SELECT nom FROM types_service WHERE id = $1`, [id]);
  return res.rows[0]?.nom ?? null;
}
