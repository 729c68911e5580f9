import pool from "../../../config/database";
import { HttpError } from "../../../utils/httpError";
import { createParams, getPgErrorInfo, isoTs, sortDirection, toInt, type ListWhere } from "../../../utils/pg";
import { VEHICULE_ETATS, type Paginated, type Vehicule, type VehiculeEtat } from "../types/vehicules.types";
import type {
  CreateVehiculeBodyDTO,
  ListVehiculesQueryDTO,
  UpdateVehiculeBodyDTO,
} from "../validators/vehicules.validators";

function toEtat(value: string): VehiculeEtat {
  const found = VEHICULE_ETATS.find((e) => e === value);
  if (!found) throw new Error(`Invalid vehicule.etat: ${value}`);
  return found;
}

const vehiculeColumnsSql = (v = "v") => `
  ${v}.id::text AS id,
  ${v}.immatriculation,
  ${v}.type,
  ${v}.capacite::text AS capacite,
  ${v}.consommation::text AS consommation,
  ${v}.etat,
  ${v}.is_active,
  ${isoTs(`${v}.created_at`)} AS created_at,
  ${isoTs(`${v}.updated_at`)} AS updated_at
`;

type VehiculeRow = Omit<Vehicule, "id" | "etat"> & { id: string; etat: string };

const mapVehicule = (r: VehiculeRow): Vehicule => ({ ...r, id: toInt(r.id, "vehicule.id"), etat: toEtat(r.etat) });

function immatriculationTaken(err: unknown): HttpError | null {
  const { code, constraint } = getPgErrorInfo(err);
  if (code === "23505" && constraint === "vehicules_immatriculation_key") {
    return new HttpError(409, "IMMATRICULATION_TAKEN", "Ce véhicule est déjà enregistré");
  }
  return null;
}

function sortColumn(sortBy: ListVehiculesQueryDTO["sortBy"]) {
  switch (sortBy) {
    case "capacite":
      return "v.capacite";
    case "created_at":
      return "v.created_at";
    case "immatriculation":
    default:
      return "v.immatriculation";
  }
}

function buildListWhere(filters: ListVehiculesQueryDTO): ListWhere {
  const where: string[] = [];
  const { values, push } = createParams();

  if (filters.q) {
    const p = push(`%${filters.q}%`);
    where.push(`(v.immatriculation ILIKE ${p} OR v.type ILIKE ${p})`);
  }
  if (filters.etat) where.push(`v.etat = ${push(filters.etat)}`);
  if (filters.is_active !== undefined) where.push(`v.is_active = ${push(filters.is_active)}`);

  return { whereSql: where.length ? `WHERE ${where.join(" AND ")}` : "", values };
}

export async function repoListVehicules(filters: ListVehiculesQueryDTO): Promise<Paginated<Vehicule>> {
  const page = filters.page ?? 1;
  const pageSize = filters.pageSize ?? 20;
  const offset = (page - 1) * pageSize;
  const { whereSql, values } = buildListWhere(filters);

  const countRes = await pool.query<{ total: number }>(`SELECT COUNT(*)::int AS total FROM vehicules v ${whereSql}`, values);
  const total = countRes.rows[0]?.total ?? 0;

  const dataRes = await pool.query<VehiculeRow>(
    `
    SELECT ${vehiculeColumnsSql()}
    FROM vehicules v
    ${whereSql}
    ORDER BY ${sortColumn(filters.sortBy)} ${sortDirection(filters.sortDir)}, v.id ASC
    LIMIT $${values.length + 1}
    OFFSET $${values.length + 2}
    `,
    [...values, pageSize, offset]
  );

  return { items: dataRes.rows.map(mapVehicule), total };
}

export async function repoGetVehicule(id: number): Promise<Vehicule | null> {
  const res = await pool.query<VehiculeRow>(`SELECT ${vehiculeColumnsSql()} FROM vehicules v WHERE v.id = $1`, [id]);
  const row = res.rows[0] ?? null;
  return row ? mapVehicule(row) : null;
}

export async function repoCreateVehicule(input: CreateVehiculeBodyDTO): Promise<Vehicule> {
  try {
    const res = await pool.query<VehiculeRow>(
      `
      INSERT INTO vehicules (immatriculation, type, capacite, consommation, etat)
      VALUES ($1, $2, $3::numeric, $4::numeric, $5)
      RETURNING ${vehiculeColumnsSql("vehicules")}
      `,
      [input.immatriculation, input.type, input.capacite, input.consommation, input.etat]
    );
    const row = res.rows[0];
    if (!row) throw new Error("Failed to create vehicule");
    return mapVehicule(row);
  } catch (err) {
    throw immatriculationTaken(err) ?? err;
  }
}

export async function repoUpdateVehicule(id: number, input: UpdateVehiculeBodyDTO): Promise<Vehicule | null> {
  const sets: string[] = [];
  const { values, push } = createParams([id]);

  if (input.immatriculation !== undefined) sets.push(`immatriculation = ${push(input.immatriculation)}`);
  if (input.type !== undefined) sets.push(`type = ${push(input.type)}`);
  if (input.capacite !== undefined) sets.push(`capacite = ${push(input.capacite)}::numeric`);
  if (input.consommation !== undefined) sets.push(`consommation = ${push(input.consommation)}::numeric`);
  if (input.etat !== undefined) sets.push(`etat = ${push(input.etat)}`);
  if (input.is_active !== undefined) sets.push(`is_active = ${push(input.is_active)}`);

  if (sets.length === 0) {
    throw new HttpError(400, "NO_UPDATE", "No fields to update");
  }
  sets.push("updated_at = now()");

  try {
    const res = await pool.query<VehiculeRow>(
      `UPDATE vehicules SET ${sets.join(", ")} WHERE id = $1 RETURNING ${vehiculeColumnsSql("vehicules")}`,
      values
    );
    const row = res.rows[0] ?? null;
    return row ? mapVehicule(row) : null;
  } catch (err) {
    throw immatriculationTaken(err) ?? err;
  }
}

/** Soft delete; the vehicle leaves the fleet as OUT_OF_SERVICE. */
export async function repoDeactivateVehicule(id: number): Promise<boolean> {
  const res = await pool.query(
    `UPDATE vehicules SET is_active = false, etat = 'OUT_OF_SERVICE', updated_at = now() WHERE id = $1`,
    [id]
  );
  return (res.rowCount ?? 0) > 0;
}
