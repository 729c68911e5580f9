import pool from "../../../config/database";
import { HttpError } from "../../../utils/httpError";
import { createParams, getPgErrorInfo, isoTs, sortDirection, toInt, type ListWhere } from "../../../utils/pg";
import type { DbQueryer } from "../../../utils/transaction";
import type { Chauffeur, Paginated } from "../types/chauffeurs.types";
import type {
  CreateChauffeurBodyDTO,
  ListChauffeursQueryDTO,
  UpdateChauffeurBodyDTO,
} from "../validators/chauffeurs.validators";

const chauffeurColumnsSql = (c = "ch") => `
  ${c}.id::text AS id,
  ${c}.user_id,
  ${c}.nom,
  ${c}.prenom,
  ${c}.numero_permis,
  ${c}.telephone,
  ${c}.disponibilite,
  ${c}.date_embauche::text AS date_embauche,
  ${c}.is_active,
  ${isoTs(`${c}.created_at`)} AS created_at,
  ${isoTs(`${c}.updated_at`)} AS updated_at
`;

type ChauffeurRow = Omit<Chauffeur, "id"> & { id: string };

const mapChauffeur = (r: ChauffeurRow): Chauffeur => ({ ...r, id: toInt(r.id, "chauffeur.id") });

function mapWriteError(err: unknown): unknown {
  const { code, constraint } = getPgErrorInfo(err);
  if (code === "23505" && constraint === "chauffeurs_numero_permis_key") {
    return new HttpError(409, "NUMERO_PERMIS_TAKEN", "Ce numéro de permis est déjà enregistré");
  }
  if (code === "23505" && constraint === "chauffeurs_user_id_key") {
    return new HttpError(409, "USER_ALREADY_CHAUFFEUR", "Ce compte est déjà rattaché à un chauffeur");
  }
  if (code === "23503" && constraint === "chauffeurs_user_id_fkey") {
    return new HttpError(404, "USER_NOT_FOUND", "Utilisateur introuvable");
  }
  return err;
}

function sortColumn(sortBy: ListChauffeursQueryDTO["sortBy"]) {
  switch (sortBy) {
    case "prenom":
      return "ch.prenom";
    case "date_embauche":
      return "ch.date_embauche";
    case "nom":
    default:
      return "ch.nom";
  }
}

function buildListWhere(filters: ListChauffeursQueryDTO): ListWhere {
  const where: string[] = [];
  const { values, push } = createParams();

  if (filters.q) {
    const p = push(`%${filters.q}%`);
    where.push(`(ch.nom ILIKE ${p} OR ch.prenom ILIKE ${p} OR ch.numero_permis ILIKE ${p} OR ch.telephone ILIKE ${p})`);
  }
  if (filters.disponibilite !== undefined) where.push(`ch.disponibilite = ${push(filters.disponibilite)}`);
  if (filters.is_active !== undefined) where.push(`ch.is_active = ${push(filters.is_active)}`);

  return { whereSql: where.length ? `WHERE ${where.join(" AND ")}` : "", values };
}

export async function repoListChauffeurs(filters: ListChauffeursQueryDTO): Promise<Paginated<Chauffeur>> {
  const page = filters.page ?? 1;
  const pageSize = filters.pageSize ?? 20;
  const offset = (page - 1) * pageSize;
  const { whereSql, values } = buildListWhere(filters);

  const countRes = await pool.query<{ total: number }>(`SELECT COUNT(*)::int AS total FROM chauffeurs ch ${whereSql}`, values);
  const total = countRes.rows[0]?.total ?? 0;

  const dataRes = await pool.query<ChauffeurRow>(
    `
    SELECT ${chauffeurColumnsSql()}
    FROM chauffeurs ch
    ${whereSql}
    ORDER BY ${sortColumn(filters.sortBy)} ${sortDirection(filters.sortDir)}, ch.id ASC
    LIMIT $${values.length + 1}
    OFFSET $${values.length + 2}
    `,
    [...values, pageSize, offset]
  );

  return { items: dataRes.rows.map(mapChauffeur), total };
}

export async function repoGetChauffeur(id: number): Promise<Chauffeur | null> {
  const res = await pool.query<ChauffeurRow>(`SELECT ${chauffeurColumnsSql()} FROM chauffeurs ch WHERE ch.id = $1`, [id]);
  const row = res.rows[0] ?? null;
  return row ? mapChauffeur(row) : null;
}

/** Driver profile behind a login, if any. */
export async function repoFindChauffeurIdByUser(userId: number, tx?: DbQueryer): Promise<number | null> {
  const res = await (tx ?? pool).query<{ id: string }>(`SELECT id::text AS id FROM chauffeurs WHERE user_id = $1`, [userId]);
  const raw = res.rows[0]?.id;
  return raw === undefined ? null : toInt(raw, "chauffeur.id");
}

export async function repoCreateChauffeur(input: CreateChauffeurBodyDTO): Promise<Chauffeur> {
  try {
    const res = await pool.query<ChauffeurRow>(
      `
      INSERT INTO chauffeurs (user_id, nom, prenom, numero_permis, telephone, disponibilite, date_embauche)
      VALUES ($1, $2, $3, $4, $5, $6, $7::date)
      RETURNING ${chauffeurColumnsSql("chauffeurs")}
      `,
      [
        input.user_id ?? null,
        input.nom,
        input.prenom,
        input.numero_permis,
        input.telephone ?? null,
        input.disponibilite,
        input.date_embauche,
      ]
    );
    const row = res.rows[0];
    if (!row) throw new Error("Failed to create chauffeur");
    return mapChauffeur(row);
  } catch (err) {
    throw mapWriteError(err);
  }
}

export async function repoUpdateChauffeur(id: number, input: UpdateChauffeurBodyDTO): Promise<Chauffeur | null> {
  const sets: string[] = [];
  const { values, push } = createParams([id]);

  if (input.user_id !== undefined) sets.push(`user_id = ${push(input.user_id)}`);
  if (input.nom !== undefined) sets.push(`nom = ${push(input.nom)}`);
  if (input.prenom !== undefined) sets.push(`prenom = ${push(input.prenom)}`);
  if (input.numero_permis !== undefined) sets.push(`numero_permis = ${push(input.numero_permis)}`);
  if (input.telephone !== undefined) sets.push(`telephone = ${push(input.telephone)}`);
  if (input.disponibilite !== undefined) sets.push(`disponibilite = ${push(input.disponibilite)}`);
  if (input.date_embauche !== undefined) sets.push(`date_embauche = ${push(input.date_embauche)}::date`);
  if (input.is_active !== undefined) sets.push(`is_active = ${push(input.is_active)}`);

  if (sets.length === 0) {
    throw new HttpError(400, "NO_UPDATE", "No fields to update");
  }
  sets.push("updated_at = now()");

  try {
    const res = await pool.query<ChauffeurRow>(
      `UPDATE chauffeurs SET ${sets.join(", ")} WHERE id = $1 RETURNING ${chauffeurColumnsSql("chauffeurs")}`,
      values
    );
    const row = res.rows[0] ?? null;
    return row ? mapChauffeur(row) : null;
  } catch (err) {
    throw mapWriteError(err);
  }
}

/** Soft delete; a deactivated driver is also unavailable. */
export async function repoDeactivateChauffeur(id: number): Promise<boolean> {
  const res = await pool.query(
    `UPDATE chauffeurs SET is_active = false, disponibilite = false, updated_at = now() WHERE id = $1`,
    [id]
  );
  return (res.rowCount ?? 0) > 0;
}
