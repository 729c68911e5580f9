import pool from "../../../config/database";
import { HttpError } from "../../../utils/httpError";
import { createParams, getPgErrorInfo, isoTs, sortDirection, toInt, type ListWhere } from "../../../utils/pg";
import type { Client, Paginated } from "../types/clients.types";
import type { CreateClientBodyDTO, ListClientsQueryDTO, UpdateClientBodyDTO } from "../validators/clients.validators";

const clientColumnsSql = (c = "c") => `
  ${c}.id::text AS id,
  ${c}.nom,
  ${c}.prenom,
  ${c}.email,
  ${c}.telephone,
  ${c}.adresse,
  ${c}.solde::text AS solde,
  ${c}.date_inscription::text AS date_inscription,
  ${c}.created_by,
  ${c}.is_active,
  ${isoTs(`${c}.created_at`)} AS created_at,
  ${isoTs(`${c}.updated_at`)} AS updated_at
`;

type ClientRow = Omit<Client, "id"> & { id: string };

const mapClient = (r: ClientRow): Client => ({ ...r, id: toInt(r.id, "client.id") });

function emailTaken(err: unknown): HttpError | null {
  const { code, constraint } = getPgErrorInfo(err);
  if (code === "23505" && constraint === "clients_email_key") {
    return new HttpError(409, "CLIENT_EMAIL_TAKEN", "Un client existe déjà avec cet email");
  }
  return null;
}

function sortColumn(sortBy: ListClientsQueryDTO["sortBy"]) {
  switch (sortBy) {
    case "prenom":
      return "c.prenom";
    case "date_inscription":
      return "c.date_inscription";
    case "solde":
      return "c.solde";
    case "created_at":
      return "c.created_at";
    case "nom":
    default:
      return "c.nom";
  }
}

function buildListWhere(filters: ListClientsQueryDTO): ListWhere {
  const where: string[] = [];
  const { values, push } = createParams();

  if (filters.q) {
    const p = push(`%${filters.q}%`);
    where.push(`(c.nom ILIKE ${p} OR c.prenom ILIKE ${p} OR c.email ILIKE ${p} OR c.telephone ILIKE ${p})`);
  }
  if (filters.is_active !== undefined) where.push(`c.is_active = ${push(filters.is_active)}`);

  return { whereSql: where.length ? `WHERE ${where.join(" AND ")}` : "", values };
}

export async function repoListClients(filters: ListClientsQueryDTO): Promise<Paginated<Client>> {
  const page = filters.page ?? 1;
  const pageSize = filters.pageSize ?? 20;
  const offset = (page - 1) * pageSize;
  const { whereSql, values } = buildListWhere(filters);

  const countRes = await pool.query<{ total: number }>(`SELECT COUNT(*)::int AS total FROM clients c ${whereSql}`, values);
  const total = countRes.rows[0]?.total ?? 0;

  const dataRes = await pool.query<ClientRow>(
    `
    SELECT ${clientColumnsSql()}
    FROM clients c
    ${whereSql}
    ORDER BY ${sortColumn(filters.sortBy)} ${sortDirection(filters.sortDir)}, c.id ASC
    LIMIT $${values.length + 1}
    OFFSET $${values.length + 2}
    `,
    [...values, pageSize, offset]
  );

  return { items: dataRes.rows.map(mapClient), total };
}

export async function repoGetClient(id: number): Promise<Client | null> {
  const res = await pool.query<ClientRow>(`SELECT ${clientColumnsSql()} FROM clients c WHERE c.id = $1`, [id]);
  const row = res.rows[0] ?? null;
  return row ? mapClient(row) : null;
}

export async function repoCreateClient(input: CreateClientBodyDTO, createdBy: number | null): Promise<Client> {
  try {
    const res = await pool.query<ClientRow>(
      `
      INSERT INTO clients (nom, prenom, email, telephone, adresse, created_by)
      VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING ${clientColumnsSql("clients")}
      `,
      [input.nom, input.prenom, input.email, input.telephone ?? null, input.adresse ?? null, createdBy]
    );
    const row = res.rows[0];
    if (!row) throw new Error("Failed to create client");
    return mapClient(row);
  } catch (err) {
    throw emailTaken(err) ?? err;
  }
}

export async function repoUpdateClient(id: number, input: UpdateClientBodyDTO): Promise<Client | null> {
  const sets: string[] = [];
  const { values, push } = createParams([id]);

  if (input.nom !== undefined) sets.push(`nom = ${push(input.nom)}`);
  if (input.prenom !== undefined) sets.push(`prenom = ${push(input.prenom)}`);
  if (input.email !== undefined) sets.push(`email = ${push(input.email)}`);
  if (input.telephone !== undefined) sets.push(`telephone = ${push(input.telephone)}`);
  if (input.adresse !== undefined) sets.push(`adresse = ${push(input.adresse)}`);
  if (input.is_active !== undefined) sets.push(`is_active = ${push(input.is_active)}`);

  if (sets.length === 0) {
    throw new HttpError(400, "NO_UPDATE", "No fields to update");
  }
  sets.push("updated_at = now()");

  try {
    const res = await pool.query<ClientRow>(
      `UPDATE clients SET ${sets.join(", ")} WHERE id = $1 RETURNING ${clientColumnsSql("clients")}`,
      values
    );
    const row = res.rows[0] ?? null;
    return row ? mapClient(row) : null;
  } catch (err) {
    throw emailTaken(err) ?? err;
  }
}

/** Soft delete: invoices, shipments and the balance stay attached. */
export async function repoDeactivateClient(id: number): Promise<boolean> {
  const res = await pool.query(`UPDATE clients SET is_active = false, updated_at = now() WHERE id = $1`, [id]);
  return (res.rowCount ?? 0) > 0;
}
