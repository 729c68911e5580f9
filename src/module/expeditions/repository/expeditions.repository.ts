import pool from "../../../config/database";
import { HttpError } from "../../../utils/httpError";
import { createParams, isoTs, sortDirection, toInt, type ListWhere } from "../../../utils/pg";
import type { DbQueryer } from "../../../utils/transaction";
import { includesSet } from "../../../utils/validators";
import { expeditionScopeSql, type AccessScope } from "../../auth/lib/access-scope";
import { parseStatut } from "../lib/status-machine";
import type {
  ClientLite,
  DestinationLite,
  Expedition,
  ExpeditionListItem,
  ExpeditionStatusHistoryEntry,
  ExpeditionStatut,
  Paginated,
} from "../types/expeditions.types";
import type { ListExpeditionsQueryDTO } from "../validators/expeditions.validators";

export const expeditionColumnsSql = (e = "e") => `
  ${e}.id::text AS id,
  ${e}.numero,
  ${e}.client_id::text AS client_id,
  ${e}.type_service_id::text AS type_service_id,
  ${e}.destination_id::text AS destination_id,
  ${e}.poids::text AS poids,
  ${e}.volume::text AS volume,
  ${e}.description,
  ${e}.montant::text AS montant,
  ${e}.statut,
  ${isoTs(`${e}.statut_updated_at`)} AS statut_updated_at,
  ${isoTs(`${e}.date_creation`)} AS date_creation,
  ${isoTs(`${e}.date_livraison`)} AS date_livraison,
  ${isoTs(`${e}.predicted_delivery_time`)} AS predicted_delivery_time,
  ${e}.tournee_id::text AS tournee_id,
  ${e}.agent_responsable_id,
  ${e}.is_active,
  ${isoTs(`${e}.created_at`)} AS created_at,
  ${isoTs(`${e}.updated_at`)} AS updated_at
`;

export type ExpeditionRow = Omit<Expedition, "id" | "client_id" | "type_service_id" | "destination_id" | "statut" | "tournee_id"> & {
  id: string;
  client_id: string;
  type_service_id: string;
  destination_id: string;
  statut: string;
  tournee_id: string | null;
};

export function mapExpedition(r: ExpeditionRow): Expedition {
  return {
    ...r,
    id: toInt(r.id, "expedition.id"),
    client_id: toInt(r.client_id, "expedition.client_id"),
    type_service_id: toInt(r.type_service_id, "expedition.type_service_id"),
    destination_id: toInt(r.destination_id, "expedition.destination_id"),
    statut: parseStatut(r.statut),
    tournee_id: r.tournee_id === null ? null : toInt(r.tournee_id, "expedition.tournee_id"),
  };
}

export const MAX_NUMERO_SEQ = 999_999;

export function formatNumero(seq: number): string {
  if (seq > MAX_NUMERO_SEQ) {
    throw new HttpError(503, "NUMERO_SEQUENCE_EXHAUSTED", "Plus aucun numéro d'expédition disponible (EXP999999 atteint)");
  }
  return `EXP${String(seq).padStart(6, "0")}`;
}

export async function repoNextNumero(tx: DbQueryer): Promise<string> {
  const res = await tx.query<{ n: string }>(`SELECT nextval('public.expedition_numero_seq')::text AS n`);
  const raw = res.rows[0]?.n;
  if (!raw) throw new Error("Failed to allocate expedition numero");
  return formatNumero(toInt(raw, "expedition_numero_seq"));
}

export type InsertExpeditionRow = {
  numero: string;
  client_id: number;
  type_service_id: number;
  destination_id: number;
  poids: string;
  volume: string;
  description: string | null;
  montant: string;
  agent_responsable_id: number | null;
};

export async function repoInsertExpedition(tx: DbQueryer, row: InsertExpeditionRow): Promise<Expedition> {
  const res = await tx.query<ExpeditionRow>(
    `
    INSERT INTO expedition (
      numero,
      client_id,
      type_service_id,
      destination_id,
      poids,
      volume,
      description,
      montant,
      statut,
      agent_responsable_id
    ) VALUES ($1,$2,$3,$4,$5::numeric,$6::numeric,$7,$8::numeric,'CREATED',$9)
    RETURNING ${expeditionColumnsSql("expedition")}
    `,
    [
      row.numero,
      row.client_id,
      row.type_service_id,
      row.destination_id,
      row.poids,
      row.volume,
      row.description,
      row.montant,
      row.agent_responsable_id,
    ]
  );
  const inserted = res.rows[0];
  if (!inserted) throw new Error("Failed to insert expedition");
  return mapExpedition(inserted);
}

/** `activeOnly` skips deactivated clients; invoicing still reaches them. */
export async function repoClientExists(tx: DbQueryer, clientId: number, opts: { activeOnly?: boolean } = {}): Promise<boolean> {
  const res = await tx.query(`SELECT 1 FROM clients WHERE id = $1${opts.activeOnly ? " AND is_active = true" : ""}`, [clientId]);
  return (res.rowCount ?? 0) > 0;
}

export async function repoGetExpedition(
  id: number,
  scope: AccessScope,
  includeValue = "client,destination"
): Promise<ExpeditionListItem | null> {
  const includes = includesSet(includeValue);
  const { values, push } = createParams([id]);
  const scopeSql = expeditionScopeSql(scope, push);

  const res = await pool.query<ListRow>(
    `
    ${listSelectSql(includes)}
    WHERE e.id = $1
    ${scopeSql ? `AND ${scopeSql}` : ""}
    `,
    values
  );
  const row = res.rows[0] ?? null;
  return row ? mapListRow(row, includes) : null;
}

/** Locks the row for the rest of the transaction. */
export async function repoGetExpeditionForUpdate(
  tx: DbQueryer,
  id: number,
  scope: AccessScope
): Promise<Expedition | null> {
  const { values, push } = createParams([id]);
  const scopeSql = expeditionScopeSql(scope, push);
  const res = await tx.query<ExpeditionRow>(
    `
    SELECT ${expeditionColumnsSql()}
    FROM expedition e
    WHERE e.id = $1
    ${scopeSql ? `AND ${scopeSql}` : ""}
    FOR UPDATE OF e
    `,
    values
  );
  const row = res.rows[0] ?? null;
  return row ? mapExpedition(row) : null;
}

/** Sets the new status; date_livraison is only ever written once. */
export async function repoUpdateExpeditionStatut(
  tx: DbQueryer,
  id: number,
  statut: ExpeditionStatut,
  at: Date
): Promise<Expedition> {
  const res = await tx.query<ExpeditionRow>(
    `
    UPDATE expedition
    SET
      statut = $2,
      statut_updated_at = $3::timestamptz,
      date_livraison = CASE
        WHEN $2 = 'DELIVERED' AND date_livraison IS NULL THEN $3::timestamptz
        ELSE date_livraison
      END,
      updated_at = now()
    WHERE id = $1
    RETURNING ${expeditionColumnsSql("expedition")}
    `,
    [id, statut, at.toISOString()]
  );
  const row = res.rows[0];
  if (!row) throw new Error(`Expedition ${id} vanished during status update`);
  return mapExpedition(row);
}

export type InsertStatusHistoryRow = {
  expedition_id: number;
  old_statut: ExpeditionStatut;
  new_statut: ExpeditionStatut;
  actor_type: "user" | "system";
  changed_by: number | null;
  notes: string | null;
  at: Date;
};

export async function repoInsertStatusHistory(tx: DbQueryer, row: InsertStatusHistoryRow): Promise<void> {
  await tx.query(
    `
    INSERT INTO expedition_status_history (
      expedition_id, old_statut, new_statut, actor_type, changed_by, notes, created_at
    ) VALUES ($1,$2,$3,$4,$5,$6,$7::timestamptz)
    `,
    [row.expedition_id, row.old_statut, row.new_statut, row.actor_type, row.changed_by, row.notes, row.at.toISOString()]
  );
}

type HistoryRow = Omit<ExpeditionStatusHistoryEntry, "id" | "expedition_id" | "old_statut" | "new_statut" | "actor_type"> & {
  id: string;
  expedition_id: string;
  old_statut: string;
  new_statut: string;
  actor_type: string;
};

export async function repoListStatusHistory(expeditionId: number): Promise<ExpeditionStatusHistoryEntry[]> {
  const res = await pool.query<HistoryRow>(
    `
    SELECT
      h.id::text AS id,
      h.expedition_id::text AS expedition_id,
      h.old_statut,
      h.new_statut,
      h.actor_type,
      h.changed_by,
      h.notes,
      ${isoTs("h.created_at")} AS created_at
    FROM expedition_status_history h
    WHERE h.expedition_id = $1
    ORDER BY h.created_at ASC, h.id ASC
    `,
    [expeditionId]
  );
  return res.rows.map((r) => ({
    ...r,
    id: toInt(r.id, "history.id"),
    expedition_id: toInt(r.expedition_id, "history.expedition_id"),
    old_statut: parseStatut(r.old_statut),
    new_statut: parseStatut(r.new_statut),
    actor_type: r.actor_type === "system" ? "system" : "user",
  }));
}

function sortColumn(sortBy: ListExpeditionsQueryDTO["sortBy"]) {
  switch (sortBy) {
    case "montant":
      return "e.montant";
    case "statut_updated_at":
      return "e.statut_updated_at";
    case "date_creation":
    default:
      return "e.date_creation";
  }
}

function buildListWhere(filters: ListExpeditionsQueryDTO, statut: ExpeditionStatut | undefined, scope: AccessScope): ListWhere {
  const where: string[] = [];
  const { values, push } = createParams();

  const scopeSql = expeditionScopeSql(scope, push);
  if (scopeSql) where.push(scopeSql);

  if (filters.q) {
    const p = push(`%${filters.q}%`);
    where.push(`(e.numero ILIKE ${p} OR e.description ILIKE ${p})`);
  }
  if (statut) where.push(`e.statut = ${push(statut)}`);
  if (filters.client_id !== undefined) where.push(`e.client_id = ${push(filters.client_id)}`);
  if (filters.destination_id !== undefined) where.push(`e.destination_id = ${push(filters.destination_id)}`);
  if (filters.tournee_id !== undefined) where.push(`e.tournee_id = ${push(filters.tournee_id)}`);
  if (filters.from) where.push(`e.date_creation >= ${push(filters.from)}::date`);
  if (filters.to) where.push(`e.date_creation < (${push(filters.to)}::date + 1)`);
  where.push(`e.is_active = ${push(filters.active ?? true)}`);

  return { whereSql: `WHERE ${where.join(" AND ")}`, values };
}

type ListRow = ExpeditionRow & {
  client: ClientLite | null;
  destination: DestinationLite | null;
};

const listSelectSql = (includes: Set<string>) => `
  SELECT
    ${expeditionColumnsSql()},
    ${
      includes.has("client")
        ? `jsonb_build_object('id', c.id, 'nom', c.nom, 'prenom', c.prenom, 'email', c.email) AS client`
        : "NULL AS client"
    },
    ${
      includes.has("destination")
        ? `jsonb_build_object('id', d.id, 'ville', d.ville, 'pays', d.pays, 'zone_geographique', d.zone_geographique) AS destination`
        : "NULL AS destination"
    }
  FROM expedition e
  LEFT JOIN clients c ON c.id = e.client_id
  LEFT JOIN destinations d ON d.id = e.destination_id
`;

function mapListRow(r: ListRow, includes: Set<string>): ExpeditionListItem {
  const { client, destination, ...rest } = r;
  return {
    ...mapExpedition(rest),
    client: includes.has("client") ? client : undefined,
    destination: includes.has("destination") ? destination : undefined,
  };
}

export async function repoListExpeditions(
  filters: ListExpeditionsQueryDTO,
  statut: ExpeditionStatut | undefined,
  scope: AccessScope
): Promise<Paginated<ExpeditionListItem>> {
  const includes = includesSet(filters.include);
  const page = filters.page ?? 1;
  const pageSize = filters.pageSize ?? 20;
  const offset = (page - 1) * pageSize;

  const { whereSql, values } = buildListWhere(filters, statut, scope);

  const countRes = await pool.query<{ total: number }>(
    `SELECT COUNT(*)::int AS total FROM expedition e ${whereSql}`,
    values
  );
  const total = countRes.rows[0]?.total ?? 0;

  const dataRes = await pool.query<ListRow>(
    `
    ${listSelectSql(includes)}
    ${whereSql}
    ORDER BY ${sortColumn(filters.sortBy)} ${sortDirection(filters.sortDir)}, e.id DESC
    LIMIT $${values.length + 1}
    OFFSET $${values.length + 2}
    `,
    [...values, pageSize, offset]
  );

  return { items: dataRes.rows.map((r) => mapListRow(r, includes)), total };
}

/** predicted_delivery_time = date_creation + hours. Returns the stored ISO value. */
export async function repoSetPrediction(id: number, hours: number): Promise<string | null> {
  const res = await pool.query<{ predicted_delivery_time: string | null }>(
    `
    UPDATE expedition
    SET predicted_delivery_time = date_creation + make_interval(hours => $2::int), updated_at = now()
    WHERE id = $1
    RETURNING ${isoTs("predicted_delivery_time")} AS predicted_delivery_time
    `,
    [id, hours]
  );
  return res.rows[0]?.predicted_delivery_time ?? null;
}

export async function repoSetExpeditionTournee(tx: DbQueryer, id: number, tourneeId: number | null): Promise<void> {
  await tx.query(`UPDATE expedition SET tournee_id = $2, updated_at = now() WHERE id = $1`, [id, tourneeId]);
}

export async function repoListExpeditionsOfTournee(tourneeId: number, tx?: DbQueryer): Promise<Expedition[]> {
  const q = tx ?? pool;
  const res = await q.query<ExpeditionRow>(
    `
    SELECT ${expeditionColumnsSql()}
    FROM expedition e
    WHERE e.tournee_id = $1
    ORDER BY e.id ASC
    `,
    [tourneeId]
  );
  return res.rows.map(mapExpedition);
}

/** Ids of active shipments sitting in `statut` since before `olderThan`. */
export async function repoFindStaleExpeditionIds(statut: ExpeditionStatut, olderThan: Date, limit = 500): Promise<number[]> {
  const res = await pool.query<{ id: string }>(
    `
    SELECT e.id::text AS id
    FROM expedition e
    WHERE e.statut = $1
      AND e.statut_updated_at < $2::timestamptz
      AND e.is_active = true
    ORDER BY e.statut_updated_at ASC
    LIMIT $3
    `,
    [statut, olderThan.toISOString(), limit]
  );
  return res.rows.map((r) => toInt(r.id, "expedition.id"));
}

export async function repoArchiveDeliveredBefore(before: Date): Promise<number> {
  const res = await pool.query(
    `
    UPDATE expedition
    SET is_active = false, updated_at = now()
    WHERE statut = 'DELIVERED'
      AND is_active = true
      AND date_livraison < $1::timestamptz
    `,
    [before.toISOString()]
  );
  return res.rowCount ?? 0;
}
