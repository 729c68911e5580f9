import pool from "../../../config/database";
import { createParams, isoTs, sortDirection, toInt } from "../../../utils/pg";
import {
  NOTIFICATION_CATEGORIES,
  NOTIFICATION_SEVERITIES,
  type Notification,
  type NotificationEvent,
  type Paginated,
} from "../types/notifications.types";
import type { ListNotificationsQueryDTO } from "../validators/notifications.validators";

/** Whose feed is read: the user's own rows, plus the staff-wide ones (no user_id) for back-office roles. */
export type NotificationAudience = { userId: number; staff: boolean };

const notificationColumnsSql = (n = "n") => `
  ${n}.id::text AS id,
  ${n}.category,
  ${n}.severity,
  ${n}.title,
  ${n}.message,
  ${n}.client_id::text AS client_id,
  ${n}.user_id,
  ${n}.read,
  ${isoTs(`${n}.read_at`)} AS read_at,
  ${isoTs(`${n}.created_at`)} AS created_at
`;

type NotificationRow = Omit<Notification, "id" | "category" | "severity" | "client_id"> & {
  id: string;
  category: string;
  severity: string;
  client_id: string | null;
};

function mapNotification(r: NotificationRow): Notification {
  const category = NOTIFICATION_CATEGORIES.find((c) => c === r.category);
  const severity = NOTIFICATION_SEVERITIES.find((s) => s === r.severity);
  if (!category || !severity) throw new Error(`Invalid notification ${r.id}: ${r.category}/${r.severity}`);
  return {
    ...r,
    id: toInt(r.id, "notification.id"),
    category,
    severity,
    client_id: r.client_id === null ? null : toInt(r.client_id, "notification.client_id"),
  };
}

function audienceSql(audience: NotificationAudience, push: (v: unknown) => string) {
  const me = push(audience.userId);
  return audience.staff ? `(n.user_id = ${me} OR n.user_id IS NULL)` : `n.user_id = ${me}`;
}

export async function repoInsertNotification(event: NotificationEvent): Promise<Notification> {
  const res = await pool.query<NotificationRow>(
    `
    INSERT INTO notification (category, severity, title, message, client_id, user_id)
    VALUES ($1, $2, $3, $4, $5, $6)
    RETURNING ${notificationColumnsSql("notification")}
    `,
    [event.category, event.severity, event.title, event.message, event.client_id ?? null, event.user_id ?? null]
  );
  const row = res.rows[0];
  if (!row) throw new Error("Failed to create notification");
  return mapNotification(row);
}

export async function repoListNotifications(
  audience: NotificationAudience,
  filters: ListNotificationsQueryDTO
): Promise<Paginated<Notification> & { unread: number }> {
  const page = filters.page ?? 1;
  const pageSize = filters.pageSize ?? 20;
  const offset = (page - 1) * pageSize;

  const where: string[] = [];
  const { values, push } = createParams();
  where.push(audienceSql(audience, push));
  const audienceValues = values.length;
  if (filters.unread === true) where.push("n.read = false");
  if (filters.unread === false) where.push("n.read = true");
  if (filters.category) where.push(`n.category = ${push(filters.category)}`);
  const whereSql = `WHERE ${where.join(" AND ")}`;

  const countRes = await pool.query<{ total: number }>(`SELECT COUNT(*)::int AS total FROM notification n ${whereSql}`, values);
  const total = countRes.rows[0]?.total ?? 0;

  const unreadRes = await pool.query<{ unread: number }>(
    `SELECT COUNT(*)::int AS unread FROM notification n WHERE ${where[0]} AND n.read = false`,
    values.slice(0, audienceValues)
  );
  const unread = unreadRes.rows[0]?.unread ?? 0;

  const dataRes = await pool.query<NotificationRow>(
    `
    SELECT ${notificationColumnsSql()}
    FROM notification n
    ${whereSql}
    ORDER BY n.created_at ${sortDirection(filters.sortDir)}, n.id DESC
    LIMIT $${values.length + 1}
    OFFSET $${values.length + 2}
    `,
    [...values, pageSize, offset]
  );

  return { items: dataRes.rows.map(mapNotification), total, unread };
}

export async function repoMarkNotificationRead(audience: NotificationAudience, id: number): Promise<Notification | null> {
  const { values, push } = createParams([id]);
  const res = await pool.query<NotificationRow>(
    `
    UPDATE notification n
    SET read = true, read_at = COALESCE(n.read_at, now())
    WHERE n.id = $1 AND ${audienceSql(audience, push)}
    RETURNING ${notificationColumnsSql()}
    `,
    values
  );
  const row = res.rows[0] ?? null;
  return row ? mapNotification(row) : null;
}

export async function repoMarkAllNotificationsRead(audience: NotificationAudience): Promise<number> {
  const { values, push } = createParams();
  const res = await pool.query(
    `UPDATE notification n SET read = true, read_at = now() WHERE n.read = false AND ${audienceSql(audience, push)}`,
    values
  );
  return res.rowCount ?? 0;
}
