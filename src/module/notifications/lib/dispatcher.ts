import { clientRoom, STAFF_ROOM, tryGetIO, userRoom } from "../../../sockets/socketServer";
import logger from "../../../utils/logger";
import { repoInsertNotification } from "../repository/notifications.repository";
import type { Notification, NotificationEvent } from "../types/notifications.types";

/** Fire-and-forget: callers never wait on, nor fail because of, delivery. */
export interface NotificationDispatcher {
  dispatch(event: NotificationEvent): void;
}

export type NotificationStore = (event: NotificationEvent) => Promise<Notification>;
export type NotificationPush = (notification: Notification) => void;

/** Emits to the user's room, the client's room, or the staff room when neither is set. */
export const socketPush: NotificationPush = (notification) => {
  const io = tryGetIO();
  if (!io) return;
  const rooms: string[] = [];
  if (notification.user_id !== null) rooms.push(userRoom(notification.user_id));
  if (notification.client_id !== null) rooms.push(clientRoom(notification.client_id));
  if (notification.user_id === null) rooms.push(STAFF_ROOM);
  io.to(rooms).emit("notification", notification);
};

export class PersistingNotificationDispatcher implements NotificationDispatcher {
  private pending = new Set<Promise<Notification | null>>();

  constructor(
    private readonly store: NotificationStore = repoInsertNotification,
    private readonly push: NotificationPush = socketPush
  ) {}

  dispatch(event: NotificationEvent): void {
    const delivery = this.deliver(event);
    this.pending.add(delivery);
    void delivery.finally(() => this.pending.delete(delivery));
  }

  /** Resolves once every dispatch issued so far has settled. */
  async idle(): Promise<void> {
    await Promise.all(Array.from(this.pending));
  }

  private async deliver(event: NotificationEvent): Promise<Notification | null> {
    try {
      const notification = await this.store(event);
      this.push(notification);
      return notification;
    } catch (err) {
      logger.error(`[notifications] delivery failed (${event.category}: ${event.title})`, err);
      return null;
    }
  }
}
