import {
  repoListNotifications,
  repoMarkAllNotificationsRead,
  repoMarkNotificationRead,
  type NotificationAudience,
} from "../repository/notifications.repository";
import type { ListNotificationsQueryDTO } from "../validators/notifications.validators";

export const svcListNotifications = (audience: NotificationAudience, filters: ListNotificationsQueryDTO) =>
  repoListNotifications(audience, filters);

export const svcMarkNotificationRead = (audience: NotificationAudience, id: number) => repoMarkNotificationRead(audience, id);

export const svcMarkAllNotificationsRead = (audience: NotificationAudience) => repoMarkAllNotificationsRead(audience);
