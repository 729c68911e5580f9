import type { Request, RequestHandler } from "express";

import { requireUser } from "../../auth/middlewares/auth.middleware";
import type { NotificationAudience } from "../repository/notifications.repository";
import {
  svcListNotifications,
  svcMarkAllNotificationsRead,
  svcMarkNotificationRead,
} from "../services/notifications.service";
import { listNotificationsQuerySchema, notificationIdParamsSchema } from "../validators/notifications.validators";

function audienceOf(req: Request): NotificationAudience {
  const user = requireUser(req);
  return { userId: user.id, staff: user.role !== "chauffeur" };
}

export const listNotifications: RequestHandler = async (req, res, next) => {
  try {
    const query = listNotificationsQuerySchema.parse(req.query);
    const out = await svcListNotifications(audienceOf(req), query);
    res.json(out);
  } catch (err) {
    next(err);
  }
};

export const markNotificationRead: RequestHandler = async (req, res, next) => {
  try {
    const { id } = notificationIdParamsSchema.parse(req.params);
    const out = await svcMarkNotificationRead(audienceOf(req), id);
    if (!out) {
      res.status(404).json({ error: "NOTIFICATION_NOT_FOUND", message: "Notification introuvable" });
      return;
    }
    res.json({ notification: out });
  } catch (err) {
    next(err);
  }
};

export const markAllNotificationsRead: RequestHandler = async (req, res, next) => {
  try {
    const updated = await svcMarkAllNotificationsRead(audienceOf(req));
    res.json({ updated });
  } catch (err) {
    next(err);
  }
};
