import { z } from "zod";

import { optionalBoolean, paginationShape } from "../../../utils/validators";
import { NOTIFICATION_CATEGORIES } from "../types/notifications.types";

export const notificationIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listNotificationsQuerySchema = z.object({
  unread: optionalBoolean,
  category: z.enum(NOTIFICATION_CATEGORIES).optional(),
  ...paginationShape,
});

export type ListNotificationsQueryDTO = z.infer<typeof listNotificationsQuerySchema>;
