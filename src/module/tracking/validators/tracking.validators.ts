import { z } from "zod";

import { emptyStringToNull, paginationShape } from "../../../utils/validators";

export const trackingIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listTrackingQuerySchema = z.object({
  expedition_id: z.coerce.number().int().positive().optional(),
  chauffeur_id: z.coerce.number().int().positive().optional(),
  statut: z.preprocess(emptyStringToNull, z.string().trim().min(1).nullable()).optional(),
  ...paginationShape,
});

export type ListTrackingQueryDTO = z.infer<typeof listTrackingQuerySchema>;

export const createTrackingBodySchema = z.object({
  expedition_id: z.coerce.number().int().positive(),
  lieu: z.string().trim().min(1).max(200),
  statut: z.string().trim().min(1).max(100),
  commentaire: z.preprocess(emptyStringToNull, z.string().trim().max(4000).nullable()).optional(),
  /** Ignored for drivers, who always log as themselves. */
  chauffeur_id: z.coerce.number().int().positive().optional().nullable(),
  date: z.string().datetime({ offset: true }).optional(),
});

export type CreateTrackingBodyDTO = z.infer<typeof createTrackingBodySchema>;
