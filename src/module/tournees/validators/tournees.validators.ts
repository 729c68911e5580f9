import { z } from "zod";

import { decimal2, NUMERIC_8_2_MAX, isoDate, paginationShape } from "../../../utils/validators";

export const tourneeIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const tourneeExpeditionParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
  expeditionId: z.coerce.number().int().positive(),
});

export const listTourneesQuerySchema = z.object({
  from: isoDate.optional(),
  to: isoDate.optional(),
  chauffeur_id: z.coerce.number().int().positive().optional(),
  vehicule_id: z.coerce.number().int().positive().optional(),
  sortBy: z.enum(["date", "created_at"]).optional().default("date"),
  ...paginationShape,
});

export type ListTourneesQueryDTO = z.infer<typeof listTourneesQuerySchema>;

export const createTourneeBodySchema = z.object({
  date: isoDate,
  chauffeur_id: z.coerce.number().int().positive(),
  vehicule_id: z.coerce.number().int().positive(),
  duree_minutes: z.coerce.number().int().min(0).optional().nullable(),
});

export type CreateTourneeBodyDTO = z.infer<typeof createTourneeBodySchema>;

/** A value pins the field (manual); null hands it back to the aggregator. */
export const updateTourneeBodySchema = z.object({
  date: isoDate.optional(),
  chauffeur_id: z.coerce.number().int().positive().optional(),
  vehicule_id: z.coerce.number().int().positive().optional(),
  kilometrage: decimal2("kilometrage", { max: NUMERIC_8_2_MAX }).nullable().optional(),
  consommation: decimal2("consommation", { max: NUMERIC_8_2_MAX }).nullable().optional(),
  duree_minutes: z.coerce.number().int().min(0).nullable().optional(),
});

export type UpdateTourneeBodyDTO = z.infer<typeof updateTourneeBodySchema>;

export const addExpeditionBodySchema = z.object({
  expedition_id: z.coerce.number().int().positive(),
});
