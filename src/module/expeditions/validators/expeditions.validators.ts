import { z } from "zod";

import {
  decimal2,
  NUMERIC_8_2_MAX,
  emptyStringToNull,
  emptyStringToUndefined,
  includeParam,
  isoDate,
  optionalBoolean,
  paginationShape,
} from "../../../utils/validators";

export const expeditionIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listExpeditionsQuerySchema = z.object({
  q: z.preprocess(emptyStringToUndefined, z.string().trim().min(1)).optional(),
  statut: z.preprocess(emptyStringToUndefined, z.string().trim().min(1)).optional(),
  client_id: z.coerce.number().int().positive().optional(),
  destination_id: z.coerce.number().int().positive().optional(),
  tournee_id: z.coerce.number().int().positive().optional(),
  from: isoDate.optional(),
  to: isoDate.optional(),
  active: optionalBoolean,
  sortBy: z.enum(["date_creation", "montant", "statut_updated_at"]).optional().default("date_creation"),
  include: includeParam("client,destination"),
  ...paginationShape,
});

export type ListExpeditionsQueryDTO = z.infer<typeof listExpeditionsQuerySchema>;

export const getExpeditionQuerySchema = z.object({
  include: includeParam("client,destination"),
});

export const createExpeditionBodySchema = z.object({
  client_id: z.coerce.number().int().positive(),
  type_service_id: z.coerce.number().int().positive(),
  destination_id: z.coerce.number().int().positive(),
  poids: decimal2("poids", { positive: true, max: NUMERIC_8_2_MAX }),
  volume: decimal2("volume", { positive: true, max: NUMERIC_8_2_MAX }),
  description: z.preprocess(emptyStringToNull, z.string().trim().max(2000).nullable()).optional(),
  montant: decimal2("montant").optional(),
  agent_responsable_id: z.coerce.number().int().positive().optional().nullable(),
});

export type CreateExpeditionBodyDTO = z.infer<typeof createExpeditionBodySchema>;

export const transitionExpeditionBodySchema = z.object({
  statut: z.string().trim().min(1),
  notes: z.preprocess(emptyStringToNull, z.string().trim().max(1000).nullable()).optional(),
});

export type TransitionExpeditionBodyDTO = z.infer<typeof transitionExpeditionBodySchema>;

export const assignTourneeBodySchema = z.object({
  tournee_id: z.coerce.number().int().positive(),
});
