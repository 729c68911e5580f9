import { z } from "zod";

import { emptyStringToNull, isoDate, paginationShape } from "../../../utils/validators";
import { RECLAMATION_STATUTS } from "../types/reclamations.types";

export const reclamationIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listReclamationsQuerySchema = z.object({
  client_id: z.coerce.number().int().positive().optional(),
  statut: z.enum(RECLAMATION_STATUTS).optional(),
  from: isoDate.optional(),
  to: isoDate.optional(),
  ...paginationShape,
});

export type ListReclamationsQueryDTO = z.infer<typeof listReclamationsQuerySchema>;

export const reclamationStatisticsQuerySchema = z.object({
  client_id: z.coerce.number().int().positive().optional(),
});

export type ReclamationStatisticsQueryDTO = z.infer<typeof reclamationStatisticsQuerySchema>;

export const createReclamationBodySchema = z.object({
  client_id: z.coerce.number().int().positive(),
  nature: z.string().trim().min(1).max(100),
  commentaire: z.preprocess(emptyStringToNull, z.string().trim().max(4000).nullable()).optional(),
  expedition_ids: z
    .array(z.coerce.number().int().positive())
    .max(100)
    .optional()
    .default([])
    .transform((ids) => Array.from(new Set(ids))),
});

export type CreateReclamationBodyDTO = z.infer<typeof createReclamationBodySchema>;

export const updateReclamationStatusBodySchema = z.object({
  statut: z.enum(RECLAMATION_STATUTS),
  commentaire: z.preprocess(emptyStringToNull, z.string().trim().max(4000).nullable()).optional(),
});

export type UpdateReclamationStatusBodyDTO = z.infer<typeof updateReclamationStatusBodySchema>;
