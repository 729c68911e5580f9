import { z } from "zod";

import { decimal2, emptyStringToNull, isoDate, paginationShape } from "../../../utils/validators";
import { PAIEMENT_MODES } from "../types/paiements.types";

export const paiementIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listPaiementsQuerySchema = z.object({
  q: z.string().optional(),
  client_id: z.coerce.number().int().positive().optional(),
  facture_id: z.coerce.number().int().positive().optional(),
  mode: z.enum(PAIEMENT_MODES).optional(),
  from: isoDate.optional(),
  to: isoDate.optional(),
  sortBy: z.enum(["date_paiement", "montant", "updated_at"]).optional().default("date_paiement"),
  ...paginationShape,
});

export type ListPaiementsQueryDTO = z.infer<typeof listPaiementsQuerySchema>;

export const createPaiementBodySchema = z.object({
  facture_id: z.coerce.number().int().positive(),
  montant: decimal2("montant", { positive: true }),
  mode: z.enum(PAIEMENT_MODES).optional().default("CASH"),
  reference: z.preprocess(emptyStringToNull, z.string().trim().min(1).max(100).nullable()).optional(),
  commentaire: z.preprocess(emptyStringToNull, z.string().trim().min(1).nullable()).optional(),
});

export type CreatePaiementBodyDTO = z.infer<typeof createPaiementBodySchema>;

/** montant and facture_id are immutable once recorded. */
export const updatePaiementBodySchema = z
  .object({
    reference: z.preprocess(emptyStringToNull, z.string().trim().min(1).max(100).nullable()).optional(),
    commentaire: z.preprocess(emptyStringToNull, z.string().trim().min(1).nullable()).optional(),
  })
  .strict();

export type UpdatePaiementBodyDTO = z.infer<typeof updatePaiementBodySchema>;
