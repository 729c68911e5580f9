import { z } from "zod";

import { includeParam, isoDate, paginationShape } from "../../../utils/validators";
import { FACTURE_MODES, FACTURE_PAYMENT_STATUSES } from "../types/factures.types";

const tauxTva = z
  .union([z.number(), z.string()])
  .transform((v) => (typeof v === "number" ? String(v) : v.trim()))
  .refine((v) => /^(0(\.\d{1,4})?|1(\.0{1,4})?)$/.test(v), "taux_tva : taux entre 0 et 1, 4 décimales maximum");

export const factureIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listFacturesQuerySchema = z.object({
  client_id: z.coerce.number().int().positive().optional(),
  statut_paiement: z.enum(FACTURE_PAYMENT_STATUSES).optional(),
  from: isoDate.optional(),
  to: isoDate.optional(),
  sortBy: z.enum(["date_emission", "montant_ttc", "updated_at"]).optional().default("date_emission"),
  include: includeParam("client"),
  ...paginationShape,
});

export type ListFacturesQueryDTO = z.infer<typeof listFacturesQuerySchema>;

export const createFactureBodySchema = z.object({
  client_id: z.coerce.number().int().positive(),
  expedition_ids: z.array(z.coerce.number().int().positive()).min(1, "Au moins une expédition"),
  taux_tva: tauxTva.optional(),
  mode: z.enum(FACTURE_MODES).optional().default("STANDARD"),
});

export type CreateFactureBodyDTO = z.infer<typeof createFactureBodySchema>;
