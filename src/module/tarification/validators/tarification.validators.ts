import { z } from "zod";

import { decimal2, NUMERIC_8_2_MAX, emptyStringToNull, includeParam, optionalBoolean, paginationShape } from "../../../utils/validators";

export const tarificationIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listTarificationsQuerySchema = z.object({
  type_service_id: z.coerce.number().int().positive().optional(),
  destination_id: z.coerce.number().int().positive().optional(),
  active: optionalBoolean,
  sortBy: z.enum(["updated_at", "tarif_poids", "tarif_volume"]).optional().default("updated_at"),
  include: includeParam("destination,type_service"),
  ...paginationShape,
});

export type ListTarificationsQueryDTO = z.infer<typeof listTarificationsQuerySchema>;

export const getTarificationQuerySchema = z.object({
  include: includeParam("destination,type_service"),
});

export const createTarificationBodySchema = z.object({
  type_service_id: z.coerce.number().int().positive(),
  destination_id: z.coerce.number().int().positive(),
  tarif_poids: decimal2("tarif_poids", { max: NUMERIC_8_2_MAX }),
  tarif_volume: decimal2("tarif_volume", { max: NUMERIC_8_2_MAX }),
  is_active: z.boolean().optional().default(true),
});

export type CreateTarificationBodyDTO = z.infer<typeof createTarificationBodySchema>;

export const updateTarificationBodySchema = z.object({
  tarif_poids: decimal2("tarif_poids", { max: NUMERIC_8_2_MAX }).optional(),
  tarif_volume: decimal2("tarif_volume", { max: NUMERIC_8_2_MAX }).optional(),
  is_active: z.boolean().optional(),
});

export type UpdateTarificationBodyDTO = z.infer<typeof updateTarificationBodySchema>;

export const quoteQuerySchema = z.object({
  type_service_id: z.coerce.number().int().positive(),
  destination_id: z.coerce.number().int().positive(),
  poids: decimal2("poids", { positive: true, max: NUMERIC_8_2_MAX }),
  volume: decimal2("volume", { positive: true, max: NUMERIC_8_2_MAX }),
});

export type QuoteQueryDTO = z.infer<typeof quoteQuerySchema>;

export const listDestinationsQuerySchema = z.object({
  q: z.preprocess(emptyStringToNull, z.string().trim().min(1).nullable()).optional(),
  zone_geographique: z.preprocess(emptyStringToNull, z.string().trim().min(1).nullable()).optional(),
  is_active: optionalBoolean,
});

export type ListDestinationsQueryDTO = z.infer<typeof listDestinationsQuerySchema>;

const placeName = z.string().trim().min(1).max(100);

export const createDestinationBodySchema = z.object({
  ville: placeName,
  pays: placeName,
  zone_geographique: z.string().trim().min(1).max(50),
  tarif_base: decimal2("tarif_base", { max: NUMERIC_8_2_MAX }),
});

export type CreateDestinationBodyDTO = z.infer<typeof createDestinationBodySchema>;

export const updateDestinationBodySchema = z
  .object({
    ville: placeName.optional(),
    pays: placeName.optional(),
    zone_geographique: z.string().trim().min(1).max(50).optional(),
    tarif_base: decimal2("tarif_base", { max: NUMERIC_8_2_MAX }).optional(),
    is_active: z.boolean().optional(),
  })
  .strict();

export type UpdateDestinationBodyDTO = z.infer<typeof updateDestinationBodySchema>;

export const createTypeServiceBodySchema = z.object({
  nom: z.string().trim().min(1).max(50),
  description: z.preprocess(emptyStringToNull, z.string().trim().max(2000).nullable()).optional(),
});

export type CreateTypeServiceBodyDTO = z.infer<typeof createTypeServiceBodySchema>;

export const updateTypeServiceBodySchema = z
  .object({
    nom: z.string().trim().min(1).max(50).optional(),
    description: z.preprocess(emptyStringToNull, z.string().trim().max(2000).nullable()).optional(),
    is_active: z.boolean().optional(),
  })
  .strict();

export type UpdateTypeServiceBodyDTO = z.infer<typeof updateTypeServiceBodySchema>;
