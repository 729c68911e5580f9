import { z } from "zod";

import { decimal2, emptyStringToNull, NUMERIC_8_2_MAX, optionalBoolean, paginationShape } from "../../../utils/validators";
import { VEHICULE_ETATS } from "../types/vehicules.types";

/** numeric(6,2) */
const CONSOMMATION_MAX = "9999.99";

const immatriculation = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z0-9-]+$/, "Immatriculation invalide")
  .max(20);

export const vehiculeIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listVehiculesQuerySchema = z.object({
  q: z.preprocess(emptyStringToNull, z.string().trim().min(1).nullable()).optional(),
  etat: z.enum(VEHICULE_ETATS).optional(),
  is_active: optionalBoolean,
  sortBy: z.enum(["immatriculation", "capacite", "created_at"]).optional().default("immatriculation"),
  ...paginationShape,
  sortDir: z.enum(["asc", "desc"]).optional().default("asc"),
});

export type ListVehiculesQueryDTO = z.infer<typeof listVehiculesQuerySchema>;

export const createVehiculeBodySchema = z.object({
  immatriculation,
  type: z.string().trim().min(1).max(50),
  capacite: decimal2("capacite", { max: NUMERIC_8_2_MAX }),
  consommation: decimal2("consommation", { max: CONSOMMATION_MAX }),
  etat: z.enum(VEHICULE_ETATS).optional().default("AVAILABLE"),
});

export type CreateVehiculeBodyDTO = z.infer<typeof createVehiculeBodySchema>;

export const updateVehiculeBodySchema = z
  .object({
    immatriculation: immatriculation.optional(),
    type: z.string().trim().min(1).max(50).optional(),
    capacite: decimal2("capacite", { max: NUMERIC_8_2_MAX }).optional(),
    consommation: decimal2("consommation", { max: CONSOMMATION_MAX }).optional(),
    etat: z.enum(VEHICULE_ETATS).optional(),
    is_active: z.boolean().optional(),
  })
  .strict();

export type UpdateVehiculeBodyDTO = z.infer<typeof updateVehiculeBodySchema>;
