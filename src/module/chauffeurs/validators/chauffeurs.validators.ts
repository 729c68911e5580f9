import { z } from "zod";

import { emptyStringToNull, isoDate, optionalBoolean, paginationShape } from "../../../utils/validators";
import { phoneNumber } from "../../clients/validators/clients.validators";

const name = z.string().trim().min(1).max(100);

const numeroPermis = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z0-9-]+$/, "Numéro de permis invalide")
  .max(50);

export const chauffeurIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listChauffeursQuerySchema = z.object({
  q: z.preprocess(emptyStringToNull, z.string().trim().min(1).nullable()).optional(),
  disponibilite: optionalBoolean,
  is_active: optionalBoolean,
  sortBy: z.enum(["nom", "prenom", "date_embauche"]).optional().default("nom"),
  ...paginationShape,
  sortDir: z.enum(["asc", "desc"]).optional().default("asc"),
});

export type ListChauffeursQueryDTO = z.infer<typeof listChauffeursQuerySchema>;

export const createChauffeurBodySchema = z.object({
  user_id: z.coerce.number().int().positive().optional().nullable(),
  nom: name,
  prenom: name,
  numero_permis: numeroPermis,
  telephone: z.preprocess(emptyStringToNull, phoneNumber.nullable()).optional(),
  disponibilite: z.boolean().optional().default(true),
  date_embauche: isoDate,
});

export type CreateChauffeurBodyDTO = z.infer<typeof createChauffeurBodySchema>;

export const updateChauffeurBodySchema = z
  .object({
    user_id: z.coerce.number().int().positive().optional().nullable(),
    nom: name.optional(),
    prenom: name.optional(),
    numero_permis: numeroPermis.optional(),
    telephone: z.preprocess(emptyStringToNull, phoneNumber.nullable()).optional(),
    disponibilite: z.boolean().optional(),
    date_embauche: isoDate.optional(),
    is_active: z.boolean().optional(),
  })
  .strict();

export type UpdateChauffeurBodyDTO = z.infer<typeof updateChauffeurBodySchema>;
