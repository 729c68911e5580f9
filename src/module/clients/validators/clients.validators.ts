import { z } from "zod";

import { emptyStringToNull, optionalBoolean, paginationShape } from "../../../utils/validators";

const personName = z
  .string()
  .trim()
  .min(1)
  .max(100)
  .regex(/^[\p{L}\s'-]+$/u, "Lettres, espaces, apostrophes et tirets uniquement");

export const phoneNumber = z
  .string()
  .trim()
  .regex(/^\+?\d{9,15}$/, "Numéro de téléphone invalide");

export const clientIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listClientsQuerySchema = z.object({
  q: z.preprocess(emptyStringToNull, z.string().trim().min(1).nullable()).optional(),
  is_active: optionalBoolean,
  sortBy: z.enum(["nom", "prenom", "date_inscription", "solde", "created_at"]).optional().default("nom"),
  ...paginationShape,
  sortDir: z.enum(["asc", "desc"]).optional().default("asc"),
});

export type ListClientsQueryDTO = z.infer<typeof listClientsQuerySchema>;

export const createClientBodySchema = z.object({
  nom: personName,
  prenom: personName,
  email: z.string().trim().toLowerCase().email(),
  telephone: z.preprocess(emptyStringToNull, phoneNumber.nullable()).optional(),
  adresse: z.preprocess(emptyStringToNull, z.string().trim().max(500).nullable()).optional(),
});

export type CreateClientBodyDTO = z.infer<typeof createClientBodySchema>;

/** solde is a ledger projection and is never written here. */
export const updateClientBodySchema = z
  .object({
    nom: personName.optional(),
    prenom: personName.optional(),
    email: z.string().trim().toLowerCase().email().optional(),
    telephone: z.preprocess(emptyStringToNull, phoneNumber.nullable()).optional(),
    adresse: z.preprocess(emptyStringToNull, z.string().trim().max(500).nullable()).optional(),
    is_active: z.boolean().optional(),
  })
  .strict();

export type UpdateClientBodyDTO = z.infer<typeof updateClientBodySchema>;
