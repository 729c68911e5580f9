import { z } from "zod";

import { emptyStringToNull, includeParam, isoDate, optionalBoolean, paginationShape } from "../../../utils/validators";
import { INCIDENT_PRIORITES, INCIDENT_SEVERITES, INCIDENT_TYPES } from "../types/incidents.types";

export const incidentIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listIncidentsQuerySchema = z.object({
  type: z.enum(INCIDENT_TYPES).optional(),
  severite: z.enum(INCIDENT_SEVERITES).optional(),
  priorite: z.enum(INCIDENT_PRIORITES).optional(),
  expedition_id: z.coerce.number().int().positive().optional(),
  tournee_id: z.coerce.number().int().positive().optional(),
  resolved: optionalBoolean,
  from: isoDate.optional(),
  to: isoDate.optional(),
  sortBy: z.enum(["created_at", "severite", "priorite"]).optional().default("created_at"),
  include: includeParam("expedition"),
  ...paginationShape,
});

export type ListIncidentsQueryDTO = z.infer<typeof listIncidentsQuerySchema>;

export const createIncidentBodySchema = z
  .object({
    type: z.enum(INCIDENT_TYPES),
    severite: z.enum(INCIDENT_SEVERITES).optional().default("MEDIUM"),
    priorite: z.enum(INCIDENT_PRIORITES).optional().default("NORMAL"),
    expedition_id: z.coerce.number().int().positive().optional().nullable(),
    tournee_id: z.coerce.number().int().positive().optional().nullable(),
    commentaire: z.preprocess(emptyStringToNull, z.string().trim().max(4000).nullable()).optional(),
  })
  .refine((v) => v.expedition_id != null || v.tournee_id != null, {
    message: "expedition_id ou tournee_id requis",
    path: ["expedition_id"],
  });

export type CreateIncidentBodyDTO = z.infer<typeof createIncidentBodySchema>;

export const resolveIncidentBodySchema = z.object({
  resolution_details: z.string().trim().min(1).max(4000),
});

export type ResolveIncidentBodyDTO = z.infer<typeof resolveIncidentBodySchema>;
