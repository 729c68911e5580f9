import type { RequestHandler } from "express";

import { scopeForUser } from "../../auth/lib/access-scope";
import { requireUser } from "../../auth/middlewares/auth.middleware";
import { userActor } from "../../auth/types/auth.types";
import {
  createIncidentBodySchema,
  incidentIdParamsSchema,
  listIncidentsQuerySchema,
  resolveIncidentBodySchema,
} from "../validators/incidents.validators";
import { svcCreateIncident, svcGetIncident, svcListIncidents, svcResolveIncident } from "../services/incidents.service";

export const listIncidents: RequestHandler = async (req, res, next) => {
  try {
    const query = listIncidentsQuerySchema.parse(req.query);
    const out = await svcListIncidents(query, scopeForUser(requireUser(req)));
    res.json(out);
  } catch (err) {
    next(err);
  }
};

export const getIncident: RequestHandler = async (req, res, next) => {
  try {
    const { id } = incidentIdParamsSchema.parse(req.params);
    const out = await svcGetIncident(id, scopeForUser(requireUser(req)));
    if (!out) {
      res.status(404).json({ error: "INCIDENT_NOT_FOUND", message: "Incident introuvable" });
      return;
    }
    res.json({ incident: out });
  } catch (err) {
    next(err);
  }
};

export const createIncident: RequestHandler = async (req, res, next) => {
  try {
    const user = requireUser(req);
    const dto = createIncidentBodySchema.parse(req.body);
    const out = await svcCreateIncident(dto, userActor(user), scopeForUser(user));
    res.status(201).json({ incident: out });
  } catch (err) {
    next(err);
  }
};

export const resolveIncident: RequestHandler = async (req, res, next) => {
  try {
    const { id } = incidentIdParamsSchema.parse(req.params);
    const dto = resolveIncidentBodySchema.parse(req.body);
    const out = await svcResolveIncident(id, dto);
    res.json({ incident: out });
  } catch (err) {
    next(err);
  }
};
