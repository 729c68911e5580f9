import type { RequestHandler } from "express";

import { scopeForUser } from "../../auth/lib/access-scope";
import { requireUser } from "../../auth/middlewares/auth.middleware";
import { createTrackingBodySchema, listTrackingQuerySchema, trackingIdParamsSchema } from "../validators/tracking.validators";
import { svcCreateTracking, svcDeleteTracking, svcGetTracking, svcListTracking } from "../services/tracking.service";

const notFound = { error: "TRACKING_NOT_FOUND", message: "Suivi introuvable" };

export const listTracking: RequestHandler = async (req, res, next) => {
  try {
    const query = listTrackingQuerySchema.parse(req.query);
    res.json(await svcListTracking(query, scopeForUser(requireUser(req))));
  } catch (err) {
    next(err);
  }
};

export const getTracking: RequestHandler = async (req, res, next) => {
  try {
    const { id } = trackingIdParamsSchema.parse(req.params);
    const out = await svcGetTracking(id, scopeForUser(requireUser(req)));
    if (!out) {
      res.status(404).json(notFound);
      return;
    }
    res.json({ tracking: out });
  } catch (err) {
    next(err);
  }
};

export const createTracking: RequestHandler = async (req, res, next) => {
  try {
    const user = requireUser(req);
    const dto = createTrackingBodySchema.parse(req.body);
    res.status(201).json({ tracking: await svcCreateTracking(dto, user, scopeForUser(user)) });
  } catch (err) {
    next(err);
  }
};

export const deleteTracking: RequestHandler = async (req, res, next) => {
  try {
    const { id } = trackingIdParamsSchema.parse(req.params);
    if (!(await svcDeleteTracking(id))) {
      res.status(404).json(notFound);
      return;
    }
    res.status(204).send();
  } catch (err) {
    next(err);
  }
};
