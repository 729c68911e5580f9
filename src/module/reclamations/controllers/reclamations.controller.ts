import type { RequestHandler } from "express";

import { requireUser } from "../../auth/middlewares/auth.middleware";
import { userActor } from "../../auth/types/auth.types";
import {
  createReclamationBodySchema,
  listReclamationsQuerySchema,
  reclamationIdParamsSchema,
  reclamationStatisticsQuerySchema,
  updateReclamationStatusBodySchema,
} from "../validators/reclamations.validators";
import {
  svcCreateReclamation,
  svcGetReclamation,
  svcListReclamations,
  svcReclamationStatistics,
  svcUpdateReclamationStatus,
} from "../services/reclamations.service";

export const listReclamations: RequestHandler = async (req, res, next) => {
  try {
    const query = listReclamationsQuerySchema.parse(req.query);
    res.json(await svcListReclamations(query));
  } catch (err) {
    next(err);
  }
};

export const reclamationStatistics: RequestHandler = async (req, res, next) => {
  try {
    const query = reclamationStatisticsQuerySchema.parse(req.query);
    res.json({ statistics: await svcReclamationStatistics(query) });
  } catch (err) {
    next(err);
  }
};

export const getReclamation: RequestHandler = async (req, res, next) => {
  try {
    const { id } = reclamationIdParamsSchema.parse(req.params);
    const out = await svcGetReclamation(id);
    if (!out) {
      res.status(404).json({ error: "RECLAMATION_NOT_FOUND", message: "Réclamation introuvable" });
      return;
    }
    res.json({ reclamation: out });
  } catch (err) {
    next(err);
  }
};

export const createReclamation: RequestHandler = async (req, res, next) => {
  try {
    const user = requireUser(req);
    const dto = createReclamationBodySchema.parse(req.body);
    res.status(201).json({ reclamation: await svcCreateReclamation(dto, userActor(user)) });
  } catch (err) {
    next(err);
  }
};

export const updateReclamationStatus: RequestHandler = async (req, res, next) => {
  try {
    const { id } = reclamationIdParamsSchema.parse(req.params);
    const dto = updateReclamationStatusBodySchema.parse(req.body);
    res.json({ reclamation: await svcUpdateReclamationStatus(id, dto) });
  } catch (err) {
    next(err);
  }
};
