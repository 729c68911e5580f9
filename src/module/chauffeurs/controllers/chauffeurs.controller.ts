import type { RequestHandler } from "express";

import {
  chauffeurIdParamsSchema,
  createChauffeurBodySchema,
  listChauffeursQuerySchema,
  updateChauffeurBodySchema,
} from "../validators/chauffeurs.validators";
import {
  svcCreateChauffeur,
  svcDeactivateChauffeur,
  svcGetChauffeur,
  svcListChauffeurs,
  svcUpdateChauffeur,
} from "../services/chauffeurs.service";

const notFound = { error: "CHAUFFEUR_NOT_FOUND", message: "Chauffeur introuvable" };

export const listChauffeurs: RequestHandler = async (req, res, next) => {
  try {
    const query = listChauffeursQuerySchema.parse(req.query);
    res.json(await svcListChauffeurs(query));
  } catch (err) {
    next(err);
  }
};

export const getChauffeur: RequestHandler = async (req, res, next) => {
  try {
    const { id } = chauffeurIdParamsSchema.parse(req.params);
    const out = await svcGetChauffeur(id);
    if (!out) {
      res.status(404).json(notFound);
      return;
    }
    res.json({ chauffeur: out });
  } catch (err) {
    next(err);
  }
};

export const createChauffeur: RequestHandler = async (req, res, next) => {
  try {
    const dto = createChauffeurBodySchema.parse(req.body);
    res.status(201).json({ chauffeur: await svcCreateChauffeur(dto) });
  } catch (err) {
    next(err);
  }
};

export const updateChauffeur: RequestHandler = async (req, res, next) => {
  try {
    const { id } = chauffeurIdParamsSchema.parse(req.params);
    const dto = updateChauffeurBodySchema.parse(req.body);
    const out = await svcUpdateChauffeur(id, dto);
    if (!out) {
      res.status(404).json(notFound);
      return;
    }
    res.json({ chauffeur: out });
  } catch (err) {
    next(err);
  }
};

export const deactivateChauffeur: RequestHandler = async (req, res, next) => {
  try {
    const { id } = chauffeurIdParamsSchema.parse(req.params);
    if (!(await svcDeactivateChauffeur(id))) {
      res.status(404).json(notFound);
      return;
    }
    res.status(204).send();
  } catch (err) {
    next(err);
  }
};
