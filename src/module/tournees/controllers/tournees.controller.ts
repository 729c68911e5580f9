import type { RequestHandler } from "express";

import { requireUser } from "../../auth/middlewares/auth.middleware";
import { scopeForUser } from "../../auth/lib/access-scope";
import {
  addExpeditionBodySchema,
  createTourneeBodySchema,
  listTourneesQuerySchema,
  tourneeExpeditionParamsSchema,
  tourneeIdParamsSchema,
  updateTourneeBodySchema,
} from "../validators/tournees.validators";
import {
  svcAddExpeditionToTournee,
  svcCreateTournee,
  svcDeleteTournee,
  svcGetTournee,
  svcListTournees,
  svcRecomputeTournee,
  svcRemoveExpeditionFromTournee,
  svcTourneeReport,
  svcUpdateTournee,
} from "../services/tournees.service";

const notFound = { error: "TOURNEE_NOT_FOUND", message: "Tournée introuvable" };

export const listTournees: RequestHandler = async (req, res, next) => {
  try {
    const query = listTourneesQuerySchema.parse(req.query);
    const out = await svcListTournees(query, scopeForUser(requireUser(req)));
    res.json(out);
  } catch (err) {
    next(err);
  }
};

export const getTournee: RequestHandler = async (req, res, next) => {
  try {
    const { id } = tourneeIdParamsSchema.parse(req.params);
    const out = await svcGetTournee(id, scopeForUser(requireUser(req)));
    if (!out) {
      res.status(404).json(notFound);
      return;
    }
    res.json({ tournee: out });
  } catch (err) {
    next(err);
  }
};

export const createTournee: RequestHandler = async (req, res, next) => {
  try {
    const dto = createTourneeBodySchema.parse(req.body);
    const out = await svcCreateTournee(dto);
    res.status(201).json({ tournee: out });
  } catch (err) {
    next(err);
  }
};

export const updateTournee: RequestHandler = async (req, res, next) => {
  try {
    const { id } = tourneeIdParamsSchema.parse(req.params);
    const dto = updateTourneeBodySchema.parse(req.body);
    const out = await svcUpdateTournee(id, dto);
    res.json({ tournee: out });
  } catch (err) {
    next(err);
  }
};

export const deleteTournee: RequestHandler = async (req, res, next) => {
  try {
    const { id } = tourneeIdParamsSchema.parse(req.params);
    const ok = await svcDeleteTournee(id);
    if (!ok) {
      res.status(404).json(notFound);
      return;
    }
    res.status(204).send();
  } catch (err) {
    next(err);
  }
};

export const recomputeTournee: RequestHandler = async (req, res, next) => {
  try {
    const { id } = tourneeIdParamsSchema.parse(req.params);
    res.json({ tournee: await svcRecomputeTournee(id) });
  } catch (err) {
    next(err);
  }
};

export const addExpedition: RequestHandler = async (req, res, next) => {
  try {
    const { id } = tourneeIdParamsSchema.parse(req.params);
    const { expedition_id } = addExpeditionBodySchema.parse(req.body);
    res.json({ tournee: await svcAddExpeditionToTournee(id, expedition_id) });
  } catch (err) {
    next(err);
  }
};

export const removeExpedition: RequestHandler = async (req, res, next) => {
  try {
    const { id, expeditionId } = tourneeExpeditionParamsSchema.parse(req.params);
    res.json({ tournee: await svcRemoveExpeditionFromTournee(id, expeditionId) });
  } catch (err) {
    next(err);
  }
};

export const getTourneeReport: RequestHandler = async (req, res, next) => {
  try {
    const { id } = tourneeIdParamsSchema.parse(req.params);
    const out = await svcTourneeReport(id, scopeForUser(requireUser(req)));
    if (!out) {
      res.status(404).json(notFound);
      return;
    }
    res.json({ report: out });
  } catch (err) {
    next(err);
  }
};
