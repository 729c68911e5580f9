import type { RequestHandler } from "express";

import { requireUser } from "../../auth/middlewares/auth.middleware";
import { scopeForUser } from "../../auth/lib/access-scope";
import { userActor } from "../../auth/types/auth.types";
import { svcAddExpeditionToTournee, svcDetachExpedition } from "../../tournees/services/tournees.service";
import {
  assignTourneeBodySchema,
  createExpeditionBodySchema,
  expeditionIdParamsSchema,
  getExpeditionQuerySchema,
  listExpeditionsQuerySchema,
  transitionExpeditionBodySchema,
} from "../validators/expeditions.validators";
import {
  svcCreateExpedition,
  svcGetExpedition,
  svcGetStatusHistory,
  svcListExpeditions,
  svcTransitionExpedition,
} from "../services/expeditions.service";

export const listExpeditions: RequestHandler = async (req, res, next) => {
  try {
    const query = listExpeditionsQuerySchema.parse(req.query);
    const out = await svcListExpeditions(query, scopeForUser(requireUser(req)));
    res.json(out);
  } catch (err) {
    next(err);
  }
};

export const getExpedition: RequestHandler = async (req, res, next) => {
  try {
    const { id } = expeditionIdParamsSchema.parse(req.params);
    const { include } = getExpeditionQuerySchema.parse(req.query);
    const out = await svcGetExpedition(id, scopeForUser(requireUser(req)), include);
    if (!out) {
      res.status(404).json({ error: "EXPEDITION_NOT_FOUND", message: "Expédition introuvable" });
      return;
    }
    res.json({ expedition: out });
  } catch (err) {
    next(err);
  }
};

export const createExpedition: RequestHandler = async (req, res, next) => {
  try {
    const dto = createExpeditionBodySchema.parse(req.body);
    const out = await svcCreateExpedition(dto, userActor(requireUser(req)));
    res.status(201).json({ expedition: out });
  } catch (err) {
    next(err);
  }
};

export const transitionExpedition: RequestHandler = async (req, res, next) => {
  try {
    const user = requireUser(req);
    const { id } = expeditionIdParamsSchema.parse(req.params);
    const dto = transitionExpeditionBodySchema.parse(req.body);
    const out = await svcTransitionExpedition(id, dto.statut, userActor(user), scopeForUser(user), dto.notes ?? null);
    res.json({ expedition: out });
  } catch (err) {
    next(err);
  }
};

export const getExpeditionHistory: RequestHandler = async (req, res, next) => {
  try {
    const { id } = expeditionIdParamsSchema.parse(req.params);
    const items = await svcGetStatusHistory(id, scopeForUser(requireUser(req)));
    res.json({ items });
  } catch (err) {
    next(err);
  }
};

export const assignExpeditionTournee: RequestHandler = async (req, res, next) => {
  try {
    const { id } = expeditionIdParamsSchema.parse(req.params);
    const { tournee_id } = assignTourneeBodySchema.parse(req.body);
    res.json({ tournee: await svcAddExpeditionToTournee(tournee_id, id) });
  } catch (err) {
    next(err);
  }
};

export const detachExpeditionTournee: RequestHandler = async (req, res, next) => {
  try {
    const { id } = expeditionIdParamsSchema.parse(req.params);
    res.json({ tournee: await svcDetachExpedition(id) });
  } catch (err) {
    next(err);
  }
};
