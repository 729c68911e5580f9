import type { RequestHandler } from "express";
import {
  createPaiementBodySchema,
  listPaiementsQuerySchema,
  paiementIdParamsSchema,
  updatePaiementBodySchema,
} from "../validators/paiements.validators";
import {
  svcCreatePaiement,
  svcDeletePaiement,
  svcGetPaiement,
  svcListPaiements,
  svcUpdatePaiement,
} from "../services/paiements.service";

export const listPaiements: RequestHandler = async (req, res, next) => {
  try {
    const query = listPaiementsQuerySchema.parse(req.query);
    const out = await svcListPaiements(query);
    res.json(out);
  } catch (err) {
    next(err);
  }
};

export const getPaiement: RequestHandler = async (req, res, next) => {
  try {
    const { id } = paiementIdParamsSchema.parse(req.params);
    const out = await svcGetPaiement(id);
    if (!out) {
      res.status(404).json({ error: "PAIEMENT_NOT_FOUND", message: "Paiement introuvable" });
      return;
    }
    res.json({ paiement: out });
  } catch (err) {
    next(err);
  }
};

export const createPaiement: RequestHandler = async (req, res, next) => {
  try {
    const dto = createPaiementBodySchema.parse(req.body);
    const out = await svcCreatePaiement(dto);
    res.status(201).json({ paiement: out });
  } catch (err) {
    next(err);
  }
};

export const updatePaiement: RequestHandler = async (req, res, next) => {
  try {
    const { id } = paiementIdParamsSchema.parse(req.params);
    const dto = updatePaiementBodySchema.parse(req.body);
    if (Object.keys(dto).length === 0) {
      res.status(400).json({ error: "NO_UPDATE", message: "No fields to update" });
      return;
    }
    const out = await svcUpdatePaiement(id, dto);
    if (!out) {
      res.status(404).json({ error: "PAIEMENT_NOT_FOUND", message: "Paiement introuvable" });
      return;
    }
    res.status(200).json({ paiement: out });
  } catch (err) {
    next(err);
  }
};

export const deletePaiement: RequestHandler = async (req, res, next) => {
  try {
    const { id } = paiementIdParamsSchema.parse(req.params);
    await svcDeletePaiement(id);
    res.status(204).send();
  } catch (err) {
    next(err);
  }
};
