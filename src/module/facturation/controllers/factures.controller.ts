import type { RequestHandler } from "express";

import { listPaiementsQuerySchema } from "../validators/paiements.validators";
import { createFactureBodySchema, factureIdParamsSchema, listFacturesQuerySchema } from "../validators/factures.validators";
import { svcCreateFacture, svcDeleteFacture, svcGetFacture, svcListFactures } from "../services/factures.service";
import { svcListPaiements } from "../services/paiements.service";

export const listFactures: RequestHandler = async (req, res, next) => {
  try {
    const query = listFacturesQuerySchema.parse(req.query);
    const out = await svcListFactures(query);
    res.json(out);
  } catch (err) {
    next(err);
  }
};

export const getFacture: RequestHandler = async (req, res, next) => {
  try {
    const { id } = factureIdParamsSchema.parse(req.params);
    const out = await svcGetFacture(id);
    if (!out) {
      res.status(404).json({ error: "FACTURE_NOT_FOUND", message: "Facture introuvable" });
      return;
    }
    res.json({ facture: out });
  } catch (err) {
    next(err);
  }
};

export const listFacturePaiements: RequestHandler = async (req, res, next) => {
  try {
    const { id } = factureIdParamsSchema.parse(req.params);
    const query = listPaiementsQuerySchema.parse({ ...req.query, facture_id: id, sortDir: "asc" });
    const out = await svcListPaiements(query);
    res.json(out);
  } catch (err) {
    next(err);
  }
};

export const createFacture: RequestHandler = async (req, res, next) => {
  try {
    const dto = createFactureBodySchema.parse(req.body);
    const out = await svcCreateFacture(dto);
    res.status(201).json({ facture: out });
  } catch (err) {
    next(err);
  }
};

export const deleteFacture: RequestHandler = async (req, res, next) => {
  try {
    const { id } = factureIdParamsSchema.parse(req.params);
    await svcDeleteFacture(id);
    res.status(204).send();
  } catch (err) {
    next(err);
  }
};
