import type { RequestHandler } from "express";

import {
  createDestinationBodySchema,
  createTarificationBodySchema,
  createTypeServiceBodySchema,
  getTarificationQuerySchema,
  listDestinationsQuerySchema,
  listTarificationsQuerySchema,
  quoteQuerySchema,
  tarificationIdParamsSchema,
  updateDestinationBodySchema,
  updateTarificationBodySchema,
  updateTypeServiceBodySchema,
} from "../validators/tarification.validators";
import {
  svcCreateDestination,
  svcCreateTarification,
  svcCreateTypeService,
  svcDeactivateTarification,
  svcGetTarification,
  svcListDestinations,
  svcListTarifications,
  svcListTypesService,
  svcQuote,
  svcUpdateDestination,
  svcUpdateTarification,
  svcUpdateTypeService,
} from "../services/tarification.service";

export const listTarifications: RequestHandler = async (req, res, next) => {
  try {
    const query = listTarificationsQuerySchema.parse(req.query);
    const out = await svcListTarifications(query);
    res.json(out);
  } catch (err) {
    next(err);
  }
};

export const getTarification: RequestHandler = async (req, res, next) => {
  try {
    const { id } = tarificationIdParamsSchema.parse(req.params);
    const { include } = getTarificationQuerySchema.parse(req.query);
    const out = await svcGetTarification(id, include);
    if (!out) {
      res.status(404).json({ error: "TARIFICATION_NOT_FOUND", message: "Tarification introuvable" });
      return;
    }
    res.json({ tarification: out });
  } catch (err) {
    next(err);
  }
};

export const createTarification: RequestHandler = async (req, res, next) => {
  try {
    const dto = createTarificationBodySchema.parse(req.body);
    const out = await svcCreateTarification(dto);
    res.status(201).json(out);
  } catch (err) {
    next(err);
  }
};

export const updateTarification: RequestHandler = async (req, res, next) => {
  try {
    const { id } = tarificationIdParamsSchema.parse(req.params);
    const dto = updateTarificationBodySchema.parse(req.body);
    const out = await svcUpdateTarification(id, dto);
    if (!out) {
      res.status(404).json({ error: "TARIFICATION_NOT_FOUND", message: "Tarification introuvable" });
      return;
    }
    res.json(out);
  } catch (err) {
    next(err);
  }
};

export const deactivateTarification: RequestHandler = async (req, res, next) => {
  try {
    const { id } = tarificationIdParamsSchema.parse(req.params);
    const ok = await svcDeactivateTarification(id);
    if (!ok) {
      res.status(404).json({ error: "TARIFICATION_NOT_FOUND", message: "Tarification introuvable" });
      return;
    }
    res.status(204).send();
  } catch (err) {
    next(err);
  }
};

export const quoteTarif: RequestHandler = async (req, res, next) => {
  try {
    const query = quoteQuerySchema.parse(req.query);
    const out = await svcQuote(query);
    res.json({ quote: out });
  } catch (err) {
    next(err);
  }
};

export const listDestinations: RequestHandler = async (req, res, next) => {
  try {
    const query = listDestinationsQuerySchema.parse(req.query);
    res.json({ items: await svcListDestinations(query) });
  } catch (err) {
    next(err);
  }
};

export const listTypesService: RequestHandler = async (_req, res, next) => {
  try {
    res.json({ items: await svcListTypesService() });
  } catch (err) {
    next(err);
  }
};

export const createDestination: RequestHandler = async (req, res, next) => {
  try {
    const dto = createDestinationBodySchema.parse(req.body);
    res.status(201).json({ destination: await svcCreateDestination(dto) });
  } catch (err) {
    next(err);
  }
};

export const updateDestination: RequestHandler = async (req, res, next) => {
  try {
    const { id } = tarificationIdParamsSchema.parse(req.params);
    const dto = updateDestinationBodySchema.parse(req.body);
    const out = await svcUpdateDestination(id, dto);
    if (!out) {
      res.status(404).json({ error: "DESTINATION_NOT_FOUND", message: "Destination introuvable" });
      return;
    }
    res.json({ destination: out });
  } catch (err) {
    next(err);
  }
};

export const createTypeService: RequestHandler = async (req, res, next) => {
  try {
    const dto = createTypeServiceBodySchema.parse(req.body);
    res.status(201).json({ type_service: await svcCreateTypeService(dto) });
  } catch (err) {
    next(err);
  }
};

export const updateTypeService: RequestHandler = async (req, res, next) => {
  try {
    const { id } = tarificationIdParamsSchema.parse(req.params);
    const dto = updateTypeServiceBodySchema.parse(req.body);
    const out = await svcUpdateTypeService(id, dto);
    if (!out) {
      res.status(404).json({ error: "TYPE_SERVICE_NOT_FOUND", message: "Type de service introuvable" });
      return;
    }
    res.json({ type_service: out });
  } catch (err) {
    next(err);
  }
};
