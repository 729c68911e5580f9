import type { RequestHandler } from "express";

import {
  createVehiculeBodySchema,
  listVehiculesQuerySchema,
  updateVehiculeBodySchema,
  vehiculeIdParamsSchema,
} from "../validators/vehicules.validators";
import {
  svcCreateVehicule,
  svcDeactivateVehicule,
  svcGetVehicule,
  svcListVehicules,
  svcUpdateVehicule,
} from "../services/vehicules.service";

const notFound = { error: "VEHICULE_NOT_FOUND", message: "Véhicule introuvable" };

export const listVehicules: RequestHandler = async (req, res, next) => {
  try {
    const query = listVehiculesQuerySchema.parse(req.query);
    res.json(await svcListVehicules(query));
  } catch (err) {
    next(err);
  }
};

export const getVehicule: RequestHandler = async (req, res, next) => {
  try {
    const { id } = vehiculeIdParamsSchema.parse(req.params);
    const out = await svcGetVehicule(id);
    if (!out) {
      res.status(404).json(notFound);
      return;
    }
    res.json({ vehicule: out });
  } catch (err) {
    next(err);
  }
};

export const createVehicule: RequestHandler = async (req, res, next) => {
  try {
    const dto = createVehiculeBodySchema.parse(req.body);
    res.status(201).json({ vehicule: await svcCreateVehicule(dto) });
  } catch (err) {
    next(err);
  }
};

export const updateVehicule: RequestHandler = async (req, res, next) => {
  try {
    const { id } = vehiculeIdParamsSchema.parse(req.params);
    const dto = updateVehiculeBodySchema.parse(req.body);
    const out = await svcUpdateVehicule(id, dto);
    if (!out) {
      res.status(404).json(notFound);
      return;
    }
    res.json({ vehicule: out });
  } catch (err) {
    next(err);
  }
};

export const deactivateVehicule: RequestHandler = async (req, res, next) => {
  try {
    const { id } = vehiculeIdParamsSchema.parse(req.params);
    if (!(await svcDeactivateVehicule(id))) {
      res.status(404).json(notFound);
      return;
    }
    res.status(204).send();
  } catch (err) {
    next(err);
  }
};
