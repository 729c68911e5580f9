import type { RequestHandler } from "express";

import { requireUser } from "../../auth/middlewares/auth.middleware";
import { userActor } from "../../auth/types/auth.types";
import {
  clientIdParamsSchema,
  createClientBodySchema,
  listClientsQuerySchema,
  updateClientBodySchema,
} from "../validators/clients.validators";
import {
  svcCreateClient,
  svcDeactivateClient,
  svcGetClient,
  svcListClients,
  svcUpdateClient,
} from "../services/clients.service";

const notFound = { error: "CLIENT_NOT_FOUND", message: "Client introuvable" };

export const listClients: RequestHandler = async (req, res, next) => {
  try {
    const query = listClientsQuerySchema.parse(req.query);
    res.json(await svcListClients(query));
  } catch (err) {
    next(err);
  }
};

export const getClient: RequestHandler = async (req, res, next) => {
  try {
    const { id } = clientIdParamsSchema.parse(req.params);
    const out = await svcGetClient(id);
    if (!out) {
      res.status(404).json(notFound);
      return;
    }
    res.json({ client: out });
  } catch (err) {
    next(err);
  }
};

export const createClient: RequestHandler = async (req, res, next) => {
  try {
    const user = requireUser(req);
    const dto = createClientBodySchema.parse(req.body);
    const out = await svcCreateClient(dto, userActor(user));
    res.status(201).json({ client: out });
  } catch (err) {
    next(err);
  }
};

export const updateClient: RequestHandler = async (req, res, next) => {
  try {
    const { id } = clientIdParamsSchema.parse(req.params);
    const dto = updateClientBodySchema.parse(req.body);
    const out = await svcUpdateClient(id, dto);
    if (!out) {
      res.status(404).json(notFound);
      return;
    }
    res.json({ client: out });
  } catch (err) {
    next(err);
  }
};

export const deactivateClient: RequestHandler = async (req, res, next) => {
  try {
    const { id } = clientIdParamsSchema.parse(req.params);
    const ok = await svcDeactivateClient(id);
    if (!ok) {
      res.status(404).json(notFound);
      return;
    }
    res.status(204).send();
  } catch (err) {
    next(err);
  }
};
