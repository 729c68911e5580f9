import logger from "../../../utils/logger";
import type { Actor } from "../../auth/types/auth.types";
import {
  repoCreateClient,
  repoDeactivateClient,
  repoGetClient,
  repoListClients,
  repoUpdateClient,
} from "../repository/clients.repository";
import type { Client } from "../types/clients.types";
import type { CreateClientBodyDTO, ListClientsQueryDTO, UpdateClientBodyDTO } from "../validators/clients.validators";

export const svcListClients = (filters: ListClientsQueryDTO) => repoListClients(filters);

export const svcGetClient = (id: number) => repoGetClient(id);

/** The creating user is recorded: an agent's shipment scope includes the clients they created. */
export async function svcCreateClient(input: CreateClientBodyDTO, actor: Actor): Promise<Client> {
  const client = await repoCreateClient(input, actor.kind === "user" ? actor.id : null);
  logger.info(`[clients] client ${client.id} created by ${actor.kind === "user" ? `user ${actor.id}` : "system"}`);
  return client;
}

export const svcUpdateClient = (id: number, input: UpdateClientBodyDTO) => repoUpdateClient(id, input);

export async function svcDeactivateClient(id: number): Promise<boolean> {
  const ok = await repoDeactivateClient(id);
  if (ok) logger.info(`[clients] client ${id} deactivated`);
  return ok;
}
