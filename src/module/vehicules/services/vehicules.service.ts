import logger from "../../../utils/logger";
import {
  repoCreateVehicule,
  repoDeactivateVehicule,
  repoGetVehicule,
  repoListVehicules,
  repoUpdateVehicule,
} from "../repository/vehicules.repository";
import type { Vehicule } from "../types/vehicules.types";
import type {
  CreateVehiculeBodyDTO,
  ListVehiculesQueryDTO,
  UpdateVehiculeBodyDTO,
} from "../validators/vehicules.validators";

export const svcListVehicules = (filters: ListVehiculesQueryDTO) => repoListVehicules(filters);

export const svcGetVehicule = (id: number) => repoGetVehicule(id);

export async function svcCreateVehicule(input: CreateVehiculeBodyDTO): Promise<Vehicule> {
  const vehicule = await repoCreateVehicule(input);
  logger.info(`[vehicules] ${vehicule.immatriculation} added (${vehicule.etat})`);
  return vehicule;
}

/** A new consumption only applies to tours recomputed afterwards. */
export const svcUpdateVehicule = (id: number, input: UpdateVehiculeBodyDTO) => repoUpdateVehicule(id, input);

export async function svcDeactivateVehicule(id: number): Promise<boolean> {
  const ok = await repoDeactivateVehicule(id);
  if (ok) logger.info(`[vehicules] vehicule ${id} deactivated`);
  return ok;
}
