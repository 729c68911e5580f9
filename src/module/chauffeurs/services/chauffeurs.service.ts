import logger from "../../../utils/logger";
import {
  repoCreateChauffeur,
  repoDeactivateChauffeur,
  repoGetChauffeur,
  repoListChauffeurs,
  repoUpdateChauffeur,
} from "../repository/chauffeurs.repository";
import type { Chauffeur } from "../types/chauffeurs.types";
import type {
  CreateChauffeurBodyDTO,
  ListChauffeursQueryDTO,
  UpdateChauffeurBodyDTO,
} from "../validators/chauffeurs.validators";

export const svcListChauffeurs = (filters: ListChauffeursQueryDTO) => repoListChauffeurs(filters);

export const svcGetChauffeur = (id: number) => repoGetChauffeur(id);

export async function svcCreateChauffeur(input: CreateChauffeurBodyDTO): Promise<Chauffeur> {
  const chauffeur = await repoCreateChauffeur(input);
  logger.info(`[chauffeurs] chauffeur ${chauffeur.id} (${chauffeur.numero_permis}) created`);
  return chauffeur;
}

export const svcUpdateChauffeur = (id: number, input: UpdateChauffeurBodyDTO) => repoUpdateChauffeur(id, input);

export async function svcDeactivateChauffeur(id: number): Promise<boolean> {
  const ok = await repoDeactivateChauffeur(id);
  if (ok) logger.info(`[chauffeurs] chauffeur ${id} deactivated`);
  return ok;
}
