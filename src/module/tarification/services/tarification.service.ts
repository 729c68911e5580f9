import { formatCents, parseScaled, toCents } from "../../../utils/decimal";
import { TariffNotFound } from "../../../utils/errors";
import type { DbQueryer } from "../../../utils/transaction";
import { priceShipment } from "../lib/pricing";
import {
  repoCreateDestination,
  repoCreateTarification,
  repoCreateTypeService,
  repoDeactivateTarification,
  repoFindActiveRate,
  repoGetTarification,
  repoListDestinations,
  repoListTarifications,
  repoListTypesService,
  repoUpdateDestination,
  repoUpdateTarification,
  repoUpdateTypeService,
  type RateRow,
} from "../repository/tarification.repository";
import type { Quote, Rate } from "../types/tarification.types";
import type {
  CreateDestinationBodyDTO,
  CreateTarificationBodyDTO,
  CreateTypeServiceBodyDTO,
  ListDestinationsQueryDTO,
  ListTarificationsQueryDTO,
  QuoteQueryDTO,
  UpdateDestinationBodyDTO,
  UpdateTarificationBodyDTO,
  UpdateTypeServiceBodyDTO,
} from "../validators/tarification.validators";

export function rateFromRow(row: RateRow): Rate {
  return {
    per_kg: toCents(row.tarif_poids, "tarif_poids"),
    per_m3: toCents(row.tarif_volume, "tarif_volume"),
    base_fee: toCents(row.tarif_base, "tarif_base"),
  };
}

/** Tariff Lookup: fails with TariffNotFound, never returns a zero rate. */
export async function svcRateFor(typeServiceId: number, destinationId: number, tx?: DbQueryer): Promise<Rate> {
  const row = await repoFindActiveRate(typeServiceId, destinationId, tx);
  if (!row) throw new TariffNotFound(typeServiceId, destinationId);
  return rateFromRow(row);
}

/** Returns the price in cents. poids/volume are decimal strings (2 decimals). */
export async function svcPriceExpedition(
  typeServiceId: number,
  destinationId: number,
  poids: string,
  volume: string,
  tx?: DbQueryer
): Promise<bigint> {
  const rate = await svcRateFor(typeServiceId, destinationId, tx);
  return priceShipment(rate, parseScaled(poids, 2, "poids"), parseScaled(volume, 2, "volume"));
}

export async function svcQuote(query: QuoteQueryDTO): Promise<Quote> {
  const row = await repoFindActiveRate(query.type_service_id, query.destination_id);
  if (!row) throw new TariffNotFound(query.type_service_id, query.destination_id);
  const cents = priceShipment(rateFromRow(row), parseScaled(query.poids, 2, "poids"), parseScaled(query.volume, 2, "volume"));
  return {
    type_service_id: query.type_service_id,
    destination_id: query.destination_id,
    poids: query.poids,
    volume: query.volume,
    tarif_poids: row.tarif_poids,
    tarif_volume: row.tarif_volume,
    tarif_base: row.tarif_base,
    montant: formatCents(cents),
  };
}

export const svcListTarifications = (filters: ListTarificationsQueryDTO) => repoListTarifications(filters);

export const svcGetTarification = (id: number, include: string) => repoGetTarification(id, include);

export const svcCreateTarification = (input: CreateTarificationBodyDTO) => repoCreateTarification(input);

export const svcUpdateTarification = (id: number, input: UpdateTarificationBodyDTO) => repoUpdateTarification(id, input);

export const svcDeactivateTarification = (id: number) => repoDeactivateTarification(id);

export const svcListDestinations = (filters: ListDestinationsQueryDTO) => repoListDestinations(filters);

export const svcListTypesService = () => repoListTypesService();

export const svcCreateDestination = (input: CreateDestinationBodyDTO) => repoCreateDestination(input);

/** tarif_base changes apply to quotes and new shipments only; existing montants stay. */
export const svcUpdateDestination = (id: number, input: UpdateDestinationBodyDTO) => repoUpdateDestination(id, input);

export const svcCreateTypeService = (input: CreateTypeServiceBodyDTO) => repoCreateTypeService(input);

export const svcUpdateTypeService = (id: number, input: UpdateTypeServiceBodyDTO) => repoUpdateTypeService(id, input);
