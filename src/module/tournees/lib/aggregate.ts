import { roundHalfUp } from "../../../utils/decimal";

/** Distance in hundredths of km for a tour holding `count` shipments. */
export type DistanceEstimator = (expeditionCount: number) => bigint;

export const perExpeditionEstimator =
  (kmPerExpedition: bigint): DistanceEstimator =>
  (count) =>
    BigInt(count) * kmPerExpedition;

/** Litres (hundredths) for a distance and a L/100km rate, half-up. */
export function fuelFor(kilometrage: bigint, consommationL100: bigint): bigint {
  return roundHalfUp(kilometrage * consommationL100, 10_000n);
}

export type TourTotals = {
  kilometrage: bigint;
  kilometrage_manuel: boolean;
  consommation: bigint;
  consommation_manuelle: boolean;
};

/**
 * Recomputes the automatic fields of a tour. Operator-set values (manual flag)
 * are kept as is; fuel is derived from the effective distance either way.
 */
export function recompute(
  current: TourTotals,
  expeditionCount: number,
  vehiculeConsommation: bigint,
  estimate: DistanceEstimator
): TourTotals {
  const kilometrage = current.kilometrage_manuel ? current.kilometrage : estimate(expeditionCount);
  const consommation = current.consommation_manuelle ? current.consommation : fuelFor(kilometrage, vehiculeConsommation);
  return {
    kilometrage,
    kilometrage_manuel: current.kilometrage_manuel,
    consommation,
    consommation_manuelle: current.consommation_manuelle,
  };
}
