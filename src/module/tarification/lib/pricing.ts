import { roundHalfUp } from "../../../utils/decimal";
import type { Rate } from "../types/tarification.types";

/**
 * base_fee + poids × per_kg + volume × per_m3, half-up to the cent.
 * poids and volume are in hundredths; the sum is exact before the single rounding.
 */
export function priceShipment(rate: Rate, poids: bigint, volume: bigint): bigint {
  if (poids <= 0n || volume <= 0n) {
    throw new Error("priceShipment expects strictly positive poids and volume");
  }
  const raw = rate.base_fee * 100n + poids * rate.per_kg + volume * rate.per_m3;
  return roundHalfUp(raw, 100n);
}
