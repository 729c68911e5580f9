import { parseScaled } from "../../../utils/decimal";

export type PredictionInput = {
  poids: string;
  volume: string;
  type_service_nom: string | null;
};

/** Estimated hours between creation and delivery, or null when no estimate is available. */
export interface DeliveryTimePredictor {
  predict(input: PredictionInput): Promise<number | null>;
}

const BASE_HOURS = 24;
const MIN_HOURS = 6;

// Thresholds in hundredths (kg, m³).
const HEAVY = 5000n;
const MEDIUM_WEIGHT = 2000n;
const BULKY = 1000n;
const MEDIUM_VOLUME = 500n;

export function ruleBasedHours(input: PredictionInput): number {
  const poids = parseScaled(input.poids, 2, "poids");
  const volume = parseScaled(input.volume, 2, "volume");
  let hours = BASE_HOURS;

  if (poids > HEAVY) hours += 12;
  else if (poids > MEDIUM_WEIGHT) hours += 6;

  if (volume > BULKY) hours += 8;
  else if (volume > MEDIUM_VOLUME) hours += 4;

  if (input.type_service_nom && input.type_service_nom.toLowerCase().includes("express")) {
    hours = Math.max(hours - 12, MIN_HOURS);
  }

  return hours;
}

export class RuleBasedPredictor implements DeliveryTimePredictor {
  async predict(input: PredictionInput): Promise<number | null> {
    return ruleBasedHours(input);
  }
}
