import { describe, it, expect } from "vitest";

import { RuleBasedPredictor, ruleBasedHours } from "../module/expeditions/lib/predictor";

describe("ruleBasedHours", () => {
  it("starts from one day for a light parcel", () => {
    expect(ruleBasedHours({ poids: "2.00", volume: "0.10", type_service_nom: "Standard" })).toBe(24);
  });

  it("adds time for weight and volume", () => {
    expect(ruleBasedHours({ poids: "25", volume: "6", type_service_nom: null })).toBe(34);
    expect(ruleBasedHours({ poids: "50.01", volume: "10.01", type_service_nom: null })).toBe(44);
  });

  it("uses strict thresholds", () => {
    expect(ruleBasedHours({ poids: "20", volume: "5", type_service_nom: null })).toBe(24);
  });

  it("shortens express services down to a floor", () => {
    expect(ruleBasedHours({ poids: "60", volume: "12", type_service_nom: "Express 24h" })).toBe(32);
    expect(ruleBasedHours({ poids: "1", volume: "1", type_service_nom: "EXPRESS" })).toBe(12);
  });
});

describe("RuleBasedPredictor", () => {
  it("resolves to the rule-based estimate", async () => {
    await expect(new RuleBasedPredictor().predict({ poids: "30", volume: "1", type_service_nom: null })).resolves.toBe(30);
  });
});
