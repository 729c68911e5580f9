import { describe, it, expect } from "vitest";

import { loadSettings } from "../config/settings";

describe("loadSettings", () => {
  it("applies defaults", () => {
    const s = loadSettings({ JWT_SECRET: "test-secret" });
    expect(s.PORT).toBe(5000);
    expect(s.tvaRate).toBe(2000n);
    expect(s.tourKmPerExpedition).toBe(5000n);
    expect(s.JOBS_ENABLED).toBe(true);
    expect(s.SWEEP_AUTO_DELIVER_DAYS).toBe(7);
  });

  it("reads overrides", () => {
    const s = loadSettings({
      JWT_SECRET: "test-secret",
      PORT: "8080",
      TVA_RATE: "0.055",
      TOUR_KM_PER_EXPEDITION: "12.5",
      JOBS_ENABLED: "off",
      SWEEP_AUTO_DELIVER_DAYS: "0",
    });
    expect(s.PORT).toBe(8080);
    expect(s.tvaRate).toBe(550n);
    expect(s.tourKmPerExpedition).toBe(1250n);
    expect(s.JOBS_ENABLED).toBe(false);
    expect(s.SWEEP_AUTO_DELIVER_DAYS).toBe(0);
  });

  it("requires a JWT secret", () => {
    expect(() => loadSettings({})).toThrow("JWT_SECRET");
  });

  it("rejects a malformed tax rate", () => {
    expect(() => loadSettings({ JWT_SECRET: "test-secret", TVA_RATE: "20%" })).toThrow("Expected a non-negative decimal");
  });
});
