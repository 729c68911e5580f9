import { describe, it, expect } from "vitest";

import { formatCents, roundHalfUp, toCents } from "../utils/decimal";
import { priceShipment } from "../module/tarification/lib/pricing";
import { DEFAULT_TVA_RATE, priceInvoiceFromExpeditions, splitTax } from "../module/facturation/lib/totals";

const rate = { per_kg: toCents("2.50"), per_m3: toCents("15.00"), base_fee: toCents("50.00") };

describe("priceShipment", () => {
  it("50.00 base + 10 kg × 2.50 + 1 m³ × 15.00 = 90.00", () => {
    expect(formatCents(priceShipment(rate, toCents("10"), toCents("1")))).toBe("90.00");
  });

  it("is exact for fractional weights and volumes", () => {
    // 50 + 0.33 × 2.50 + 0.01 × 15 = 50 + 0.825 + 0.15 = 50.975 -> 50.98
    expect(formatCents(priceShipment(rate, toCents("0.33"), toCents("0.01")))).toBe("50.98");
  });

  it("matches base + poids×per_kg + volume×per_m3 over a grid of inputs", () => {
    for (const poids of [1n, 99n, 1234n, 50000n]) {
      for (const volume of [1n, 7n, 250n]) {
        const expected = roundHalfUp(rate.base_fee * 100n + poids * rate.per_kg + volume * rate.per_m3, 100n);
        expect(priceShipment(rate, poids, volume)).toBe(expected);
      }
    }
  });

  it("rejects non-positive weight or volume", () => {
    expect(() => priceShipment(rate, 0n, 100n)).toThrow("strictly positive");
    expect(() => priceShipment(rate, 100n, -1n)).toThrow("strictly positive");
  });
});

describe("splitTax", () => {
  it("tva = round(ht × 0.20, 2) and ttc = ht + tva", () => {
    for (const ht of [0n, 1n, 2n, 3n, 333n, 9000n, 123457n]) {
      const { montant_tva, montant_ttc } = splitTax(ht, DEFAULT_TVA_RATE);
      expect(montant_tva).toBe(roundHalfUp(ht * 2000n, 10000n));
      expect(montant_ttc).toBe(ht + montant_tva);
    }
  });

  it("rounds half up at the cent", () => {
    // 0.03 × 0.20 = 0.006 -> 0.01 ; 0.02 × 0.20 = 0.004 -> 0.00
    expect(splitTax(3n).montant_tva).toBe(1n);
    expect(splitTax(2n).montant_tva).toBe(0n);
  });

  it("accepts other rates and refuses negatives", () => {
    expect(splitTax(10000n, 550n)).toEqual({ montant_tva: 550n, montant_ttc: 10550n });
    expect(() => splitTax(-1n)).toThrow("non-negative amount");
  });
});

describe("priceInvoiceFromExpeditions", () => {
  it("sums shipment amounts then applies the tax once", () => {
    const totals = priceInvoiceFromExpeditions([{ montant: "90.00" }, { montant: "410.00" }]);
    expect(totals).toEqual({ montant_ht: 50000n, montant_tva: 10000n, montant_ttc: 60000n });
  });
});
