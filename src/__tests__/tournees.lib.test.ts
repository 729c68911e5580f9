import { describe, it, expect } from "vitest";

import { fuelFor, perExpeditionEstimator, recompute, type TourTotals } from "../module/tournees/lib/aggregate";
import { buildTourneeReport } from "../module/tournees/lib/report";
import type { Expedition } from "../module/expeditions/types/expeditions.types";
import type { TourneeListItem } from "../module/tournees/types/tournees.types";

const auto: TourTotals = { kilometrage: 0n, kilometrage_manuel: false, consommation: 0n, consommation_manuelle: false };
// 50 km per shipment, in hundredths.
const estimate = perExpeditionEstimator(5000n);

describe("recompute", () => {
  it("estimates distance and fuel from the shipment count", () => {
    // 3 × 50 km = 150 km ; 150 km × 8.5 L/100km = 12.75 L
    expect(recompute(auto, 3, 850n, estimate)).toEqual({
      kilometrage: 15000n,
      kilometrage_manuel: false,
      consommation: 1275n,
      consommation_manuelle: false,
    });
  });

  it("is idempotent", () => {
    const once = recompute(auto, 4, 720n, estimate);
    expect(recompute(once, 4, 720n, estimate)).toEqual(once);
  });

  it("keeps a manual distance and derives fuel from it", () => {
    const manual = { ...auto, kilometrage: 12345n, kilometrage_manuel: true };
    const next = recompute(manual, 10, 1000n, estimate);
    expect(next.kilometrage).toBe(12345n);
    // 123.45 km × 10 L/100km = 12.345 L -> 12.35
    expect(next.consommation).toBe(1235n);
  });

  it("keeps a manual fuel figure", () => {
    const manual = { ...auto, consommation: 4200n, consommation_manuelle: true };
    expect(recompute(manual, 2, 900n, estimate).consommation).toBe(4200n);
  });

  it("drops to zero when the tour is emptied", () => {
    expect(recompute({ ...auto, kilometrage: 5000n, consommation: 400n }, 0, 800n, estimate)).toEqual(auto);
  });
});

describe("fuelFor", () => {
  it("rounds half up to the centilitre", () => {
    // 0.01 km × 50 L/100km = 0.005 L -> 0.01
    expect(fuelFor(1n, 5000n)).toBe(1n);
    expect(fuelFor(0n, 5000n)).toBe(0n);
  });
});

function expedition(id: number, statut: Expedition["statut"], poids: string, volume: string, montant: string): Expedition {
  return {
    id,
    numero: `EXP-${id}`,
    client_id: 1,
    type_service_id: 1,
    destination_id: 1,
    poids,
    volume,
    description: null,
    montant,
    statut,
    statut_updated_at: "2026-03-01T08:00:00.000Z",
    date_creation: "2026-03-01T08:00:00.000Z",
    date_livraison: null,
    predicted_delivery_time: null,
    tournee_id: 4,
    agent_responsable_id: null,
    is_active: true,
    created_at: "2026-03-01T08:00:00.000Z",
    updated_at: "2026-03-01T08:00:00.000Z",
  };
}

describe("buildTourneeReport", () => {
  const tournee: TourneeListItem = {
    id: 4,
    date: "2026-03-02",
    chauffeur_id: 9,
    vehicule_id: 5,
    kilometrage: "100.00",
    kilometrage_manuel: false,
    consommation: "8.50",
    consommation_manuelle: false,
    duree_minutes: null,
    created_at: "2026-03-01T08:00:00.000Z",
    updated_at: "2026-03-01T08:00:00.000Z",
    nb_expeditions: 2,
    chauffeur: { id: 9, nom: "Martin", prenom: "Léa" },
    vehicule: { id: 5, immatriculation: "AB-123-CD" },
  };

  it("totals weight, volume and revenue and counts statuses", () => {
    const report = buildTourneeReport(tournee, [
      expedition(1, "DELIVERED", "10.50", "1.25", "90.00"),
      expedition(2, "OUT_FOR_DELIVERY", "4.50", "0.75", "60.10"),
    ]);
    expect(report).toEqual({
      tournee_id: 4,
      date: "2026-03-02",
      chauffeur: "Martin Léa",
      vehicule: "AB-123-CD",
      total_expeditions: 2,
      total_poids: "15.00",
      total_volume: "2.00",
      chiffre_affaires: "150.10",
      kilometrage: "100.00",
      consommation: "8.50",
      status_breakdown: { CREATED: 0, IN_TRANSIT: 0, SORTING: 0, OUT_FOR_DELIVERY: 1, DELIVERED: 1, FAILED: 0 },
    });
  });

  it("reports an empty tour", () => {
    const report = buildTourneeReport({ ...tournee, chauffeur: null, vehicule: null }, []);
    expect(report.total_expeditions).toBe(0);
    expect(report.chiffre_affaires).toBe("0.00");
    expect(report.chauffeur).toBeNull();
    expect(report.vehicule).toBeNull();
  });
});
