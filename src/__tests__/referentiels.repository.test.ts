import { beforeEach, describe, it, expect, vi } from "vitest";

const db = vi.hoisted(() => ({ pool: { query: vi.fn() } }));

vi.mock("../config/database", () => ({ default: db.pool }));

import { repoCreateChauffeur, repoDeactivateChauffeur } from "../module/chauffeurs/repository/chauffeurs.repository";
import { repoCreateClient, repoUpdateClient } from "../module/clients/repository/clients.repository";
import {
  repoCreateDestination,
  repoUpdateTypeService,
} from "../module/tarification/repository/tarification.repository";
import { repoCreateVehicule, repoUpdateVehicule } from "../module/vehicules/repository/vehicules.repository";
import { HttpError } from "../utils/httpError";

function pgError(code: string, constraint: string) {
  return Object.assign(new Error(`pg ${code}`), { code, constraint });
}

beforeEach(() => {
  db.pool.query.mockReset();
});

describe("unique keys", () => {
  it("maps a taken client email", async () => {
    db.pool.query.mockRejectedValueOnce(pgError("23505", "clients_email_key"));

    await expect(
      repoCreateClient({ nom: "Durand", prenom: "Léa", email: "lea@example.test" }, 4)
    ).rejects.toMatchObject({ status: 409, code: "CLIENT_EMAIL_TAKEN" });
  });

  it("maps a taken licence number", async () => {
    db.pool.query.mockRejectedValueOnce(pgError("23505", "chauffeurs_numero_permis_key"));

    await expect(
      repoCreateChauffeur({ nom: "Martin", prenom: "Paul", numero_permis: "B-1", disponibilite: true, date_embauche: "2025-09-01" })
    ).rejects.toMatchObject({ status: 409, code: "NUMERO_PERMIS_TAKEN" });
  });

  it("maps an unknown login account to 404", async () => {
    db.pool.query.mockRejectedValueOnce(pgError("23503", "chauffeurs_user_id_fkey"));

    await expect(
      repoCreateChauffeur({
        user_id: 99,
        nom: "Martin",
        prenom: "Paul",
        numero_permis: "B-1",
        disponibilite: true,
        date_embauche: "2025-09-01",
      })
    ).rejects.toMatchObject({ status: 404, code: "USER_NOT_FOUND" });
  });

  it("maps a taken plate on update", async () => {
    db.pool.query.mockRejectedValueOnce(pgError("23505", "vehicules_immatriculation_key"));

    await expect(repoUpdateVehicule(5, { immatriculation: "AB-123-CD" })).rejects.toMatchObject({
      status: 409,
      code: "IMMATRICULATION_TAKEN",
    });
  });

  it("maps a duplicate city and country", async () => {
    db.pool.query.mockRejectedValueOnce(pgError("23505", "destinations_ville_pays_key"));

    await expect(
      repoCreateDestination({ ville: "Lyon", pays: "France", zone_geographique: "EU", tarif_base: "12.00" })
    ).rejects.toMatchObject({ status: 409, code: "DESTINATION_EXISTS" });
  });

  it("maps a duplicate service name", async () => {
    db.pool.query.mockRejectedValueOnce(pgError("23505", "types_service_nom_key"));

    await expect(repoUpdateTypeService(1, { nom: "Express" })).rejects.toMatchObject({ status: 409, code: "TYPE_SERVICE_EXISTS" });
  });

  it("leaves other constraint errors alone", async () => {
    const other = pgError("23514", "vehicules_capacite_check");
    db.pool.query.mockRejectedValueOnce(other);

    await expect(
      repoCreateVehicule({ immatriculation: "AB-1", type: "Fourgon", capacite: "1.00", consommation: "1.00", etat: "AVAILABLE" })
    ).rejects.toBe(other);
  });
});

describe("updates", () => {
  it("throws NO_UPDATE before touching the database", async () => {
    let caught: unknown = null;
    try {
      await repoUpdateClient(2, {});
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(HttpError);
    expect(caught).toMatchObject({ status: 400, code: "NO_UPDATE" });
    expect(db.pool.query).not.toHaveBeenCalled();
  });

  it("casts decimals and stamps updated_at", async () => {
    db.pool.query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(repoUpdateVehicule(5, { capacite: "900.50", etat: "MAINTENANCE" })).resolves.toBeNull();

    const [sql, params] = db.pool.query.mock.calls[0];
    expect(sql).toContain("SET capacite = $2::numeric, etat = $3, updated_at = now() WHERE id = $1");
    expect(params).toEqual([5, "900.50", "MAINTENANCE"]);
  });
});

describe("soft deletes", () => {
  it("also marks a deactivated driver unavailable", async () => {
    db.pool.query.mockResolvedValueOnce({ rows: [], rowCount: 1 });

    await expect(repoDeactivateChauffeur(3)).resolves.toBe(true);

    expect(db.pool.query.mock.calls[0][0]).toBe(
      "UPDATE chauffeurs SET is_active = false, disponibilite = false, updated_at = now() WHERE id = $1"
    );
  });
});
