import { afterEach, describe, it, expect, vi } from "vitest";

vi.mock("../module/notifications/repository/notifications.repository", () => ({
  repoInsertNotification: vi.fn(),
}));

import { DomainEventBus } from "../events/domain-events";
import { PersistingNotificationDispatcher, type NotificationDispatcher } from "../module/notifications/lib/dispatcher";
import {
  paiementRecordedNotification,
  reclamationCreatedNotification,
  reclamationStatusNotification,
  registerNotificationHandlers,
  statusChangedNotification,
} from "../module/notifications/lib/handlers";
import type { Notification, NotificationEvent } from "../module/notifications/types/notifications.types";

function stored(event: NotificationEvent, id = 1): Notification {
  return {
    id,
    category: event.category,
    severity: event.severity,
    title: event.title,
    message: event.message,
    client_id: event.client_id ?? null,
    user_id: event.user_id ?? null,
    read: false,
    read_at: null,
    created_at: "2026-03-01T10:00:00.000Z",
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("notification builders", () => {
  it("describes an automatic status change", () => {
    expect(
      statusChangedNotification({
        type: "expedition.status_changed",
        expedition_id: 12,
        numero: "EXP000012",
        client_id: 2,
        old_statut: "IN_TRANSIT",
        new_statut: "FAILED",
        actor: "system",
        at: "2026-03-01T10:00:00.000Z",
      })
    ).toEqual({
      category: "expedition",
      severity: "error",
      title: "Expédition EXP000012 - Changement de statut",
      message: "Le statut de votre expédition est passé de 'En transit' à 'Échec de livraison' (changement automatique).",
      client_id: 2,
    });
  });

  it("describes a settled invoice", () => {
    const n = paiementRecordedNotification({
      type: "paiement.recorded",
      paiement_id: 2,
      facture_id: 10,
      client_id: 3,
      montant: "300.00",
      statut_paiement: "PAID",
      reste_a_payer: "0.00",
      at: "2026-03-01T10:00:00.000Z",
    });
    expect(n.message).toBe("Un paiement de 300.00 € a été enregistré. La facture est soldée.");
  });

  it("gives the remaining balance on a partial payment", () => {
    const n = paiementRecordedNotification({
      type: "paiement.recorded",
      paiement_id: 1,
      facture_id: 10,
      client_id: 3,
      montant: "300.00",
      statut_paiement: "PARTIAL",
      reste_a_payer: "300.00",
      at: "2026-03-01T10:00:00.000Z",
    });
    expect(n.message).toBe("Un paiement de 300.00 € a été enregistré. Reste à payer : 300.00 €.");
  });

  it("counts the shipments named in a complaint", () => {
    expect(
      reclamationCreatedNotification({
        type: "reclamation.created",
        reclamation_id: 21,
        client_id: 2,
        nature: "Colis endommagé",
        expedition_ids: [12, 13],
        created_by: 4,
        at: "2026-03-05T10:00:00.000Z",
      })
    ).toEqual({
      category: "reclamation",
      severity: "warning",
      title: "Nouvelle réclamation #21",
      message: "Une réclamation 'Colis endommagé' a été déposée concernant 2 expéditions.",
      client_id: 2,
    });
  });

  it("tells the client a complaint was resolved", () => {
    const n = reclamationStatusNotification({
      type: "reclamation.status_changed",
      reclamation_id: 21,
      client_id: 2,
      old_statut: "OPEN",
      new_statut: "RESOLVED",
      at: "2026-03-06T09:00:00.000Z",
    });
    expect(n.severity).toBe("success");
    expect(n.title).toBe("Réclamation #21 - Résolue");
    expect(n.message).toBe("Votre réclamation est passée de 'En cours' à 'Résolue'.");
  });
});

describe("registerNotificationHandlers", () => {
  it("turns each event into one notification", async () => {
    const bus = new DomainEventBus();
    const sent: NotificationEvent[] = [];
    const dispatcher: NotificationDispatcher = { dispatch: (e) => void sent.push(e) };
    registerNotificationHandlers(bus, dispatcher);

    await bus.publish({
      type: "expedition.created",
      expedition_id: 12,
      numero: "EXP000012",
      client_id: 2,
      agent_responsable_id: 4,
      montant: "90.00",
      at: "2026-03-01T10:00:00.000Z",
    });
    await bus.publish({ type: "facture.created", facture_id: 10, client_id: 2, montant_ttc: "108.00", at: "2026-03-01T10:00:00.000Z" });

    expect(sent).toEqual([
      {
        category: "expedition",
        severity: "info",
        title: "Nouvelle expédition EXP000012",
        message: "L'expédition EXP000012 a été créée pour un montant de 90.00 €.",
        client_id: 2,
        user_id: 4,
      },
      {
        category: "facture",
        severity: "info",
        title: "Nouvelle facture #10",
        message: "Une facture de 108.00 € TTC a été émise.",
        client_id: 2,
      },
    ]);
  });

  it("stops after unregistering", async () => {
    const bus = new DomainEventBus();
    const dispatch = vi.fn();
    const off = registerNotificationHandlers(bus, { dispatch });
    off();

    await bus.publish({ type: "facture.created", facture_id: 10, client_id: 2, montant_ttc: "108.00", at: "2026-03-01T10:00:00.000Z" });

    expect(dispatch).not.toHaveBeenCalled();
  });
});

describe("PersistingNotificationDispatcher", () => {
  const event: NotificationEvent = { category: "system", severity: "info", title: "t", message: "m", user_id: 4 };

  it("stores then pushes", async () => {
    const store = vi.fn(async (e: NotificationEvent) => stored(e));
    const push = vi.fn();
    const dispatcher = new PersistingNotificationDispatcher(store, push);

    dispatcher.dispatch(event);
    await dispatcher.idle();

    expect(store).toHaveBeenCalledWith(event);
    expect(push).toHaveBeenCalledWith(stored(event));
  });

  it("returns before delivery and logs a failed one", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    let fail: (err: Error) => void = () => undefined;
    const store = vi.fn(
      () =>
        new Promise<Notification>((_resolve, reject) => {
          fail = reject;
        })
    );
    const push = vi.fn();
    const dispatcher = new PersistingNotificationDispatcher(store, push);

    expect(dispatcher.dispatch(event)).toBeUndefined();
    fail(new Error("db down"));
    await dispatcher.idle();

    expect(push).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith("[ERROR]", "[notifications] delivery failed (system: t)", expect.any(Error));
  });
});
