import type { EventActor } from "../module/auth/types/auth.types";
import type { ExpeditionStatut } from "../module/expeditions/types/expeditions.types";
import type { FacturePaymentStatus } from "../module/facturation/types/factures.types";
import type { IncidentSeverite, IncidentType } from "../module/incidents/types/incidents.types";
import type { ReclamationStatut } from "../module/reclamations/types/reclamations.types";
import logger from "../utils/logger";

export type ExpeditionCreatedEvent = {
  type: "expedition.created";
  expedition_id: number;
  numero: string;
  client_id: number;
  agent_responsable_id: number | null;
  montant: string;
  at: string;
};

export type ExpeditionStatusChangedEvent = {
  type: "expedition.status_changed";
  expedition_id: number;
  numero: string;
  client_id: number;
  old_statut: ExpeditionStatut;
  new_statut: ExpeditionStatut;
  actor: EventActor;
  at: string;
};

export type IncidentCreatedEvent = {
  type: "incident.created";
  incident_id: number;
  incident_type: IncidentType;
  severite: IncidentSeverite;
  expedition_id: number | null;
  tournee_id: number | null;
  client_id: number | null;
  created_by: number | null;
  at: string;
};

export type IncidentResolvedEvent = {
  type: "incident.resolved";
  incident_id: number;
  expedition_id: number | null;
  client_id: number | null;
  at: string;
};

export type ReclamationCreatedEvent = {
  type: "reclamation.created";
  reclamation_id: number;
  client_id: number;
  nature: string;
  expedition_ids: number[];
  created_by: number | null;
  at: string;
};

export type ReclamationStatusChangedEvent = {
  type: "reclamation.status_changed";
  reclamation_id: number;
  client_id: number;
  old_statut: ReclamationStatut;
  new_statut: ReclamationStatut;
  at: string;
};

type PaiementEventBody = {
  paiement_id: number;
  facture_id: number;
  client_id: number;
  montant: string;
  statut_paiement: FacturePaymentStatus;
  reste_a_payer: string;
  at: string;
};

export type PaiementRecordedEvent = PaiementEventBody & { type: "paiement.recorded" };
export type PaiementReversedEvent = PaiementEventBody & { type: "paiement.reversed" };

export type FactureCreatedEvent = {
  type: "facture.created";
  facture_id: number;
  client_id: number;
  montant_ttc: string;
  at: string;
};

export type DomainEvent =
  | ExpeditionCreatedEvent
  | ExpeditionStatusChangedEvent
  | IncidentCreatedEvent
  | IncidentResolvedEvent
  | ReclamationCreatedEvent
  | ReclamationStatusChangedEvent
  | PaiementRecordedEvent
  | PaiementReversedEvent
  | FactureCreatedEvent;

export type DomainEventType = DomainEvent["type"];
export type EventOf<T extends DomainEventType> = Extract<DomainEvent, { type: T }>;
export type DomainEventHandler<T extends DomainEventType> = (event: EventOf<T>) => void | Promise<void>;

function isEventOf<T extends DomainEventType>(event: DomainEvent, type: T): event is EventOf<T> {
  return event.type === type;
}

type Subscription = {
  type: DomainEventType;
  name: string;
  handle: (event: DomainEvent) => void | Promise<void>;
};

/**
 * State-changing operations publish here after their transaction commits;
 * handlers subscribe by event type. A failing handler is logged and does not
 * affect the other handlers or the publisher.
 */
export class DomainEventBus {
  private subscriptions: Subscription[] = [];

  subscribe<T extends DomainEventType>(type: T, handler: DomainEventHandler<T>, name = handler.name || type): () => void {
    const subscription: Subscription = {
      type,
      name,
      handle: (event) => (isEventOf(event, type) ? handler(event) : undefined),
    };
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s !== subscription);
    };
  }

  async publish(event: DomainEvent): Promise<void> {
    const targets = this.subscriptions.filter((s) => s.type === event.type);
    for (const s of targets) {
      try {
        await s.handle(event);
      } catch (err) {
        logger.error(`[events] handler "${s.name}" failed for ${event.type}`, err);
      }
    }
  }

  async publishAll(events: readonly DomainEvent[]): Promise<void> {
    for (const event of events) {
      await this.publish(event);
    }
  }

  clear() {
    this.subscriptions = [];
  }
}

export const eventBus = new DomainEventBus();
