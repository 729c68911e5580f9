import type { DomainEventBus, EventOf } from "../../../events/domain-events";
import type { ExpeditionStatut } from "../../expeditions/types/expeditions.types";
import type { IncidentType } from "../../incidents/types/incidents.types";
import type { ReclamationStatut } from "../../reclamations/types/reclamations.types";
import type { NotificationEvent, NotificationSeverity } from "../types/notifications.types";
import type { NotificationDispatcher } from "./dispatcher";

const STATUT_LABELS: Record<ExpeditionStatut, string> = {
  CREATED: "Créée",
  IN_TRANSIT: "En transit",
  SORTING: "En tri",
  OUT_FOR_DELIVERY: "En cours de livraison",
  DELIVERED: "Livrée",
  FAILED: "Échec de livraison",
};

const INCIDENT_LABELS: Record<IncidentType, string> = {
  DELAY: "Retard",
  LOSS: "Perte",
  DAMAGE: "Dommage",
  TECHNICAL: "Problème technique",
  OTHER: "Autre",
};

const RECLAMATION_LABELS: Record<ReclamationStatut, string> = {
  OPEN: "En cours",
  RESOLVED: "Résolue",
  CANCELLED: "Annulée",
};

function statusSeverity(statut: ExpeditionStatut): NotificationSeverity {
  if (statut === "DELIVERED") return "success";
  if (statut === "FAILED") return "error";
  return "info";
}

export function expeditionCreatedNotification(e: EventOf<"expedition.created">): NotificationEvent {
  return {
    category: "expedition",
    severity: "info",
    title: `Nouvelle expédition ${e.numero}`,
    message: `L'expédition ${e.numero} a été créée pour un montant de ${e.montant} €.`,
    client_id: e.client_id,
    user_id: e.agent_responsable_id,
  };
}

export function statusChangedNotification(e: EventOf<"expedition.status_changed">): NotificationEvent {
  const auto = e.actor === "system" ? " (changement automatique)" : "";
  return {
    category: "expedition",
    severity: statusSeverity(e.new_statut),
    title: `Expédition ${e.numero} - Changement de statut`,
    message: `Le statut de votre expédition est passé de '${STATUT_LABELS[e.old_statut]}' à '${STATUT_LABELS[e.new_statut]}'${auto}.`,
    client_id: e.client_id,
  };
}

export function incidentCreatedNotification(e: EventOf<"incident.created">): NotificationEvent {
  return {
    category: "incident",
    severity: e.severite === "CRITICAL" || e.severite === "HIGH" ? "error" : "warning",
    title: `Nouvel incident - ${INCIDENT_LABELS[e.incident_type]}`,
    message: `Un incident de type '${INCIDENT_LABELS[e.incident_type]}' a été signalé. Sévérité : ${e.severite}.`,
    client_id: e.client_id,
  };
}

export function incidentResolvedNotification(e: EventOf<"incident.resolved">): NotificationEvent {
  return {
    category: "incident",
    severity: "success",
    title: "Incident résolu",
    message: `L'incident #${e.incident_id} a été résolu.`,
    client_id: e.client_id,
  };
}

export function reclamationCreatedNotification(e: EventOf<"reclamation.created">): NotificationEvent {
  const n = e.expedition_ids.length;
  const linked = n === 0 ? "" : n === 1 ? " concernant 1 expédition" : ` concernant ${n} expéditions`;
  return {
    category: "reclamation",
    severity: "warning",
    title: `Nouvelle réclamation #${e.reclamation_id}`,
    message: `Une réclamation '${e.nature}' a été déposée${linked}.`,
    client_id: e.client_id,
  };
}

export function reclamationStatusNotification(e: EventOf<"reclamation.status_changed">): NotificationEvent {
  return {
    category: "reclamation",
    severity: e.new_statut === "RESOLVED" ? "success" : "info",
    title: `Réclamation #${e.reclamation_id} - ${RECLAMATION_LABELS[e.new_statut]}`,
    message: `Votre réclamation est passée de '${RECLAMATION_LABELS[e.old_statut]}' à '${RECLAMATION_LABELS[e.new_statut]}'.`,
    client_id: e.client_id,
  };
}

export function paiementRecordedNotification(e: EventOf<"paiement.recorded">): NotificationEvent {
  const solde = e.statut_paiement === "PAID" ? "La facture est soldée." : `Reste à payer : ${e.reste_a_payer} €.`;
  return {
    category: "paiement",
    severity: "success",
    title: `Paiement reçu - facture #${e.facture_id}`,
    message: `Un paiement de ${e.montant} € a été enregistré. ${solde}`,
    client_id: e.client_id,
  };
}

export function paiementReversedNotification(e: EventOf<"paiement.reversed">): NotificationEvent {
  return {
    category: "paiement",
    severity: "warning",
    title: `Paiement annulé - facture #${e.facture_id}`,
    message: `Le paiement de ${e.montant} € a été annulé. Reste à payer : ${e.reste_a_payer} €.`,
    client_id: e.client_id,
  };
}

export function factureCreatedNotification(e: EventOf<"facture.created">): NotificationEvent {
  return {
    category: "facture",
    severity: "info",
    title: `Nouvelle facture #${e.facture_id}`,
    message: `Une facture de ${e.montant_ttc} € TTC a été émise.`,
    client_id: e.client_id,
  };
}

/** Wires each domain event to its notification. Returns a function that unsubscribes them all. */
export function registerNotificationHandlers(bus: DomainEventBus, dispatcher: NotificationDispatcher): () => void {
  const unsubscribers = [
    bus.subscribe("expedition.created", (e) => dispatcher.dispatch(expeditionCreatedNotification(e)), "notify:expedition.created"),
    bus.subscribe("expedition.status_changed", (e) => dispatcher.dispatch(statusChangedNotification(e)), "notify:expedition.status_changed"),
    bus.subscribe("incident.created", (e) => dispatcher.dispatch(incidentCreatedNotification(e)), "notify:incident.created"),
    bus.subscribe("incident.resolved", (e) => dispatcher.dispatch(incidentResolvedNotification(e)), "notify:incident.resolved"),
    bus.subscribe("reclamation.created", (e) => dispatcher.dispatch(reclamationCreatedNotification(e)), "notify:reclamation.created"),
    bus.subscribe("reclamation.status_changed", (e) => dispatcher.dispatch(reclamationStatusNotification(e)), "notify:reclamation.status_changed"),
    bus.subscribe("paiement.recorded", (e) => dispatcher.dispatch(paiementRecordedNotification(e)), "notify:paiement.recorded"),
    bus.subscribe("paiement.reversed", (e) => dispatcher.dispatch(paiementReversedNotification(e)), "notify:paiement.reversed"),
    bus.subscribe("facture.created", (e) => dispatcher.dispatch(factureCreatedNotification(e)), "notify:facture.created"),
  ];
  return () => unsubscribers.forEach((off) => off());
}
