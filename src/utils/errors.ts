import { HttpError } from './httpError';

// Domain errors. Each one keeps a fixed HTTP status and code so the
// errorHandler can render it without knowing the module it came from.

export class TariffNotFound extends HttpError {
  constructor(typeServiceId: number, destinationId: number) {
    super(404, 'TARIFF_NOT_FOUND', 'Aucune tarification active pour ce service et cette destination', {
      type_service_id: typeServiceId,
      destination_id: destinationId,
    });
  }
}

export class PricingRequired extends HttpError {
  constructor(typeServiceId: number, destinationId: number) {
    super(422, 'PRICING_REQUIRED', 'Tarif introuvable : le montant doit être fourni', {
      type_service_id: typeServiceId,
      destination_id: destinationId,
    });
  }
}

export class UnknownStatus extends HttpError {
  constructor(value: string) {
    super(400, 'UNKNOWN_STATUS', `Statut inconnu : ${value}`, { statut: value });
  }
}

export class InvalidTransition extends HttpError {
  constructor(from: string, to: string, reason?: string) {
    super(409, 'INVALID_TRANSITION', `Transition invalide de ${from} vers ${to}`, {
      from,
      to,
      ...(reason ? { reason } : {}),
    });
  }
}

export class InvoiceAlreadyPaid extends HttpError {
  constructor(factureId: number) {
    super(409, 'INVOICE_ALREADY_PAID', 'La facture est déjà intégralement payée', { facture_id: factureId });
  }
}

export class AmountExceedsBalance extends HttpError {
  constructor(factureId: number, montant: string, reste: string) {
    super(422, 'AMOUNT_EXCEEDS_BALANCE', 'Le montant dépasse le reste à payer', {
      facture_id: factureId,
      montant,
      reste_a_payer: reste,
    });
  }
}

export class DuplicateIdentifier extends HttpError {
  constructor(identifier: string) {
    super(409, 'DUPLICATE_IDENTIFIER', `Identifiant déjà utilisé : ${identifier}`, { identifier });
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = 'Accès interdit') {
    super(403, 'FORBIDDEN', message);
  }
}

export class NotFoundError extends HttpError {
  constructor(code: string, message = 'Ressource introuvable') {
    super(404, code, message);
  }
}
