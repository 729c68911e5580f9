import { OpenAPIV3_1 } from 'openapi-types';

const ref = (name: string) => ({ $ref: `#/components/schemas/${name}` });
const json = (schema: OpenAPIV3_1.ReferenceObject | OpenAPIV3_1.SchemaObject) => ({ 'application/json': { schema } });
const error = (description: string): OpenAPIV3_1.ResponseObject => ({ description, content: json(ref('ErrorResponse')) });
const idParam: OpenAPIV3_1.ParameterObject = { name: 'id', in: 'path', required: true, schema: { type: 'integer', minimum: 1 } };
const pageParams: OpenAPIV3_1.ParameterObject[] = [
  { name: 'page', in: 'query', schema: { type: 'integer', default: 1, minimum: 1 } },
  { name: 'pageSize', in: 'query', schema: { type: 'integer', default: 20, minimum: 1, maximum: 200 } },
  { name: 'sortDir', in: 'query', schema: { type: 'string', enum: ['asc', 'desc'], default: 'desc' } },
];
const page = (item: string): OpenAPIV3_1.SchemaObject => ({
  type: 'object',
  required: ['items', 'total'],
  properties: { items: { type: 'array', items: ref(item) }, total: { type: 'integer' } },
});

export const swaggerSpec: OpenAPIV3_1.Document = {
  openapi: '3.1.0',
  info: {
    title: 'Transport Manager API',
    version: '1.0.0',
    description:
      'Back office transport : clients, flotte, tarifs, expéditions, suivi, tournées, facturation, incidents, réclamations et notifications. Authentification par JWT (Bearer). Les montants sont des chaînes décimales à 2 décimales.',
  },
  servers: [{ url: '/api/v1', description: 'API v1 (même host)' }],
  components: {
    securitySchemes: {
      bearerAuth: { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' },
    },
    schemas: {
      Money: { type: 'string', pattern: '^-?\\d+\\.\\d{2}$', example: '90.00' },
      VehiculeEtat: { type: 'string', enum: ['AVAILABLE', 'IN_SERVICE', 'MAINTENANCE', 'OUT_OF_SERVICE'] },
      ReclamationStatut: { type: 'string', enum: ['OPEN', 'RESOLVED', 'CANCELLED'] },
      ExpeditionStatut: {
        type: 'string',
        enum: ['CREATED', 'IN_TRANSIT', 'SORTING', 'OUT_FOR_DELIVERY', 'DELIVERED', 'FAILED'],
      },

      // ------- INPUT SCHEMAS (alignés avec Zod) -------
      CreateExpeditionDTO: {
        type: 'object',
        required: ['client_id', 'type_service_id', 'destination_id', 'poids', 'volume'],
        properties: {
          client_id: { type: 'integer' },
          type_service_id: { type: 'integer' },
          destination_id: { type: 'integer' },
          poids: { type: ['number', 'string'], description: 'kg, 2 décimales max' },
          volume: { type: ['number', 'string'], description: 'm³, 2 décimales max' },
          description: { type: ['string', 'null'] },
          montant: { type: ['number', 'string'], description: 'Utilisé seulement sans tarification active' },
          agent_responsable_id: { type: ['integer', 'null'] },
        },
        example: { client_id: 1, type_service_id: 2, destination_id: 3, poids: '10', volume: '2' },
      },
      TransitionDTO: {
        type: 'object',
        required: ['statut'],
        properties: { statut: { type: 'string' }, notes: { type: ['string', 'null'] } },
        example: { statut: 'IN_TRANSIT' },
      },
      CreateTourneeDTO: {
        type: 'object',
        required: ['date', 'chauffeur_id', 'vehicule_id'],
        properties: {
          date: { type: 'string', format: 'date' },
          chauffeur_id: { type: 'integer' },
          vehicule_id: { type: 'integer' },
          duree_minutes: { type: ['integer', 'null'] },
        },
      },
      UpdateTourneeDTO: {
        type: 'object',
        properties: {
          date: { type: 'string', format: 'date' },
          chauffeur_id: { type: 'integer' },
          vehicule_id: { type: 'integer' },
          duree_minutes: { type: ['integer', 'null'] },
          kilometrage: { type: ['number', 'string', 'null'], description: 'null : retour au calcul automatique' },
          consommation: { type: ['number', 'string', 'null'], description: 'null : retour au calcul automatique' },
        },
      },
      CreateFactureDTO: {
        type: 'object',
        required: ['client_id', 'expedition_ids'],
        properties: {
          client_id: { type: 'integer' },
          expedition_ids: { type: 'array', items: { type: 'integer' }, minItems: 1 },
          taux_tva: { type: ['number', 'string'], example: '0.20' },
          mode: { type: 'string', enum: ['STANDARD', 'EXPRESS', 'URGENT'] },
        },
      },
      CreatePaiementDTO: {
        type: 'object',
        required: ['facture_id', 'montant'],
        properties: {
          facture_id: { type: 'integer' },
          montant: { type: ['number', 'string'] },
          mode: { type: 'string', enum: ['CASH', 'CARD', 'TRANSFER', 'CHEQUE'] },
          reference: { type: ['string', 'null'] },
          commentaire: { type: ['string', 'null'] },
        },
        example: { facture_id: 1, montant: '200.00', mode: 'TRANSFER' },
      },
      CreateIncidentDTO: {
        type: 'object',
        required: ['type'],
        properties: {
          type: { type: 'string', enum: ['DELAY', 'LOSS', 'DAMAGE', 'TECHNICAL', 'OTHER'] },
          severite: { type: 'string', enum: ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] },
          priorite: { type: 'string', enum: ['LOW', 'NORMAL', 'HIGH', 'URGENT'] },
          expedition_id: { type: ['integer', 'null'] },
          tournee_id: { type: ['integer', 'null'] },
          commentaire: { type: ['string', 'null'] },
        },
      },
      CreateClientDTO: {
        type: 'object',
        required: ['nom', 'prenom', 'email'],
        properties: {
          nom: { type: 'string' },
          prenom: { type: 'string' },
          email: { type: 'string', format: 'email' },
          telephone: { type: ['string', 'null'], pattern: '^\\+?\\d{9,15}$' },
          adresse: { type: ['string', 'null'] },
        },
      },
      CreateChauffeurDTO: {
        type: 'object',
        required: ['nom', 'prenom', 'numero_permis', 'date_embauche'],
        properties: {
          user_id: { type: ['integer', 'null'] },
          nom: { type: 'string' },
          prenom: { type: 'string' },
          numero_permis: { type: 'string', example: 'B-123456' },
          telephone: { type: 'string' },
          disponibilite: { type: 'boolean', default: true },
          date_embauche: { type: 'string', format: 'date' },
        },
      },
      CreateVehiculeDTO: {
        type: 'object',
        required: ['immatriculation', 'type', 'capacite', 'consommation'],
        properties: {
          immatriculation: { type: 'string', example: 'AB-123-CD' },
          type: { type: 'string' },
          capacite: { type: ['number', 'string'], description: 'kg, max 999999.99' },
          consommation: { type: ['number', 'string'], description: 'L/100 km, max 9999.99' },
          etat: ref('VehiculeEtat'),
        },
      },
      CreateDestinationDTO: {
        type: 'object',
        required: ['ville', 'pays', 'zone_geographique', 'tarif_base'],
        properties: {
          ville: { type: 'string' },
          pays: { type: 'string' },
          zone_geographique: { type: 'string' },
          tarif_base: { type: ['number', 'string'] },
        },
      },
      CreateTypeServiceDTO: {
        type: 'object',
        required: ['nom'],
        properties: { nom: { type: 'string' }, description: { type: ['string', 'null'] } },
      },
      CreateTrackingDTO: {
        type: 'object',
        required: ['expedition_id', 'lieu', 'statut'],
        properties: {
          expedition_id: { type: 'integer' },
          lieu: { type: 'string' },
          statut: { type: 'string' },
          commentaire: { type: ['string', 'null'] },
          chauffeur_id: { type: ['integer', 'null'], description: 'Ignoré pour un chauffeur' },
          date: { type: 'string', format: 'date-time' },
        },
      },
      CreateReclamationDTO: {
        type: 'object',
        required: ['client_id', 'nature'],
        properties: {
          client_id: { type: 'integer' },
          nature: { type: 'string' },
          commentaire: { type: ['string', 'null'] },
          expedition_ids: { type: 'array', items: { type: 'integer' } },
        },
      },

      // ------- OUTPUT SCHEMAS -------
      Quote: {
        type: 'object',
        properties: {
          type_service_id: { type: 'integer' },
          destination_id: { type: 'integer' },
          poids: { type: 'string' },
          volume: { type: 'string' },
          montant_ht: ref('Money'),
          montant_tva: ref('Money'),
          montant_ttc: ref('Money'),
        },
      },
      Expedition: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          numero: { type: 'string', example: 'EXP000001' },
          client_id: { type: 'integer' },
          type_service_id: { type: 'integer' },
          destination_id: { type: 'integer' },
          tournee_id: { type: ['integer', 'null'] },
          poids: { type: 'string' },
          volume: { type: 'string' },
          montant: ref('Money'),
          statut: ref('ExpeditionStatut'),
          date_creation: { type: 'string', format: 'date-time' },
          date_livraison: { type: ['string', 'null'], format: 'date-time' },
          predicted_delivery_time: { type: ['string', 'null'], format: 'date-time' },
          agent_responsable_id: { type: ['integer', 'null'] },
          is_active: { type: 'boolean' },
        },
      },
      StatusHistoryEntry: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          old_statut: ref('ExpeditionStatut'),
          new_statut: ref('ExpeditionStatut'),
          actor_type: { type: 'string', enum: ['user', 'system'] },
          changed_by: { type: ['integer', 'null'] },
          notes: { type: ['string', 'null'] },
          changed_at: { type: 'string', format: 'date-time' },
        },
      },
      Tournee: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          date: { type: 'string', format: 'date' },
          chauffeur_id: { type: 'integer' },
          vehicule_id: { type: 'integer' },
          kilometrage: { type: 'string' },
          kilometrage_manuel: { type: 'boolean' },
          consommation: { type: 'string' },
          consommation_manuelle: { type: 'boolean' },
          duree_minutes: { type: ['integer', 'null'] },
        },
      },
      Facture: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          client_id: { type: 'integer' },
          date_emission: { type: 'string', format: 'date' },
          montant_ht: ref('Money'),
          montant_tva: ref('Money'),
          montant_ttc: ref('Money'),
          taux_tva: { type: 'string', example: '0.2000' },
          statut_paiement: { type: 'string', enum: ['UNPAID', 'PARTIAL', 'PAID'] },
          mode: { type: 'string', enum: ['STANDARD', 'EXPRESS', 'URGENT'] },
          total_paye: ref('Money'),
          reste_a_payer: ref('Money'),
        },
      },
      Paiement: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          facture_id: { type: 'integer' },
          client_id: { type: 'integer' },
          date_paiement: { type: 'string', format: 'date' },
          montant: ref('Money'),
          mode: { type: 'string', enum: ['CASH', 'CARD', 'TRANSFER', 'CHEQUE'] },
          reference: { type: ['string', 'null'] },
          commentaire: { type: ['string', 'null'] },
        },
      },
      Incident: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          type: { type: 'string' },
          severite: { type: 'string' },
          priorite: { type: 'string' },
          expedition_id: { type: ['integer', 'null'] },
          tournee_id: { type: ['integer', 'null'] },
          commentaire: { type: ['string', 'null'] },
          resolution_details: { type: ['string', 'null'] },
          date_resolution: { type: ['string', 'null'], format: 'date-time' },
        },
      },
      Client: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          nom: { type: 'string' },
          prenom: { type: 'string' },
          email: { type: 'string' },
          telephone: { type: ['string', 'null'] },
          adresse: { type: ['string', 'null'] },
          solde: ref('Money'),
          date_inscription: { type: 'string', format: 'date' },
          created_by: { type: ['integer', 'null'] },
          is_active: { type: 'boolean' },
        },
      },
      Chauffeur: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          user_id: { type: ['integer', 'null'] },
          nom: { type: 'string' },
          prenom: { type: 'string' },
          numero_permis: { type: 'string' },
          telephone: { type: 'string' },
          disponibilite: { type: 'boolean' },
          date_embauche: { type: 'string', format: 'date' },
          is_active: { type: 'boolean' },
        },
      },
      Vehicule: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          immatriculation: { type: 'string' },
          type: { type: 'string' },
          capacite: { type: 'string' },
          consommation: { type: 'string' },
          etat: ref('VehiculeEtat'),
          is_active: { type: 'boolean' },
        },
      },
      Destination: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          ville: { type: 'string' },
          pays: { type: 'string' },
          zone_geographique: { type: 'string' },
          tarif_base: ref('Money'),
          is_active: { type: 'boolean' },
        },
      },
      TypeService: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          nom: { type: 'string' },
          description: { type: ['string', 'null'] },
          is_active: { type: 'boolean' },
        },
      },
      TrackingLog: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          expedition_id: { type: 'integer' },
          date: { type: 'string', format: 'date-time' },
          lieu: { type: 'string' },
          statut: { type: 'string' },
          commentaire: { type: ['string', 'null'] },
          chauffeur_id: { type: ['integer', 'null'] },
          created_by: { type: ['integer', 'null'] },
        },
      },
      Reclamation: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          client_id: { type: 'integer' },
          date: { type: 'string', format: 'date' },
          nature: { type: 'string' },
          statut: ref('ReclamationStatut'),
          commentaire: { type: ['string', 'null'] },
          expedition_ids: { type: 'array', items: { type: 'integer' } },
        },
      },
      Notification: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          category: { type: 'string' },
          severity: { type: 'string', enum: ['info', 'warning', 'error', 'success'] },
          title: { type: 'string' },
          message: { type: 'string' },
          client_id: { type: ['integer', 'null'] },
          user_id: { type: ['integer', 'null'] },
          read: { type: 'boolean' },
          read_at: { type: ['string', 'null'], format: 'date-time' },
          created_at: { type: 'string', format: 'date-time' },
        },
      },

      ErrorResponse: {
        type: 'object',
        required: ['error', 'message'],
        properties: {
          error: { type: 'string' },
          message: { type: 'string' },
          details: { type: 'object', additionalProperties: true },
        },
        example: { error: 'INVALID_TRANSITION', message: 'Transition invalide de DELIVERED vers IN_TRANSIT' },
      },
    },
  },
  security: [{ bearerAuth: [] }],
  tags: [
    { name: 'Tarifs' },
    { name: 'Clients' },
    { name: 'Flotte' },
    { name: 'Expéditions' },
    { name: 'Tournées' },
    { name: 'Facturation' },
    { name: 'Incidents' },
    { name: 'Suivi' },
    { name: 'Réclamations' },
    { name: 'Notifications' },
    { name: 'Jobs' },
  ],
  paths: {
    '/tarifs/quote': {
      get: {
        tags: ['Tarifs'],
        summary: 'Devis HT/TVA/TTC pour un service, une destination, un poids et un volume',
        parameters: [
          { name: 'type_service_id', in: 'query', required: true, schema: { type: 'integer' } },
          { name: 'destination_id', in: 'query', required: true, schema: { type: 'integer' } },
          { name: 'poids', in: 'query', required: true, schema: { type: 'string' }, example: '10' },
          { name: 'volume', in: 'query', required: true, schema: { type: 'string' }, example: '2' },
        ],
        responses: {
          '200': { description: 'OK', content: json({ type: 'object', properties: { quote: ref('Quote') } }) },
          '404': error('Aucune tarification active (TARIFF_NOT_FOUND)'),
        },
      },
    },
    '/tarifs/destinations': {
      get: {
        tags: ['Tarifs'],
        summary: 'Lister les destinations',
        parameters: [
          { name: 'q', in: 'query', schema: { type: 'string' } },
          { name: 'zone_geographique', in: 'query', schema: { type: 'string' } },
          { name: 'is_active', in: 'query', schema: { type: 'boolean' } },
        ],
        responses: { '200': { description: 'OK' } },
      },
      post: {
        tags: ['Tarifs'],
        summary: 'Créer une destination (admin)',
        requestBody: { required: true, content: json(ref('CreateDestinationDTO')) },
        responses: {
          '201': { description: 'Créée', content: json({ type: 'object', properties: { destination: ref('Destination') } }) },
          '409': error('Ville et pays déjà enregistrés (DESTINATION_EXISTS)'),
        },
      },
    },
    '/tarifs/destinations/{id}': {
      patch: {
        tags: ['Tarifs'],
        summary: 'Modifier ou désactiver une destination (admin)',
        parameters: [idParam],
        responses: { '200': { description: 'OK' }, '404': error('Non trouvée'), '409': error('Doublon') },
      },
    },
    '/tarifs/types-service': {
      get: { tags: ['Tarifs'], summary: 'Lister les types de service', responses: { '200': { description: 'OK' } } },
      post: {
        tags: ['Tarifs'],
        summary: 'Créer un type de service (admin)',
        requestBody: { required: true, content: json(ref('CreateTypeServiceDTO')) },
        responses: {
          '201': { description: 'Créé', content: json({ type: 'object', properties: { type_service: ref('TypeService') } }) },
          '409': error('Nom déjà pris (TYPE_SERVICE_EXISTS)'),
        },
      },
    },
    '/tarifs/types-service/{id}': {
      patch: {
        tags: ['Tarifs'],
        summary: 'Modifier ou désactiver un type de service (admin)',
        parameters: [idParam],
        responses: { '200': { description: 'OK' }, '404': error('Non trouvé'), '409': error('Doublon') },
      },
    },
    '/clients': {
      get: {
        tags: ['Clients'],
        summary: 'Lister les clients',
        parameters: [
          { name: 'q', in: 'query', schema: { type: 'string' } },
          { name: 'is_active', in: 'query', schema: { type: 'boolean' } },
          ...pageParams,
        ],
        responses: { '200': { description: 'OK', content: json(page('Client')) } },
      },
      post: {
        tags: ['Clients'],
        summary: 'Créer un client',
        requestBody: { required: true, content: json(ref('CreateClientDTO')) },
        responses: {
          '201': { description: 'Créé', content: json({ type: 'object', properties: { client: ref('Client') } }) },
          '409': error('Email déjà utilisé (CLIENT_EMAIL_TAKEN)'),
        },
      },
    },
    '/clients/{id}': {
      get: { tags: ['Clients'], summary: 'Obtenir un client', parameters: [idParam], responses: { '200': { description: 'OK' }, '404': error('Non trouvé') } },
      patch: { tags: ['Clients'], summary: 'Modifier un client', parameters: [idParam], responses: { '200': { description: 'OK' }, '404': error('Non trouvé') } },
      delete: { tags: ['Clients'], summary: 'Désactiver un client', parameters: [idParam], responses: { '204': { description: 'Désactivé' }, '404': error('Non trouvé') } },
    },
    '/chauffeurs': {
      get: { tags: ['Flotte'], summary: 'Lister les chauffeurs', parameters: pageParams, responses: { '200': { description: 'OK', content: json(page('Chauffeur')) } } },
      post: {
        tags: ['Flotte'],
        summary: 'Créer un chauffeur',
        requestBody: { required: true, content: json(ref('CreateChauffeurDTO')) },
        responses: {
          '201': { description: 'Créé', content: json({ type: 'object', properties: { chauffeur: ref('Chauffeur') } }) },
          '409': error('Permis ou utilisateur déjà enregistré'),
        },
      },
    },
    '/chauffeurs/{id}': {
      get: { tags: ['Flotte'], summary: 'Obtenir un chauffeur', parameters: [idParam], responses: { '200': { description: 'OK' }, '404': error('Non trouvé') } },
      patch: { tags: ['Flotte'], summary: 'Modifier un chauffeur', parameters: [idParam], responses: { '200': { description: 'OK' }, '404': error('Non trouvé') } },
      delete: { tags: ['Flotte'], summary: 'Désactiver un chauffeur (admin)', parameters: [idParam], responses: { '204': { description: 'Désactivé' }, '404': error('Non trouvé') } },
    },
    '/vehicules': {
      get: {
        tags: ['Flotte'],
        summary: 'Lister les véhicules',
        parameters: [{ name: 'etat', in: 'query', schema: ref('VehiculeEtat') }, ...pageParams],
        responses: { '200': { description: 'OK', content: json(page('Vehicule')) } },
      },
      post: {
        tags: ['Flotte'],
        summary: 'Créer un véhicule',
        requestBody: { required: true, content: json(ref('CreateVehiculeDTO')) },
        responses: {
          '201': { description: 'Créé', content: json({ type: 'object', properties: { vehicule: ref('Vehicule') } }) },
          '409': error('Immatriculation déjà enregistrée (IMMATRICULATION_TAKEN)'),
        },
      },
    },
    '/vehicules/{id}': {
      get: { tags: ['Flotte'], summary: 'Obtenir un véhicule', parameters: [idParam], responses: { '200': { description: 'OK' }, '404': error('Non trouvé') } },
      patch: { tags: ['Flotte'], summary: 'Modifier un véhicule', parameters: [idParam], responses: { '200': { description: 'OK' }, '404': error('Non trouvé') } },
      delete: { tags: ['Flotte'], summary: 'Retirer un véhicule (admin)', parameters: [idParam], responses: { '204': { description: 'Retiré' }, '404': error('Non trouvé') } },
    },
    '/expeditions': {
      get: {
        tags: ['Expéditions'],
        summary: 'Lister les expéditions visibles par l’utilisateur',
        parameters: [
          { name: 'statut', in: 'query', schema: ref('ExpeditionStatut') },
          { name: 'client_id', in: 'query', schema: { type: 'integer' } },
          { name: 'tournee_id', in: 'query', schema: { type: 'integer' } },
          { name: 'active', in: 'query', schema: { type: 'boolean' } },
          ...pageParams,
        ],
        responses: { '200': { description: 'OK', content: json(page('Expedition')) } },
      },
      post: {
        tags: ['Expéditions'],
        summary: 'Créer une expédition (prix calculé depuis la tarification)',
        requestBody: { required: true, content: json(ref('CreateExpeditionDTO')) },
        responses: {
          '201': { description: 'Créée', content: json({ type: 'object', properties: { expedition: ref('Expedition') } }) },
          '400': error('Requête invalide'),
          '404': error('Client introuvable'),
          '409': error('Numéro en conflit (DUPLICATE_IDENTIFIER)'),
          '422': error('Sans tarification ni montant (PRICING_REQUIRED)'),
        },
      },
    },
    '/expeditions/{id}': {
      get: {
        tags: ['Expéditions'],
        summary: 'Obtenir une expédition',
        parameters: [idParam],
        responses: {
          '200': { description: 'OK', content: json({ type: 'object', properties: { expedition: ref('Expedition') } }) },
          '404': error('Non trouvée'),
        },
      },
    },
    '/expeditions/{id}/status': {
      post: {
        tags: ['Expéditions'],
        summary: 'Changer le statut',
        parameters: [idParam],
        requestBody: { required: true, content: json(ref('TransitionDTO')) },
        responses: {
          '200': { description: 'OK', content: json({ type: 'object', properties: { expedition: ref('Expedition') } }) },
          '400': error('Statut inconnu (UNKNOWN_STATUS)'),
          '403': error('Rôle non autorisé'),
          '409': error('Transition invalide (INVALID_TRANSITION)'),
        },
      },
    },
    '/expeditions/{id}/history': {
      get: {
        tags: ['Expéditions'],
        summary: 'Historique des statuts',
        parameters: [idParam],
        responses: {
          '200': {
            description: 'OK',
            content: json({ type: 'object', properties: { items: { type: 'array', items: ref('StatusHistoryEntry') } } }),
          },
        },
      },
    },
    '/tournees': {
      get: {
        tags: ['Tournées'],
        summary: 'Lister les tournées',
        parameters: pageParams,
        responses: { '200': { description: 'OK', content: json(page('Tournee')) } },
      },
      post: {
        tags: ['Tournées'],
        summary: 'Créer une tournée',
        requestBody: { required: true, content: json(ref('CreateTourneeDTO')) },
        responses: { '201': { description: 'Créée' }, '404': error('Chauffeur ou véhicule introuvable') },
      },
    },
    '/tournees/{id}': {
      patch: {
        tags: ['Tournées'],
        summary: 'Modifier une tournée (valeurs manuelles ou retour au calcul)',
        parameters: [idParam],
        requestBody: { required: true, content: json(ref('UpdateTourneeDTO')) },
        responses: { '200': { description: 'OK' }, '404': error('Non trouvée') },
      },
    },
    '/tournees/{id}/expeditions': {
      post: {
        tags: ['Tournées'],
        summary: 'Ajouter une expédition et recalculer',
        parameters: [idParam],
        requestBody: {
          required: true,
          content: json({ type: 'object', required: ['expedition_id'], properties: { expedition_id: { type: 'integer' } } }),
        },
        responses: { '200': { description: 'OK' }, '409': error('Déjà affectée ou clôturée') },
      },
    },
    '/tournees/{id}/report': {
      get: {
        tags: ['Tournées'],
        summary: 'Rapport de tournée (totaux et répartition par statut)',
        parameters: [idParam],
        responses: { '200': { description: 'OK' }, '404': error('Non trouvée') },
      },
    },
    '/factures': {
      get: {
        tags: ['Facturation'],
        summary: 'Lister les factures',
        parameters: pageParams,
        responses: { '200': { description: 'OK', content: json(page('Facture')) } },
      },
      post: {
        tags: ['Facturation'],
        summary: 'Facturer des expéditions d’un client',
        requestBody: { required: true, content: json(ref('CreateFactureDTO')) },
        responses: {
          '201': { description: 'Créée', content: json({ type: 'object', properties: { facture: ref('Facture') } }) },
          '409': error('Expédition déjà facturée'),
          '422': error('Expédition d’un autre client'),
        },
      },
    },
    '/factures/{id}': {
      get: {
        tags: ['Facturation'],
        summary: 'Obtenir une facture avec expéditions et paiements',
        parameters: [idParam],
        responses: { '200': { description: 'OK' }, '404': error('Non trouvée') },
      },
      delete: {
        tags: ['Facturation'],
        summary: 'Supprimer une facture et ses paiements',
        parameters: [idParam],
        responses: { '204': { description: 'Supprimée' }, '404': error('Non trouvée') },
      },
    },
    '/paiements': {
      post: {
        tags: ['Facturation'],
        summary: 'Enregistrer un paiement',
        requestBody: { required: true, content: json(ref('CreatePaiementDTO')) },
        responses: {
          '201': { description: 'Créé', content: json({ type: 'object', properties: { paiement: ref('Paiement') } }) },
          '409': error('Facture déjà payée (INVOICE_ALREADY_PAID)'),
          '422': error('Montant supérieur au reste à payer (AMOUNT_EXCEEDS_BALANCE)'),
        },
      },
    },
    '/paiements/{id}': {
      delete: {
        tags: ['Facturation'],
        summary: 'Annuler un paiement',
        parameters: [idParam],
        responses: { '204': { description: 'Supprimé' }, '404': error('Non trouvé') },
      },
    },
    '/incidents': {
      post: {
        tags: ['Incidents'],
        summary: 'Signaler un incident (CRITICAL : l’expédition passe en FAILED)',
        requestBody: { required: true, content: json(ref('CreateIncidentDTO')) },
        responses: {
          '201': { description: 'Créé', content: json({ type: 'object', properties: { incident: ref('Incident') } }) },
          '404': error('Expédition ou tournée introuvable'),
        },
      },
    },
    '/incidents/{id}/resolve': {
      post: {
        tags: ['Incidents'],
        summary: 'Résoudre un incident',
        parameters: [idParam],
        responses: { '200': { description: 'OK' }, '409': error('Déjà résolu') },
      },
    },
    '/tracking': {
      get: {
        tags: ['Suivi'],
        summary: 'Points de suivi des expéditions visibles',
        parameters: [
          { name: 'expedition_id', in: 'query', schema: { type: 'integer' } },
          { name: 'chauffeur_id', in: 'query', schema: { type: 'integer' } },
          { name: 'statut', in: 'query', schema: { type: 'string' } },
          ...pageParams,
        ],
        responses: { '200': { description: 'OK', content: json(page('TrackingLog')) } },
      },
      post: {
        tags: ['Suivi'],
        summary: 'Ajouter un point de suivi',
        requestBody: { required: true, content: json(ref('CreateTrackingDTO')) },
        responses: {
          '201': { description: 'Créé', content: json({ type: 'object', properties: { tracking: ref('TrackingLog') } }) },
          '404': error('Expédition introuvable'),
        },
      },
    },
    '/tracking/{id}': {
      get: { tags: ['Suivi'], summary: 'Obtenir un point de suivi', parameters: [idParam], responses: { '200': { description: 'OK' }, '404': error('Non trouvé') } },
      delete: { tags: ['Suivi'], summary: 'Supprimer un point de suivi (admin)', parameters: [idParam], responses: { '204': { description: 'Supprimé' }, '404': error('Non trouvé') } },
    },
    '/reclamations': {
      get: {
        tags: ['Réclamations'],
        summary: 'Lister les réclamations',
        parameters: [
          { name: 'client_id', in: 'query', schema: { type: 'integer' } },
          { name: 'statut', in: 'query', schema: ref('ReclamationStatut') },
          ...pageParams,
        ],
        responses: { '200': { description: 'OK', content: json(page('Reclamation')) } },
      },
      post: {
        tags: ['Réclamations'],
        summary: 'Déposer une réclamation',
        requestBody: { required: true, content: json(ref('CreateReclamationDTO')) },
        responses: {
          '201': { description: 'Créée', content: json({ type: 'object', properties: { reclamation: ref('Reclamation') } }) },
          '404': error('Client introuvable'),
          '422': error('Expédition d’un autre client (EXPEDITION_CLIENT_MISMATCH)'),
        },
      },
    },
    '/reclamations/statistics': {
      get: {
        tags: ['Réclamations'],
        summary: 'Totaux par statut',
        parameters: [{ name: 'client_id', in: 'query', schema: { type: 'integer' } }],
        responses: { '200': { description: 'OK' } },
      },
    },
    '/reclamations/{id}': {
      get: { tags: ['Réclamations'], summary: 'Obtenir une réclamation', parameters: [idParam], responses: { '200': { description: 'OK' }, '404': error('Non trouvée') } },
    },
    '/reclamations/{id}/status': {
      post: {
        tags: ['Réclamations'],
        summary: 'Résoudre ou annuler une réclamation ouverte',
        parameters: [idParam],
        requestBody: {
          required: true,
          content: json({ type: 'object', required: ['statut'], properties: { statut: ref('ReclamationStatut'), commentaire: { type: ['string', 'null'] } } }),
        },
        responses: { '200': { description: 'OK' }, '409': error('Réclamation close (RECLAMATION_STATUS_CONFLICT)') },
      },
    },
    '/notifications': {
      get: {
        tags: ['Notifications'],
        summary: 'Notifications de l’utilisateur courant',
        parameters: [{ name: 'unread', in: 'query', schema: { type: 'boolean' } }, ...pageParams],
        responses: { '200': { description: 'OK', content: json(page('Notification')) } },
      },
    },
    '/notifications/{id}/read': {
      post: {
        tags: ['Notifications'],
        summary: 'Marquer comme lue',
        parameters: [idParam],
        responses: { '200': { description: 'OK' }, '404': error('Non trouvée') },
      },
    },
    '/jobs/{name}/run': {
      post: {
        tags: ['Jobs'],
        summary: 'Lancer une tâche planifiée (admin)',
        parameters: [
          {
            name: 'name',
            in: 'path',
            required: true,
            schema: { type: 'string', enum: ['status-sweep', 'balance-reconciliation', 'archive'] },
          },
        ],
        responses: { '200': { description: 'Terminée' }, '409': { description: 'Déjà en cours' } },
      },
    },
  },
};
