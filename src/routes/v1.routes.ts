// src/routes/v1.routes.ts
import { Router } from "express"
import tarificationRoutes from "../module/tarification/routes/tarification.routes"
import clientRoutes from "../module/clients/routes/clients.routes"
import chauffeurRoutes from "../module/chauffeurs/routes/chauffeurs.routes"
import vehiculeRoutes from "../module/vehicules/routes/vehicules.routes"
import expeditionRoutes from "../module/expeditions/routes/expeditions.routes"
import tourneeRoutes from "../module/tournees/routes/tournees.routes"
import factureRoutes from "../module/facturation/routes/factures.routes"
import paiementRoutes from "../module/facturation/routes/paiements.routes"
import incidentRoutes from "../module/incidents/routes/incidents.routes"
import trackingRoutes from "../module/tracking/routes/tracking.routes"
import reclamationRoutes from "../module/reclamations/routes/reclamations.routes"
import notificationRoutes from "../module/notifications/routes/notifications.routes"
import jobRoutes from "../jobs/jobs.routes"

const router = Router()

router.use("/tarifs", tarificationRoutes)
router.use("/clients", clientRoutes)
router.use("/chauffeurs", chauffeurRoutes)
router.use("/vehicules", vehiculeRoutes)
router.use("/expeditions", expeditionRoutes)
router.use("/tournees", tourneeRoutes)
router.use("/factures", factureRoutes)
router.use("/paiements", paiementRoutes)
router.use("/incidents", incidentRoutes)
router.use("/tracking", trackingRoutes)
router.use("/reclamations", reclamationRoutes)
router.use("/notifications", notificationRoutes)
router.use("/jobs", jobRoutes)

export default router
