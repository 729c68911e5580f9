import { Router } from "express";

import { authenticateToken, authorizeRole } from "../../auth/middlewares/auth.middleware";
import {
  createDestination,
  createTarification,
  createTypeService,
  deactivateTarification,
  getTarification,
  listDestinations,
  listTarifications,
  listTypesService,
  quoteTarif,
  updateDestination,
  updateTarification,
  updateTypeService,
} from "../controllers/tarification.controller";

const router = Router();

router.use(authenticateToken);

router.get("/quote", quoteTarif);
router.get("/destinations", listDestinations);
router.post("/destinations", authorizeRole("admin"), createDestination);
router.patch("/destinations/:id", authorizeRole("admin"), updateDestination);
router.get("/types-service", listTypesService);
router.post("/types-service", authorizeRole("admin"), createTypeService);
router.patch("/types-service/:id", authorizeRole("admin"), updateTypeService);

router.get("/", listTarifications);
router.get("/:id", getTarification);
router.post("/", authorizeRole("admin"), createTarification);
router.patch("/:id", authorizeRole("admin"), updateTarification);
router.delete("/:id", authorizeRole("admin"), deactivateTarification);

export default router;
