import { Router } from "express";

import { authenticateToken, authorizeRole } from "../../auth/middlewares/auth.middleware";
import {
  createVehicule,
  deactivateVehicule,
  getVehicule,
  listVehicules,
  updateVehicule,
} from "../controllers/vehicules.controller";

const router = Router();

router.use(authenticateToken);
router.use(authorizeRole("admin", "agent"));

router.get("/", listVehicules);
router.get("/:id", getVehicule);
router.post("/", createVehicule);
router.patch("/:id", updateVehicule);
router.delete("/:id", authorizeRole("admin"), deactivateVehicule);

export default router;
