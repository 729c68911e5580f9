import { Router } from "express";

import { authenticateToken, authorizeRole } from "../../auth/middlewares/auth.middleware";
import {
  createFacture,
  deleteFacture,
  getFacture,
  listFacturePaiements,
  listFactures,
} from "../controllers/factures.controller";

const router = Router();

router.use(authenticateToken, authorizeRole("admin", "agent"));

router.get("/", listFactures);
router.get("/:id", getFacture);
router.get("/:id/paiements", listFacturePaiements);
router.post("/", createFacture);
router.delete("/:id", authorizeRole("admin"), deleteFacture);

export default router;
