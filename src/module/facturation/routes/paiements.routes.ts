import { Router } from "express";

import { authenticateToken, authorizeRole } from "../../auth/middlewares/auth.middleware";
import {
  createPaiement,
  deletePaiement,
  getPaiement,
  listPaiements,
  updatePaiement,
} from "../controllers/paiements.controller";

const router = Router();

router.use(authenticateToken, authorizeRole("admin", "agent"));

router.get("/", listPaiements);
router.get("/:id", getPaiement);
router.post("/", createPaiement);
router.patch("/:id", updatePaiement);
router.delete("/:id", authorizeRole("admin"), deletePaiement);

export default router;
