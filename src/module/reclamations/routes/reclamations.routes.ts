import { Router } from "express";

import { authenticateToken, authorizeRole } from "../../auth/middlewares/auth.middleware";
import {
  createReclamation,
  getReclamation,
  listReclamations,
  reclamationStatistics,
  updateReclamationStatus,
} from "../controllers/reclamations.controller";

const router = Router();

router.use(authenticateToken);
router.use(authorizeRole("admin", "agent"));

router.get("/", listReclamations);
router.get("/statistics", reclamationStatistics);
router.get("/:id", getReclamation);
router.post("/", createReclamation);
router.post("/:id/status", updateReclamationStatus);

export default router;
