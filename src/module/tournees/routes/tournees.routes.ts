import { Router } from "express";

import { authenticateToken, authorizeRole } from "../../auth/middlewares/auth.middleware";
import {
  addExpedition,
  createTournee,
  deleteTournee,
  getTournee,
  getTourneeReport,
  listTournees,
  recomputeTournee,
  removeExpedition,
  updateTournee,
} from "../controllers/tournees.controller";

const router = Router();

router.use(authenticateToken);

router.get("/", listTournees);
router.get("/:id", getTournee);
router.get("/:id/report", getTourneeReport);

router.post("/", authorizeRole("admin", "agent"), createTournee);
router.patch("/:id", authorizeRole("admin", "agent"), updateTournee);
router.delete("/:id", authorizeRole("admin"), deleteTournee);
router.post("/:id/recompute", authorizeRole("admin", "agent"), recomputeTournee);
router.post("/:id/expeditions", authorizeRole("admin", "agent"), addExpedition);
router.delete("/:id/expeditions/:expeditionId", authorizeRole("admin", "agent"), removeExpedition);

export default router;
