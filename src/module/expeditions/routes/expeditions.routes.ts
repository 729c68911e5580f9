import { Router } from "express";

import { authenticateToken, authorizeRole } from "../../auth/middlewares/auth.middleware";
import {
  assignExpeditionTournee,
  createExpedition,
  detachExpeditionTournee,
  getExpedition,
  getExpeditionHistory,
  listExpeditions,
  transitionExpedition,
} from "../controllers/expeditions.controller";

const router = Router();

router.use(authenticateToken);

router.get("/", listExpeditions);
router.get("/:id", getExpedition);
router.get("/:id/history", getExpeditionHistory);

router.post("/", authorizeRole("admin", "agent"), createExpedition);
router.post("/:id/status", transitionExpedition);
router.put("/:id/tournee", authorizeRole("admin", "agent"), assignExpeditionTournee);
router.delete("/:id/tournee", authorizeRole("admin", "agent"), detachExpeditionTournee);

export default router;
