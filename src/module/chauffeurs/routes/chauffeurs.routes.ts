import { Router } from "express";

import { authenticateToken, authorizeRole } from "../../auth/middlewares/auth.middleware";
import {
  createChauffeur,
  deactivateChauffeur,
  getChauffeur,
  listChauffeurs,
  updateChauffeur,
} from "../controllers/chauffeurs.controller";

const router = Router();

router.use(authenticateToken);
router.use(authorizeRole("admin", "agent"));

router.get("/", listChauffeurs);
router.get("/:id", getChauffeur);
router.post("/", createChauffeur);
router.patch("/:id", updateChauffeur);
router.delete("/:id", authorizeRole("admin"), deactivateChauffeur);

export default router;
