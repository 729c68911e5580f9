import { Router } from "express";

import { authenticateToken, authorizeRole } from "../../auth/middlewares/auth.middleware";
import { createIncident, getIncident, listIncidents, resolveIncident } from "../controllers/incidents.controller";

const router = Router();

router.use(authenticateToken);

router.get("/", listIncidents);
router.get("/:id", getIncident);
router.post("/", createIncident);
router.post("/:id/resolve", authorizeRole("admin", "agent"), resolveIncident);

export default router;
