import { Router } from "express";

import { authenticateToken, authorizeRole } from "../../auth/middlewares/auth.middleware";
import { createTracking, deleteTracking, getTracking, listTracking } from "../controllers/tracking.controller";

const router = Router();

router.use(authenticateToken);

router.get("/", listTracking);
router.get("/:id", getTracking);
router.post("/", createTracking);
router.delete("/:id", authorizeRole("admin"), deleteTracking);

export default router;
