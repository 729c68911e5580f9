import { Router } from "express";

import { authenticateToken, authorizeRole } from "../module/auth/middlewares/auth.middleware";
import { listJobs, runJob } from "./jobs.controller";

const router = Router();

router.use(authenticateToken, authorizeRole("admin"));

router.get("/", listJobs);
router.post("/:name/run", runJob);

export default router;
