import { Router } from "express";

import { authenticateToken, authorizeRole } from "../../auth/middlewares/auth.middleware";
import { createClient, deactivateClient, getClient, listClients, updateClient } from "../controllers/clients.controller";

const router = Router();

router.use(authenticateToken);
router.use(authorizeRole("admin", "agent"));

router.get("/", listClients);
router.get("/:id", getClient);
router.post("/", createClient);
router.patch("/:id", updateClient);
router.delete("/:id", deactivateClient);

export default router;
