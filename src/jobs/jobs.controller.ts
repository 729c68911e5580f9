import type { RequestHandler } from "express";
import { z } from "zod";

import { JOB_NAMES, jobScheduler } from "./index";

const jobParamsSchema = z.object({
  name: z.enum(JOB_NAMES),
});

export const listJobs: RequestHandler = (_req, res) => {
  res.json({ items: jobScheduler.names() });
};

export const runJob: RequestHandler = async (req, res, next) => {
  try {
    const parsed = jobParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      res.status(404).json({ error: "JOB_NOT_FOUND", message: "Tâche inconnue" });
      return;
    }
    const out = await jobScheduler.run(parsed.data.name);
    res.status(out.status === "skipped" ? 409 : 200).json(out);
  } catch (err) {
    next(err);
  }
};
