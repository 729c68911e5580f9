import express from "express";
import swaggerUi from "swagger-ui-express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { apiReference } from "@scalar/express-api-reference";

import v1Router from "../routes/v1.routes";
import { errorHandler } from "../middlewares/errorHandler";
import { requestIdMiddleware } from "../middlewares/requestId";
import { requestLogger } from "../middlewares/requestLogger";
import { swaggerSpec } from "../swagger/swagger";

const app = express();

/* ------------------ 1) Sécurité & CORS ------------------ */

app.use(helmet());

app.use(
  cors({
    origin: "*",
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
  })
);

/* ------------------ 2) Traçabilité ------------------ */

app.use(requestIdMiddleware);
app.use(morgan("dev"));
app.use(requestLogger);

/* ------------------ 3) Parsers ------------------ */

app.use(express.json({ limit: "1mb" }));

/* ------------------ 4) Swagger / Docs ------------------ */

app.use(
  "/docs",
  swaggerUi.serve,
  swaggerUi.setup(swaggerSpec, {
    swaggerOptions: { persistAuthorization: true },
  })
);

app.use("/reference", apiReference({ spec: { content: swaggerSpec } }));

/* ------------------ 5) Routes ------------------ */

app.get("/", (_req, res) => {
  res.send("✅ Backend transport en ligne !");
});

app.get("/api/v1", (_req, res) => {
  res.send("✅ Backend transport en ligne en V1 !");
});

app.use("/api/v1/", v1Router);

/* ------------------ 6) Error handler (TOUJOURS EN DERNIER) ------------------ */

app.use(errorHandler);

export default app;
