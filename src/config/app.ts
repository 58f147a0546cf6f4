import express from "express";
import swaggerUi from "swagger-ui-express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import v1Router from "../routes/v1.routes";
import { errorHandler } from "../middlewares/errorHandler";
import { validationErrorMiddleware } from "../middlewares/validationError";
import { requestIdMiddleware } from "../middlewares/requestId";
import { requestLogger } from "../middlewares/requestLogger";
import { swaggerSpec } from "../swagger/swagger";

const app = express();

/* ------------------ 1) Security & CORS ------------------ */

app.use(helmet());

app.use(
  cors({
    origin: "*",
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
  })
);

app.use(requestIdMiddleware);

// Logger
const quiet = () => process.env.NODE_ENV === "test";
app.use(morgan("dev", { skip: quiet }));
app.use(requestLogger);

/* ------------------ 2) Parsers ------------------ */

app.use(express.json({ limit: "1mb" }));

/* ------------------ 3) Swagger / Docs ------------------ */

app.use(
  "/docs",
  swaggerUi.serve,
  swaggerUi.setup(swaggerSpec, {
    swaggerOptions: { persistAuthorization: true },
  })
);

/* ------------------ 4) Routes ------------------ */

app.get("/", (_req, res) => {
  res.send("✅ Payment methods API online!");
});

app.get("/api/v1", (_req, res) => {
  res.send("✅ Payment methods API online (v1)!");
});

app.use("/api/v1/", v1Router);

/* ------------------ 5) Error handlers (ALWAYS LAST) ------------------ */

app.use(validationErrorMiddleware);
app.use(errorHandler);

export default app;
