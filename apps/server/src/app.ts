import { randomUUID } from "node:crypto";
import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { env } from "./config/env.js";
import { logger } from "./config/logger.js";
import { attachAuthContext } from "./middleware/auth.js";
import { agentsRouter } from "./routes/agents.js";
import { authRouter } from "./routes/auth.js";
import { healthRouter } from "./routes/health.js";
import { StorageUnavailableError } from "./services/authErrors.js";

/** Status carried by errors raised in body parsing and similar request-level failures. */
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("status" in error)) return null;
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

export function createApp() {
  const app = express();

  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      credentials: true
    })
  );
  app.use((req, res, next) => {
    const requestId = req.header("x-request-id") || randomUUID();
    res.setHeader("x-request-id", requestId);
    req.headers["x-request-id"] = requestId;
    next();
  });
  app.use(express.json());

  app.use(healthRouter);
  app.use(attachAuthContext);
  app.use(authRouter);
  app.use(agentsRouter);

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = req.header("x-request-id");
    const clientStatus = clientErrorStatus(error);
    if (clientStatus !== null) {
      logger.info({ err: error, requestId, status: clientStatus }, "Rejected malformed request");
      return res.status(clientStatus).json({ error: "invalid_request" });
    }
    if (error instanceof StorageUnavailableError) {
      logger.error({ err: error, requestId }, "Storage unavailable");
      return res.status(503).json({ error: "storage_unavailable" });
    }
    logger.error({ err: error, requestId }, "Unhandled request error");
    return res.status(500).json({ error: "internal_error" });
  });

  return app;
}
