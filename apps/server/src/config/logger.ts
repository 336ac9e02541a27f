import pino from "pino";
import { env } from "./env.js";

export const logger = pino({
  name: "sales-tracker",
  level: env.NODE_ENV === "test" ? "silent" : env.LOG_LEVEL,
  redact: ["password", "passwordHash", "req.headers.cookie"]
});

export type Logger = pino.Logger;
