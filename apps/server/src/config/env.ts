import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(3000),
  LOG_LEVEL: z.string().default("info"),
  DATABASE_URL: z.string().default("postgres://tracker:tracker@db:5432/tracker"),
  CORS_ORIGIN: z.string().default("http://localhost:8000"),
  APP_BASE_URL: z.string().default("http://localhost:8000"),
  SESSION_COOKIE_NAME: z.string().default("session_id"),
  SESSION_TTL_DAYS: z.coerce.number().positive().default(7),
  RESET_TOKEN_TTL_MINUTES: z.coerce.number().positive().default(60),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
  FORGOT_PASSWORD_DELAY_MS: z.coerce.number().int().min(0).default(500),
  MAINTENANCE_INTERVAL_SEC: z.coerce.number().int().positive().default(900),
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.string().optional(),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_FROM: z.string().optional(),
  SMTP_SECURE: z
    .string()
    .optional()
    .transform((value) => value === "true"),
  SMTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  AUTH_SEED_USERS: z.string().default("")
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
