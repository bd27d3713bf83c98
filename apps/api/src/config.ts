import { z } from "zod";
import { DEFAULT_REPUTATION_CONFIG_PATH } from "../../../packages/reputation/src";

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  DATABASE_URL: z.string().optional(),
  REDIS_URL: z.string().optional(),
  ALLOWED_ORIGINS: z.string().default("*"),
  API_TOKENS: z.string().optional(),
  API_ADMIN_TOKENS: z.string().optional(),
  API_AUTH_BYPASS: z.string().optional().default("false"),
  RATE_LIMIT: z.coerce.number().int().positive().default(120),
  RATE_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RESET_HOUR_UTC: z.coerce.number().int().min(0).max(23).default(0),
  REPUTATION_CONFIG_PATH: z.string().default(DEFAULT_REPUTATION_CONFIG_PATH),
});

export type AppConfig = z.infer<typeof envSchema>;
export type AppConfigOverrides = Partial<z.input<typeof envSchema>>;

export const toBool = (val?: string) => val === "true" || val === "1" || val === "yes";
export const splitCsv = (val?: string) => (val ?? "").split(",").map((v) => v.trim()).filter(Boolean);

export const loadConfig = (overrides: AppConfigOverrides = {}): AppConfig =>
  envSchema.parse({ ...process.env, ...overrides });
