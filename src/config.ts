import { z } from "zod";

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_WEBHOOK_URL: z.string().url().optional(),
  TELEGRAM_WEBHOOK_PATH: z.string().startsWith("/").default("/webhook"),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default("0.0.0.0"),
  ADMIN_API_KEY: z.string().min(1).optional(),
  LISTINGS_PROVIDER: z.enum(["http", "mock"]).default("http"),
  LISTINGS_API_URL: z.string().url().default("http://localhost:8080/api/get_apartments"),
  LISTINGS_API_KEY: z.string().default(""),
  LISTINGS_LIMIT: z.coerce.number().int().min(1).max(10).default(3),
  LISTINGS_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LISTINGS_MEDIA_BASE: z.string().default(""),
  LISTINGS_FIXTURE: z.string().default("fixtures/listings.json"),
  DATABASE_URL: z.string().min(1).optional(),
  CONFIG_SOURCE: z.enum(["file", "http"]).default("file"),
  CONFIG_DIR: z.string().default("config/tables"),
  CONFIG_BASE_URL: z.string().url().optional(),
  CONFIG_CACHE_TTL_SEC: z.coerce.number().int().min(0).default(300),
  SILENCE_THRESHOLD_SEC: z.coerce.number().int().positive().default(900),
  SILENCE_CHECK_INTERVAL_SEC: z.coerce.number().int().positive().default(30),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type AppConfig = z.infer<typeof envSchema>;

// Empty strings in .env mean "not set".
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      out[key] = value;
    }
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(withoutBlanks(env));
}
