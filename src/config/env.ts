import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().min(1).max(65535).default(8080),

  // Catalog storage and seed files
  CATALOG_DB_PATH: z.string().default("data/catalog.sqlite"),
  RECIPES_SEED_PATH: z.string().default("data/recipes.json"),
  MAPPINGS_SEED_PATH: z.string().default("data/mappings.json"),

  // Recommendation
  RECOMMEND_TOP_N: z.coerce.number().int().min(1).max(100).default(5),
  RECOMMEND_RATE_WINDOW_MS: z.coerce.number().default(60_000),
  RECOMMEND_RATE_MAX: z.coerce.number().default(30),
  UPLOAD_MAX_BYTES: z.coerce.number().int().min(1).default(10 * 1024 * 1024),

  // Text extraction (OCR)
  OCR_PROVIDER: z.enum(["google_vision", "disabled"]).default("google_vision"),
  GOOGLE_VISION_API_KEY: z.string().optional(),
  GOOGLE_VISION_API_URL: z.string().url().default("https://vision.googleapis.com/v1/images:annotate"),
  OCR_TIMEOUT_MS: z.coerce.number().min(100).default(10_000),

  // CORS
  CORS_ORIGIN: z.string().default("*"),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  LOG_PRETTY: z.string().transform((val) => val === "true").default("false"),
});

export type Env = z.infer<typeof envSchema>;

let env: Env | undefined;

export function getEnv(): Env {
  if (env) {
    return env;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  env = result.data;
  return env;
}

export function initEnv(): Env {
  const e = getEnv();

  if (e.NODE_ENV === "development") {
    console.log("Running in development mode");
    console.log("Port:", e.PORT);
  }

  return e;
}
