import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "node:path";
import { fileURLToPath } from "node:url";

// Load .env from the project root, regardless of process.cwd()
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envPath = path.resolve(__dirname, "../.env");
loadEnv({ path: envPath });

const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().optional(),
);

const envSchema = z.object({
  PORT: z.coerce.number().default(5000),
  SQLITE_DB: z.string().default("data/catalog.db"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DEFAULT_CURRENCY: z
    .string()
    .regex(/^[A-Za-z]{3}$/, "DEFAULT_CURRENCY must be a three-letter code")
    .transform((value) => value.toUpperCase())
    .default("JMD"),
  // Client key checked on every request except health probes; unset = not enforced
  API_KEY: optionalString,
  // Google Maps (Places Text Search + Geocoding)
  GOOGLE_MAPS_API_KEY: optionalString,
  GOOGLE_MAPS_BASE_URL: z.string().url().default("https://maps.googleapis.com/maps/api"),
  PLACES_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  PLACES_SEARCH_RADIUS_M: z.coerce.number().int().positive().default(5000),
  PLACES_MAX_RESULTS: z.coerce.number().int().positive().default(10),
  PRODUCT_LIST_LIMIT: z.coerce.number().int().positive().default(100),
  GRACEFUL_SHUTDOWN_MS: z.coerce.number().int().positive().default(10000),
});

const parsed = envSchema.parse(process.env);

export const runtimeConfig = {
  port: parsed.PORT,
  sqlitePath: parsed.SQLITE_DB,
  logLevel: parsed.LOG_LEVEL,
  defaultCurrency: parsed.DEFAULT_CURRENCY,
  apiKey: parsed.API_KEY ?? "",
  googleMapsApiKey: parsed.GOOGLE_MAPS_API_KEY ?? "",
  googleMapsBaseUrl: parsed.GOOGLE_MAPS_BASE_URL,
  placesTimeoutMs: parsed.PLACES_TIMEOUT_MS,
  placesSearchRadiusM: parsed.PLACES_SEARCH_RADIUS_M,
  placesMaxResults: parsed.PLACES_MAX_RESULTS,
  productListLimit: parsed.PRODUCT_LIST_LIMIT,
  gracefulShutdownMs: parsed.GRACEFUL_SHUTDOWN_MS,
};

export type RuntimeConfig = typeof runtimeConfig;
