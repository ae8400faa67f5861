import { existsSync } from "fs";
import { resolve as pathResolve, isAbsolute } from "path";
import { z } from "zod";

// Care Navigator: runtime configuration
//
// Reads process.env once and freezes the result. Loading `.env` into
// process.env is the responsibility of server.ts (dotenv) and must happen
// before the first getAppConfig() call.

const intFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? fallback : Number(v)))
    .pipe(z.number().int().nonnegative());

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  PORT: intFromEnv(3001),
  NODE_ENV: z.string().default("development"),
  CORS_ORIGINS: optionalString,

  GOOGLE_CLOUD_PROJECT: optionalString,
  VERTEX_LOCATION: z.string().default("asia-northeast1"),
  GEMINI_API_KEY: optionalString,
  GENERATION_MODEL: z.string().default("gemini-2.5-flash"),
  AI_REQUEST_TIMEOUT_MS: intFromEnv(30_000),
  AI_MAX_TRANSIENT_RETRIES: intFromEnv(2),
  AI_RETRY_BASE_DELAY_MS: intFromEnv(500),
  ENRICHMENT_CONCURRENCY: intFromEnv(3),

  CLINIC_DATASET_PATH: z.string().default("data/clinics.csv"),
  REFERENCE_POINTS_PATH: z.string().default("data/reference-points.json"),
  SEARCH_RADIUS_MIN_M: intFromEnv(500),
  SEARCH_RADIUS_MAX_M: intFromEnv(5000),
  SEARCH_RADIUS_DEFAULT_M: intFromEnv(2000),
  RESULT_COUNT_MIN: intFromEnv(1),
  RESULT_COUNT_MAX: intFromEnv(20),
  RESULT_COUNT_DEFAULT: intFromEnv(10),
  CLOSING_SOON_MIN_MINUTES: intFromEnv(5),
  CLOSING_SOON_MAX_MINUTES: intFromEnv(90),
  CLOSING_SOON_DEFAULT_MINUTES: intFromEnv(30),

  RESUMPTION_TOKEN_SECRET: z.string().default("care-navigator-dev-secret"),
  SESSION_TTL_MINUTES: intFromEnv(120),
  DATABASE_URL: optionalString,
});

export type Bounds = Readonly<{ min: number; max: number; default: number }>;

export type DirectoryConfig = Readonly<{
  datasetPath: string;
  referencePointsPath: string;
  radiusMeters: Bounds;
  maxResults: Bounds;
  closingSoonThresholdMinutes: Bounds;
}>;

export type AIConfig = Readonly<{
  project?: string;
  location: string;
  apiKey?: string;
  model: string;
  requestTimeoutMs: number;
  maxTransientRetries: number;
  retryBaseDelayMs: number;
  enrichmentConcurrency: number;
}>;

export type SessionConfig = Readonly<{
  tokenSecret: string;
  ttlMinutes: number;
  databaseUrl?: string;
}>;

export type AppConfig = Readonly<{
  port: number;
  environment: string;
  corsOrigins?: readonly string[];
  ai: AIConfig;
  directory: DirectoryConfig;
  session: SessionConfig;
}>;

function resolveProjectRoot(): string {
  const candidates = [
    pathResolve(__dirname, "..", ".."),
    pathResolve(__dirname, "..", "..", ".."),
    process.cwd(),
  ];
  for (const candidate of candidates) {
    if (existsSync(pathResolve(candidate, "data"))) return candidate;
  }
  return process.cwd();
}

export function resolveDataPath(path: string): string {
  return isAbsolute(path) ? path : pathResolve(resolveProjectRoot(), path);
}

function bounds(label: string, min: number, max: number, fallback: number): Bounds {
  if (min > max) throw new Error(`Invalid ${label} bounds: min ${min} exceeds max ${max}.`);
  return { min, max, default: Math.min(max, Math.max(min, fallback)) };
}

export function parseAppConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;

  return Object.freeze({
    port: e.PORT,
    environment: e.NODE_ENV,
    corsOrigins: e.CORS_ORIGINS?.split(",").map((s) => s.trim()).filter(Boolean),
    ai: Object.freeze({
      project: e.GOOGLE_CLOUD_PROJECT,
      location: e.VERTEX_LOCATION,
      apiKey: e.GEMINI_API_KEY,
      model: e.GENERATION_MODEL,
      requestTimeoutMs: e.AI_REQUEST_TIMEOUT_MS,
      maxTransientRetries: e.AI_MAX_TRANSIENT_RETRIES,
      retryBaseDelayMs: e.AI_RETRY_BASE_DELAY_MS,
      enrichmentConcurrency: Math.max(1, e.ENRICHMENT_CONCURRENCY),
    }),
    directory: Object.freeze({
      datasetPath: resolveDataPath(e.CLINIC_DATASET_PATH),
      referencePointsPath: resolveDataPath(e.REFERENCE_POINTS_PATH),
      radiusMeters: bounds("search radius", e.SEARCH_RADIUS_MIN_M, e.SEARCH_RADIUS_MAX_M, e.SEARCH_RADIUS_DEFAULT_M),
      maxResults: bounds("result count", Math.max(1, e.RESULT_COUNT_MIN), e.RESULT_COUNT_MAX, e.RESULT_COUNT_DEFAULT),
      closingSoonThresholdMinutes: bounds(
        "closing-soon threshold",
        e.CLOSING_SOON_MIN_MINUTES,
        e.CLOSING_SOON_MAX_MINUTES,
        e.CLOSING_SOON_DEFAULT_MINUTES,
      ),
    }),
    session: Object.freeze({
      tokenSecret: e.RESUMPTION_TOKEN_SECRET,
      ttlMinutes: Math.max(1, e.SESSION_TTL_MINUTES),
      databaseUrl: e.DATABASE_URL,
    }),
  });
}

let singleton: AppConfig | undefined;

export function getAppConfig(): AppConfig {
  if (!singleton) singleton = parseAppConfig(process.env);
  return singleton;
}
