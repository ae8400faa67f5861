import dotenv from "dotenv";
import { existsSync } from "fs";
import { resolve as pathResolve } from "path";

// Load .env before any module that reads process.env.
// Resolve from deterministic locations so startup cwd does not matter.
const envPathCandidates = [
  pathResolve(__dirname, "..", ".env"),
  pathResolve(__dirname, "..", "..", ".env"),
  pathResolve(process.cwd(), ".env"),
];

const resolvedEnvPath = envPathCandidates.find((p) => existsSync(p));
if (resolvedEnvPath) {
  dotenv.config({ path: resolvedEnvPath });
} else {
  dotenv.config();
}

import { GenerationAdapter, retryPolicyFrom } from "./ai/GenerationAdapter";
import { GeminiGenerationClient } from "./ai/GenerationClient";
import { SpecialistSearchAdapter } from "./ai/SpecialistSearch";
import { createApp } from "./app";
import { getAppConfig } from "./config/AppConfig";
import { closeDatabasePool } from "./database/connection";
import { ClinicDirectory } from "./maps/ClinicDirectory";
import { getSessionStore } from "./repository/RepositoryFactory";
import { InFlightRegistry } from "./session/InFlightRegistry";
import { ResumptionTokenCodec } from "./session/ResumptionToken";
import { SessionContinuity } from "./session/SessionContinuity";
import { WorkflowController } from "./workflow/WorkflowController";

const config = getAppConfig();

const directory = ClinicDirectory.load(config.directory);
const store = getSessionStore(config.session);
const tokens = new ResumptionTokenCodec(config.session.tokenSecret, config.session.ttlMinutes);
const gemini = new GeminiGenerationClient(config.ai);
const policy = retryPolicyFrom(config.ai);

const controller = new WorkflowController({
  store,
  continuity: new SessionContinuity(store, tokens),
  generation: new GenerationAdapter(gemini, policy),
  specialists: new SpecialistSearchAdapter(gemini, policy, config.ai.enrichmentConcurrency),
  directory,
  inFlight: new InFlightRegistry(),
});

const app = createApp({ controller, directory, corsOrigins: config.corsOrigins });

if (gemini.mode === "unconfigured") {
  console.warn("[Care Navigator] No model credentials set (GOOGLE_CLOUD_PROJECT or GEMINI_API_KEY); AI steps will fail");
}
if (config.session.tokenSecret === "care-navigator-dev-secret" && config.environment === "production") {
  console.warn("[Care Navigator] RESUMPTION_TOKEN_SECRET is the development default");
}

// ---- Expired session cleanup ----
const PURGE_INTERVAL_MS = 10 * 60 * 1000;
const purgeTimer = setInterval(() => {
  store
    .purgeExpired()
    .then((removed) => {
      if (removed > 0) console.log(`[Session] Purged ${removed} expired session(s)`);
    })
    .catch((err: unknown) => {
      console.error("[Session] Purge failed:", err instanceof Error ? err.message : err);
    });
}, PURGE_INTERVAL_MS);
purgeTimer.unref();

// ---- Graceful shutdown ----
async function shutdown(signal: string) {
  console.log(`[Care Navigator] ${signal} received, shutting down gracefully`);
  try {
    await closeDatabasePool();
  } catch (err) {
    console.error("[Care Navigator] Error while closing the database pool:", err instanceof Error ? err.message : err);
  }
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

// ---- Start server ----
app.listen(config.port, "0.0.0.0", () => {
  console.log(`[Care Navigator] Server running on port ${config.port}`);
  console.log(`[Care Navigator] API health check: http://0.0.0.0:${config.port}/api/health`);
  console.log(`[Care Navigator] Environment: ${config.environment}`);
  console.log(`[Care Navigator] Sessions: ${config.session.databaseUrl ? "PostgreSQL" : "In-memory"} (TTL ${config.session.ttlMinutes} min)`);
  console.log(`[Care Navigator] Model: ${config.ai.model} via ${gemini.mode}`);
});
