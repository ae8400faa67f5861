import type { SessionConfig } from "../config/AppConfig";
import { InMemorySessionStore } from "./InMemorySessionStore";
import { PostgresSessionStore } from "./PostgresSessionStore";
import type { SessionStore } from "./SessionStore";

// Repository Factory
// - The ONLY place where the session storage implementation is selected.
// - Selects PostgreSQL when DATABASE_URL is set, otherwise falls back to in-memory.

let singleton: SessionStore | undefined;

export function createSessionStore(config: SessionConfig): SessionStore {
  if (config.databaseUrl) {
    console.log("[Session] Using PostgreSQL session store");
    return new PostgresSessionStore(config.ttlMinutes);
  }
  console.log("[Session] Using in-memory session store (no DATABASE_URL set)");
  return new InMemorySessionStore(config.ttlMinutes);
}

export function getSessionStore(config: SessionConfig): SessionStore {
  if (!singleton) singleton = createSessionStore(config);
  return singleton;
}
