import type { WorkflowState } from "../domain/WorkflowState";
import type { SessionStore } from "./SessionStore";

// In-memory session store
// - Default when no DATABASE_URL is set; also used by tests.
// - Process-local: a restart or another instance behind a load balancer
//   does not see these entries (surfaced to users as SessionLost).
// - Stores clones so callers cannot mutate stored snapshots.

type Entry = { state: WorkflowState; expiresAt: number };

function cloneSnapshot<T>(value: T): T {
  return structuredClone(value);
}

export class InMemorySessionStore implements SessionStore {
  private readonly entries = new Map<string, Entry>();
  private readonly ttlMs: number;

  constructor(
    ttlMinutes: number,
    private readonly now: () => number = Date.now,
  ) {
    this.ttlMs = ttlMinutes * 60_000;
  }

  get size(): number {
    this.sweep();
    return this.entries.size;
  }

  async get(sessionId: string): Promise<WorkflowState | undefined> {
    const entry = this.live(sessionId);
    return entry ? cloneSnapshot(entry.state) : undefined;
  }

  async save(state: WorkflowState, expectedRevision: number | null): Promise<boolean> {
    const current = this.live(state.sessionId);
    const currentRevision = current ? current.state.revision : null;
    if (currentRevision !== expectedRevision) return false;

    this.entries.set(state.sessionId, { state: cloneSnapshot(state), expiresAt: this.now() + this.ttlMs });
    return true;
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.entries.delete(sessionId);
  }

  async purgeExpired(): Promise<number> {
    return this.sweep();
  }

  sweep(): number {
    const t = this.now();
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (entry.expiresAt <= t) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  private live(sessionId: string): Entry | undefined {
    const entry = this.entries.get(sessionId);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(sessionId);
      return undefined;
    }
    return entry;
  }
}
