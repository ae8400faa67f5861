import { WorkflowSuperseded } from "../domain/WorkflowErrors";

// Tracks outstanding external calls per session so restart/edit can abort them.
// Process-local. Calls running on another instance are still caught by the
// store's revision check when they try to commit.

type Entry = { controller: AbortController; active: number };

export type InFlightLease = Readonly<{ signal: AbortSignal; release: () => void }>;

export class InFlightRegistry {
  private readonly entries = new Map<string, Entry>();

  begin(sessionId: string): InFlightLease {
    let entry = this.entries.get(sessionId);
    if (!entry) {
      entry = { controller: new AbortController(), active: 0 };
      this.entries.set(sessionId, entry);
    }
    entry.active++;

    const owned = entry;
    let released = false;
    return {
      signal: owned.controller.signal,
      release: () => {
        if (released) return;
        released = true;
        owned.active--;
        if (owned.active === 0 && this.entries.get(sessionId) === owned) this.entries.delete(sessionId);
      },
    };
  }

  // Aborts every outstanding call for the session. Returns whether any existed.
  abort(sessionId: string): boolean {
    const entry = this.entries.get(sessionId);
    if (!entry) return false;
    this.entries.delete(sessionId);
    entry.controller.abort(new WorkflowSuperseded());
    return true;
  }

  activeCount(sessionId: string): number {
    return this.entries.get(sessionId)?.active ?? 0;
  }
}
