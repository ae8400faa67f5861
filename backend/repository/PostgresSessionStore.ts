import { query } from "../database/connection";
import type { WorkflowState } from "../domain/WorkflowState";
import { isWorkflowStateSnapshot, type SessionStore } from "./SessionStore";

// =========================================================================
// PostgreSQL Session Store
//
// Shared storage for multi-instance deployments (schema: sql/schema.sql).
// Same contract as InMemorySessionStore:
// - Compare-and-set on revision
// - Expired rows read as absent
// =========================================================================

interface SessionRow {
  [key: string]: unknown;
  state: unknown;
}

export class PostgresSessionStore implements SessionStore {
  constructor(private readonly ttlMinutes: number) {}

  async get(sessionId: string): Promise<WorkflowState | undefined> {
    const result = await query<SessionRow>(
      "SELECT state FROM workflow_sessions WHERE session_id = $1 AND expires_at > NOW()",
      [sessionId],
    );
    const row = result.rows[0];
    if (!row) return undefined;

    if (!isWorkflowStateSnapshot(row.state)) {
      console.error(`[Session] Stored state for ${sessionId.slice(0, 8)} is malformed; treating as absent`);
      return undefined;
    }
    return row.state;
  }

  async save(state: WorkflowState, expectedRevision: number | null): Promise<boolean> {
    const payload = JSON.stringify(state);

    if (expectedRevision === null) {
      // An expired row with the same id may be replaced.
      const inserted = await query(
        `INSERT INTO workflow_sessions (session_id, run_id, revision, stage, state, expires_at)
         VALUES ($1, $2, $3, $4, $5::jsonb, NOW() + make_interval(mins => $6))
         ON CONFLICT (session_id) DO UPDATE
           SET run_id = EXCLUDED.run_id, revision = EXCLUDED.revision, stage = EXCLUDED.stage,
               state = EXCLUDED.state, created_at = NOW(), updated_at = NOW(), expires_at = EXCLUDED.expires_at
           WHERE workflow_sessions.expires_at <= NOW()`,
        [state.sessionId, state.runId, state.revision, state.stage, payload, this.ttlMinutes],
      );
      return inserted.rowCount === 1;
    }

    const updated = await query(
      `UPDATE workflow_sessions
         SET run_id = $2, revision = $3, stage = $4, state = $5::jsonb, updated_at = NOW(),
             expires_at = NOW() + make_interval(mins => $6)
       WHERE session_id = $1 AND revision = $7 AND expires_at > NOW()`,
      [state.sessionId, state.runId, state.revision, state.stage, payload, this.ttlMinutes, expectedRevision],
    );
    return updated.rowCount === 1;
  }

  async delete(sessionId: string): Promise<boolean> {
    const result = await query("DELETE FROM workflow_sessions WHERE session_id = $1", [sessionId]);
    return (result.rowCount ?? 0) > 0;
  }

  async purgeExpired(): Promise<number> {
    const result = await query("DELETE FROM workflow_sessions WHERE expires_at <= NOW()");
    return result.rowCount ?? 0;
  }
}
