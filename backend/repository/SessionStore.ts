import { isWorkflowStage, WorkflowStage } from "../domain/WorkflowStage";
import type { WorkflowState } from "../domain/WorkflowState";

// Session Store Contract
// - Holds one WorkflowState snapshot per session id.
// - Snapshots are plain data; callers never get a reference into storage.
// - Writes are compare-and-set on `revision` so a stale writer (a call that
//   finished after a restart or an edit) cannot overwrite newer state.
// - Entries expire after the session TTL; an expired entry reads as absent.

export interface SessionStore {
  get(sessionId: string): Promise<WorkflowState | undefined>;

  // Persists `state` when the stored revision equals `expectedRevision`
  // (null: no entry may exist yet). Returns false on conflict.
  save(state: WorkflowState, expectedRevision: number | null): Promise<boolean>;

  delete(sessionId: string): Promise<boolean>;

  // Removes expired entries; returns how many were removed.
  purgeExpired(): Promise<number>;
}

function isNonEmptyStringArray(value: unknown): boolean {
  return Array.isArray(value) && value.length > 0 && value.every((v) => typeof v === "string");
}

// Shape check for snapshots read back from storage (JSON columns, clones).
export function isWorkflowStateSnapshot(value: unknown): value is WorkflowState {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const v: Record<string, unknown> = { ...value };

  if (!isWorkflowStage(v.stage) || v.stage === WorkflowStage.Intake) return false;
  if (typeof v.sessionId !== "string" || typeof v.runId !== "string") return false;
  if (typeof v.revision !== "number" || typeof v.symptomText !== "string") return false;
  if (!isNonEmptyStringArray(v.questions) || !Array.isArray(v.answers)) return false;

  if (v.stage >= WorkflowStage.Recommendation && (typeof v.recommendation !== "object" || v.recommendation === null)) return false;
  if (v.stage >= WorkflowStage.FacilityLookup && (!Array.isArray(v.clinics) || typeof v.enrichment !== "object")) return false;
  if (v.stage === WorkflowStage.NoteGeneration && (typeof v.note !== "object" || v.note === null)) return false;
  return true;
}
