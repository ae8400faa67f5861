import type { ClinicResult } from "../domain/Clinic";
import type { PqrstNote } from "../domain/PqrstNote";
import type { ClinicEnrichment } from "../domain/SpecialistFinding";
import { StageTransitionError } from "../domain/WorkflowErrors";
import { WorkflowStage } from "../domain/WorkflowStage";
import type {
  ClarificationState,
  ClarifyingAnswer,
  DepartmentRecommendation,
  FacilityLookupState,
  FacilitySearch,
  NoteGenerationState,
  RecommendationState,
  SpecialistEnrichmentState,
  StateAtStage,
  WorkflowState,
} from "../domain/WorkflowState";

// Pure transition helpers. Each builder copies only the fields that are still
// valid at the target stage, so anything downstream of an edit disappears by
// construction rather than by an explicit reset.

export type StateMeta = Pick<WorkflowState, "sessionId" | "runId" | "revision" | "createdAt" | "updatedAt">;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

// What clients see. runId/revision are concurrency bookkeeping.
export type WorkflowStateView = DistributiveOmit<WorkflowState, "runId" | "revision">;

export type ReachedRecommendation = Exclude<WorkflowState, ClarificationState>;
export type ReachedFacilityLookup = FacilityLookupState | SpecialistEnrichmentState | NoteGenerationState;
export type EnrichableState = FacilityLookupState | SpecialistEnrichmentState;

export function nextMeta(prev: WorkflowState, now: Date): StateMeta {
  return {
    sessionId: prev.sessionId,
    runId: prev.runId,
    revision: prev.revision + 1,
    createdAt: prev.createdAt,
    updatedAt: now.toISOString(),
  };
}

export function assertStageIn<S extends WorkflowState["stage"]>(
  state: WorkflowState,
  allowed: readonly S[],
  action: string,
): asserts state is StateAtStage<S> {
  if (!allowed.some((s) => s === state.stage)) throw new StageTransitionError(state.stage, action);
}

export function clarificationState(
  meta: StateMeta,
  symptomText: string,
  questions: ClarificationState["questions"],
  answers: readonly ClarifyingAnswer[] = [],
): ClarificationState {
  return { ...meta, stage: WorkflowStage.Clarification, symptomText, questions, answers };
}

// Drops the recommendation and everything after it.
export function withAnswers(state: WorkflowState, answers: readonly ClarifyingAnswer[], meta: StateMeta): ClarificationState {
  return clarificationState(meta, state.symptomText, state.questions, answers);
}

export function withRecommendation(
  state: WorkflowState,
  answers: readonly ClarifyingAnswer[],
  recommendation: DepartmentRecommendation,
  meta: StateMeta,
): RecommendationState {
  return { ...withAnswers(state, answers, meta), stage: WorkflowStage.Recommendation, recommendation };
}

// Drops enrichment and the note.
export function withFacilities(
  state: ReachedRecommendation,
  facilitySearch: FacilitySearch,
  clinics: readonly ClinicResult[],
  meta: StateMeta,
): FacilityLookupState {
  return {
    ...withRecommendation(state, state.answers, state.recommendation, meta),
    stage: WorkflowStage.FacilityLookup,
    facilitySearch,
    clinics,
    enrichment: { kind: "not-requested" },
  };
}

function facilityFields(state: ReachedFacilityLookup, meta: StateMeta): Omit<FacilityLookupState, "stage" | "enrichment"> {
  return {
    ...withRecommendation(state, state.answers, state.recommendation, meta),
    facilitySearch: state.facilitySearch,
    clinics: state.clinics,
  };
}

export function withEnrichment(
  state: EnrichableState,
  byClinic: Readonly<Record<string, ClinicEnrichment>>,
  meta: StateMeta,
): SpecialistEnrichmentState {
  return {
    ...facilityFields(state, meta),
    stage: WorkflowStage.SpecialistEnrichment,
    enrichment: { kind: "enriched", byClinic },
  };
}

export function withNote(state: EnrichableState, note: PqrstNote, meta: StateMeta): NoteGenerationState {
  return { ...facilityFields(state, meta), stage: WorkflowStage.NoteGeneration, enrichment: state.enrichment, note };
}

export function existingEnrichment(state: EnrichableState): Readonly<Record<string, ClinicEnrichment>> {
  return state.enrichment.kind === "enriched" ? state.enrichment.byClinic : {};
}

export function toView(state: WorkflowState): WorkflowStateView {
  const { runId: _runId, revision: _revision, ...view } = state;
  return view;
}
