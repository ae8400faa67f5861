import type { ClinicResult, LatLng, SearchOrigin } from "./Clinic";
import type { PqrstNote } from "./PqrstNote";
import type { ClinicEnrichment } from "./SpecialistFinding";
import type { WorkflowStage } from "./WorkflowStage";

// NOTE: These are domain contracts only.
// - One variant per stage; a later stage's fields do not exist on an earlier variant.
// - No in-place mutation: every transition produces a new object.
// - Intake has no stored variant. A fresh visit is the absence of state.

export type ISODateTimeString = string;

export type NonEmptyArray<T> = readonly [T, ...T[]];

export interface ClarifyingAnswer {
  readonly question: string;
  // Empty string means the user skipped the question.
  readonly answer: string;
}

export interface DepartmentSuggestion {
  readonly department: string;
  readonly rationale: string;
}

export interface DepartmentRecommendation {
  readonly departments: NonEmptyArray<DepartmentSuggestion>;
  readonly disclaimer: string;
}

export interface FacilitySearch {
  // New per lookup. Enrichment results are merged only into the lookup they were requested for.
  readonly lookupId: string;
  readonly origin: SearchOrigin;
  readonly originLabel: string;
  readonly resolvedOrigin: LatLng;

  // Values after clamping, i.e. what the directory actually searched with.
  readonly radiusMeters: number;
  readonly maxResults: number;
  readonly closingSoonThresholdMinutes: number;
  readonly departmentKeywords: readonly string[];
  readonly onlyAcceptingNow: boolean;
}

export type Enrichment =
  | { readonly kind: "not-requested" }
  | { readonly kind: "enriched"; readonly byClinic: Readonly<Record<string, ClinicEnrichment>> };

interface WorkflowStateBase {
  readonly sessionId: string;

  // New per intake submission. In-flight results carrying an older runId are discarded.
  readonly runId: string;

  // Incremented on every save; the store uses it for compare-and-set.
  readonly revision: number;

  readonly createdAt: ISODateTimeString;
  readonly updatedAt: ISODateTimeString;
}

export interface ClarificationState extends WorkflowStateBase {
  readonly stage: WorkflowStage.Clarification;
  readonly symptomText: string;
  readonly questions: NonEmptyArray<string>;
  readonly answers: readonly ClarifyingAnswer[];
}

export interface RecommendationState extends Omit<ClarificationState, "stage"> {
  readonly stage: WorkflowStage.Recommendation;
  readonly recommendation: DepartmentRecommendation;
}

export interface FacilityLookupState extends Omit<RecommendationState, "stage"> {
  readonly stage: WorkflowStage.FacilityLookup;
  readonly facilitySearch: FacilitySearch;
  readonly clinics: readonly ClinicResult[];
  readonly enrichment: { readonly kind: "not-requested" };
}

export interface SpecialistEnrichmentState extends Omit<FacilityLookupState, "stage" | "enrichment"> {
  readonly stage: WorkflowStage.SpecialistEnrichment;
  readonly enrichment: Extract<Enrichment, { kind: "enriched" }>;
}

// Terminal. Enrichment is whichever variant the user reached before asking for the note.
export interface NoteGenerationState extends Omit<FacilityLookupState, "stage" | "enrichment"> {
  readonly stage: WorkflowStage.NoteGeneration;
  readonly enrichment: Enrichment;
  readonly note: PqrstNote;
}

export type WorkflowState =
  | ClarificationState
  | RecommendationState
  | FacilityLookupState
  | SpecialistEnrichmentState
  | NoteGenerationState;

export type StateAtStage<TStage extends WorkflowState["stage"]> = Extract<WorkflowState, { stage: TStage }>;
