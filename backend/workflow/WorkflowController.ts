import { v4 as uuidv4 } from "uuid";
import type { WorkflowGeneration } from "../ai/GenerationAdapter";
import type { Clinic } from "../domain/Clinic";
import type { ClinicEnrichment } from "../domain/SpecialistFinding";
import { StageTransitionError, ValidationError, WorkflowSuperseded } from "../domain/WorkflowErrors";
import { stageName, WorkflowStage } from "../domain/WorkflowStage";
import type { ClarifyingAnswer, FacilitySearch, WorkflowState } from "../domain/WorkflowState";
import {
  departmentKeywordsFor,
  excludedDepartmentKeywordsFor,
  HOME_VISIT_NAME_KEYWORDS,
} from "../maps/DepartmentKeywordMap";
import type { ClinicDirectory } from "../maps/ClinicDirectory";
import type { SessionStore } from "../repository/SessionStore";
import { InFlightRegistry } from "../session/InFlightRegistry";
import type { SessionContinuity } from "../session/SessionContinuity";
import {
  AnswerIndexSchema,
  AnswerListSchema,
  AnswerTextSchema,
  ClinicIdListSchema,
  FacilitySelectionSchema,
  parseInput,
  SymptomTextSchema,
  type FacilitySelectionInput,
} from "../validation/schemas";
import {
  assertStageIn,
  clarificationState,
  existingEnrichment,
  nextMeta,
  toView,
  withAnswers,
  withEnrichment,
  withFacilities,
  withNote,
  withRecommendation,
  type EnrichableState,
  type WorkflowStateView,
} from "./Transitions";

// Workflow controller: the only component that advances a session.
//
// Every operation: resolve the session from the resumption token, check the
// stage, validate input, run at most one external call, then commit the next
// state with compare-and-set. A result whose session moved on in the meantime
// (restart, edit, re-entry) is discarded with WorkflowSuperseded.

export interface SpecialistEnrichmentService {
  enrichClinics(clinics: readonly Clinic[], signal?: AbortSignal): Promise<Record<string, ClinicEnrichment>>;
}

export type WorkflowResponse = Readonly<{
  // null after restart or on a fresh visit: the client should drop any stored token.
  resumptionToken: string | null;
  step: WorkflowStage;
  state: WorkflowStateView | null;
}>;

export type EnrichmentResponse = WorkflowResponse &
  Readonly<{
    // Results for the clinics in this request only, including inline failures.
    enrichment: Readonly<Record<string, ClinicEnrichment>>;
  }>;

export interface WorkflowControllerDeps {
  readonly store: SessionStore;
  readonly continuity: SessionContinuity;
  readonly generation: WorkflowGeneration;
  readonly specialists: SpecialistEnrichmentService;
  readonly directory: ClinicDirectory;
  readonly inFlight?: InFlightRegistry;
  readonly clock?: () => Date;
  readonly newId?: () => string;
}

const ENRICHMENT_COMMIT_ATTEMPTS = 3;

const ANSWERABLE = [
  WorkflowStage.Clarification,
  WorkflowStage.Recommendation,
  WorkflowStage.FacilityLookup,
  WorkflowStage.SpecialistEnrichment,
] as const;

const RECOMMENDED = [WorkflowStage.Recommendation, WorkflowStage.FacilityLookup, WorkflowStage.SpecialistEnrichment] as const;

const LOOKED_UP = [WorkflowStage.FacilityLookup, WorkflowStage.SpecialistEnrichment] as const;

function short(sessionId: string): string {
  return sessionId.slice(0, 8);
}

export class WorkflowController {
  private readonly store: SessionStore;
  private readonly continuity: SessionContinuity;
  private readonly generation: WorkflowGeneration;
  private readonly specialists: SpecialistEnrichmentService;
  private readonly directory: ClinicDirectory;
  private readonly inFlight: InFlightRegistry;
  private readonly clock: () => Date;
  private readonly newId: () => string;

  constructor(deps: WorkflowControllerDeps) {
    this.store = deps.store;
    this.continuity = deps.continuity;
    this.generation = deps.generation;
    this.specialists = deps.specialists;
    this.directory = deps.directory;
    this.inFlight = deps.inFlight ?? new InFlightRegistry();
    this.clock = deps.clock ?? (() => new Date());
    this.newId = deps.newId ?? (() => uuidv4());
  }

  // --- Read ---

  async view(token: string | undefined): Promise<WorkflowResponse> {
    const session = await this.continuity.resolve(token);
    return session.kind === "fresh" ? this.freshResponse() : this.respond(session.state);
  }

  // --- Intake -> Clarification ---

  // Also the re-entry point from any non-terminal stage: a new symptom text
  // starts a new run in the same session and discards everything downstream.
  async submitSymptom(token: string | undefined, symptomText: string): Promise<WorkflowResponse> {
    const session = await this.continuity.resolve(token);
    const text = parseInput(SymptomTextSchema, symptomText, "symptomText");
    const now = this.clock();

    let previous: WorkflowState | undefined;
    let sessionId: string;
    if (session.kind === "active") {
      previous = session.state;
      assertStageIn(previous, ANSWERABLE, "submit-symptom");
      sessionId = previous.sessionId;
      this.inFlight.abort(sessionId);
    } else {
      sessionId = this.newId();
    }

    const questions = await this.runExclusive(sessionId, (signal) => this.generation.generateClarifyingQuestions(text, signal));

    const next = clarificationState(
      {
        sessionId,
        runId: this.newId(),
        revision: previous ? previous.revision + 1 : 1,
        createdAt: previous ? previous.createdAt : now.toISOString(),
        updatedAt: now.toISOString(),
      },
      text,
      questions,
    );
    await this.commit(previous, next);
    return this.respond(next);
  }

  // --- Clarification -> Recommendation ---

  async submitAnswers(token: string | undefined, answers: readonly string[]): Promise<WorkflowResponse> {
    const state = await this.requireActive(token, "submit-answers");
    assertStageIn(state, ANSWERABLE, "submit-answers");

    const provided = parseInput(AnswerListSchema, answers, "answers");
    if (provided.length > state.questions.length) {
      throw new ValidationError(`Expected at most ${state.questions.length} answers.`, "answers");
    }
    // Questions past the end of the list keep their stored answer, so an edit survives re-advancing.
    const paired: ClarifyingAnswer[] = state.questions.map((question, i) => ({
      question,
      answer: provided[i] ?? state.answers[i]?.answer ?? "",
    }));

    const recommendation = await this.runExclusive(state.sessionId, (signal) =>
      this.generation.recommendDepartments(state.symptomText, paired, signal),
    );

    const next = withRecommendation(state, paired, recommendation, nextMeta(state, this.clock()));
    await this.commit(state, next);
    return this.respond(next);
  }

  // Editing an answer invalidates the recommendation and everything after it.
  async editAnswer(token: string | undefined, index: number, answer: string): Promise<WorkflowResponse> {
    const state = await this.requireActive(token, "edit-answer");
    assertStageIn(state, ANSWERABLE, "edit-answer");

    const i = parseInput(AnswerIndexSchema, index, "index");
    const text = parseInput(AnswerTextSchema, answer, "answer");
    if (i >= state.questions.length) {
      throw new ValidationError(`There is no question #${i + 1}.`, "index");
    }

    const answers: ClarifyingAnswer[] = state.questions.map((question, k) => ({
      question,
      answer: k === i ? text : state.answers[k]?.answer ?? "",
    }));

    // Outstanding calls for this session were computed from the old answers.
    this.inFlight.abort(state.sessionId);

    const next = withAnswers(state, answers, nextMeta(state, this.clock()));
    await this.commit(state, next);
    return this.respond(next);
  }

  // --- Recommendation -> FacilityLookup ---

  async lookupFacilities(token: string | undefined, selection: FacilitySelectionInput): Promise<WorkflowResponse> {
    const state = await this.requireActive(token, "lookup-facilities");
    assertStageIn(state, RECOMMENDED, "lookup-facilities");

    const input = parseInput(FacilitySelectionSchema, selection);
    const departmentKeywords = departmentKeywordsFor(state.recommendation.departments.map((d) => d.department));

    // Throws EmptyResultError; the state stays where it was.
    const result = this.directory.query({
      origin: input.origin,
      radiusMeters: input.radiusMeters,
      maxResults: input.maxResults,
      closingSoonThresholdMinutes: input.closingSoonThresholdMinutes,
      now: this.clock(),
      filters: {
        departmentKeywords,
        excludeDepartmentKeywords: excludedDepartmentKeywordsFor(departmentKeywords),
        excludeNameKeywords: HOME_VISIT_NAME_KEYWORDS,
        onlyAcceptingNow: input.onlyAcceptingNow,
      },
    });

    const facilitySearch: FacilitySearch = {
      lookupId: this.newId(),
      origin: input.origin,
      originLabel: result.origin.label,
      resolvedOrigin: result.origin.coordinate,
      radiusMeters: result.radiusMeters,
      maxResults: result.maxResults,
      closingSoonThresholdMinutes: result.closingSoonThresholdMinutes,
      departmentKeywords,
      onlyAcceptingNow: input.onlyAcceptingNow,
    };

    this.inFlight.abort(state.sessionId);
    const next = withFacilities(state, facilitySearch, result.clinics, nextMeta(state, this.clock()));
    await this.commit(state, next);
    return this.respond(next);
  }

  // --- FacilityLookup -> SpecialistEnrichment (optional) ---

  async enrichClinics(token: string | undefined, clinicIds: readonly string[]): Promise<EnrichmentResponse> {
    const state = await this.requireActive(token, "enrich-clinics");
    assertStageIn(state, LOOKED_UP, "enrich-clinics");

    const ids = parseInput(ClinicIdListSchema, clinicIds, "clinicIds");
    const listed = new Map(state.clinics.map((c) => [c.id, c]));
    const selected: Clinic[] = [];
    for (const id of ids) {
      const clinic = listed.get(id);
      if (!clinic) throw new ValidationError(`Clinic ${id} is not in the current result list.`, "clinicIds");
      selected.push(clinic);
    }

    // Clinics that already have a successful result are not searched again.
    const already = existingEnrichment(state);
    const pending = selected.filter((c) => already[c.id]?.status !== "found");

    const fresh =
      pending.length > 0
        ? await this.runExclusive(state.sessionId, (signal) => this.specialists.enrichClinics(pending, signal))
        : {};

    const committed = await this.commitEnrichment(state, fresh);
    const byClinic = existingEnrichment(committed);
    const enrichment: Record<string, ClinicEnrichment> = {};
    for (const id of ids) {
      const entry = byClinic[id];
      if (entry) enrichment[id] = entry;
    }
    return { ...this.respond(committed), enrichment };
  }

  // --- FacilityLookup | SpecialistEnrichment -> NoteGeneration (terminal) ---

  async generateNote(token: string | undefined): Promise<WorkflowResponse> {
    const state = await this.requireActive(token, "generate-note");
    assertStageIn(state, LOOKED_UP, "generate-note");

    const note = await this.runExclusive(state.sessionId, (signal) =>
      this.generation.generatePqrstNote(state.symptomText, state.answers, signal),
    );

    const next = withNote(state, note, nextMeta(state, this.clock()));
    await this.commit(state, next);
    return this.respond(next);
  }

  // --- Restart (from anywhere) ---

  // Works even when the session is already lost: that is how a user leaves SessionLost.
  async restart(token: string | undefined): Promise<WorkflowResponse> {
    const sessionId = this.continuity.sessionIdOf(token);
    if (sessionId) {
      const aborted = this.inFlight.abort(sessionId);
      const deleted = await this.store.delete(sessionId);
      console.log(`[Workflow] ${short(sessionId)}: restart (state ${deleted ? "cleared" : "already gone"}${aborted ? ", in-flight calls aborted" : ""})`);
    }
    return this.freshResponse();
  }

  // --- internals ---

  private async requireActive(token: string | undefined, action: string): Promise<WorkflowState> {
    const session = await this.continuity.resolve(token);
    if (session.kind === "fresh") throw new StageTransitionError(WorkflowStage.Intake, action);
    return session.state;
  }

  private async runExclusive<T>(sessionId: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const lease = this.inFlight.begin(sessionId);
    try {
      const result = await fn(lease.signal);
      if (lease.signal.aborted) throw new WorkflowSuperseded();
      return result;
    } finally {
      lease.release();
    }
  }

  private async commit(previous: WorkflowState | undefined, next: WorkflowState): Promise<void> {
    const saved = await this.store.save(next, previous ? previous.revision : null);
    if (!saved) {
      console.warn(`[Workflow] ${short(next.sessionId)}: discarded stale ${stageName(next.stage)} result`);
      throw new WorkflowSuperseded();
    }
    const from = previous ? stageName(previous.stage) : stageName(WorkflowStage.Intake);
    console.log(`[Workflow] ${short(next.sessionId)}: ${from} -> ${stageName(next.stage)} (rev ${next.revision})`);
  }

  // Concurrent enrichment requests for the same lookup merge instead of
  // superseding each other. Anything else that moved the session wins.
  private async commitEnrichment(
    initial: EnrichableState,
    fresh: Readonly<Record<string, ClinicEnrichment>>,
  ): Promise<EnrichableState> {
    let current = initial;
    for (let attempt = 0; attempt < ENRICHMENT_COMMIT_ATTEMPTS; attempt++) {
      const next = withEnrichment(current, { ...existingEnrichment(current), ...fresh }, nextMeta(current, this.clock()));
      if (await this.store.save(next, current.revision)) {
        console.log(`[Workflow] ${short(next.sessionId)}: ${stageName(current.stage)} -> ${stageName(next.stage)} (rev ${next.revision})`);
        return next;
      }

      const latest = await this.store.get(current.sessionId);
      if (
        !latest ||
        latest.runId !== current.runId ||
        !(latest.stage === WorkflowStage.FacilityLookup || latest.stage === WorkflowStage.SpecialistEnrichment) ||
        latest.facilitySearch.lookupId !== current.facilitySearch.lookupId
      ) {
        console.warn(`[Workflow] ${short(current.sessionId)}: discarded stale enrichment result`);
        throw new WorkflowSuperseded();
      }
      current = latest;
    }
    throw new WorkflowSuperseded();
  }

  private respond(state: WorkflowState): WorkflowResponse {
    return { resumptionToken: this.continuity.issueToken(state), step: state.stage, state: toView(state) };
  }

  private freshResponse(): WorkflowResponse {
    return { resumptionToken: null, step: WorkflowStage.Intake, state: null };
  }
}
