import { stageName, type WorkflowStage } from "./WorkflowStage";

// Error taxonomy for the workflow.
// Every user-visible failure names what happened (userMessage) and what the
// user can do next (nextActions). None of them reset state or fabricate data.

export type NextAction =
  | "fix-input"
  | "retry"
  | "widen-radius"
  | "change-origin"
  | "retry-enrichment"
  | "restart"
  | "view";

export type WorkflowErrorCode =
  | "validation_error"
  | "generation_error"
  | "empty_result"
  | "enrichment_unavailable"
  | "session_lost"
  | "stage_transition"
  | "workflow_superseded";

export abstract class WorkflowError extends Error {
  abstract readonly code: WorkflowErrorCode;
  abstract readonly httpStatus: number;
  abstract readonly nextActions: readonly NextAction[];

  constructor(readonly userMessage: string, options?: { cause?: unknown }) {
    super(userMessage, options);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.userMessage,
      nextActions: this.nextActions,
    };
  }
}

export class ValidationError extends WorkflowError {
  readonly code = "validation_error";
  readonly httpStatus = 400;
  readonly nextActions: readonly NextAction[] = ["fix-input"];

  constructor(message: string, readonly field?: string) {
    super(message);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), ...(this.field ? { field: this.field } : {}) };
  }
}

export type GenerationTask = "clarifying-questions" | "department-recommendation" | "pqrst-note";

export class GenerationError extends WorkflowError {
  readonly code = "generation_error";
  readonly httpStatus = 502;
  readonly nextActions: readonly NextAction[] = ["retry"];

  constructor(readonly task: GenerationTask, readonly detail: string, options?: { cause?: unknown }) {
    super("The assistant could not produce a usable answer. Please try again.", options);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), task: this.task };
  }
}

export class EmptyResultError extends WorkflowError {
  readonly code = "empty_result";
  readonly httpStatus = 404;
  readonly nextActions: readonly NextAction[];

  constructor(
    readonly radiusMeters: number,
    readonly maxRadiusMeters: number,
  ) {
    super(
      radiusMeters < maxRadiusMeters
        ? `No clinics were found within ${radiusMeters} m. Try a wider radius or another starting point.`
        : `No clinics were found within ${radiusMeters} m, the widest radius available. Try another starting point.`,
    );
    this.nextActions = radiusMeters < maxRadiusMeters ? ["widen-radius", "change-origin"] : ["change-origin"];
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), radiusMeters: this.radiusMeters, maxRadiusMeters: this.maxRadiusMeters };
  }
}

// Reported inline next to one clinic. Never fails the stage as a whole.
export class EnrichmentUnavailable extends WorkflowError {
  readonly code = "enrichment_unavailable";
  readonly httpStatus = 502;
  readonly nextActions: readonly NextAction[] = ["retry-enrichment"];

  constructor(readonly clinicId: string, readonly detail: string, options?: { cause?: unknown }) {
    super("Specialist information for this clinic could not be retrieved right now.", options);
  }
}

export class SessionLost extends WorkflowError {
  readonly code = "session_lost";
  readonly httpStatus = 410;
  readonly nextActions: readonly NextAction[] = ["restart"];

  constructor(readonly lastKnownStep: WorkflowStage, readonly reason: "evicted" | "expired") {
    super(
      reason === "expired"
        ? "Your previous session has expired. Please start again from the beginning."
        : "Your previous session was lost (the server may have restarted). Please start again from the beginning.",
    );
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), lastKnownStep: this.lastKnownStep };
  }
}

export class StageTransitionError extends WorkflowError {
  readonly code = "stage_transition";
  readonly httpStatus = 409;
  readonly nextActions: readonly NextAction[] = ["view"];

  constructor(readonly current: WorkflowStage, readonly attempted: string) {
    super(`"${attempted}" is not available at the ${stageName(current)} step.`);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), step: this.current };
  }
}

// An in-flight call finished after the workflow moved on (restart or edit).
// Its result was discarded instead of being applied to the newer state.
export class WorkflowSuperseded extends WorkflowError {
  readonly code = "workflow_superseded";
  readonly httpStatus = 409;
  readonly nextActions: readonly NextAction[] = ["view"];

  constructor() {
    super("This request was superseded by a newer action in the same session. Its result was discarded.");
  }
}
