import type {
  GroundedSearchRequest,
  GroundedSearchResponse,
  GroundedSearchService,
  TextGenerationRequest,
  TextGenerationService,
} from "../../ai/GenerationClient";
import type { RetryPolicy } from "../../ai/Resilience";
import type { DirectorySettings } from "../../maps/ClinicDirectory";
import { ClinicDirectory } from "../../maps/ClinicDirectory";
import { ReferencePointTable } from "../../maps/ReferencePoints";
import type { Clinic } from "../../domain/Clinic";
import type { GenerationTask } from "../../domain/WorkflowErrors";
import { WorkflowStage } from "../../domain/WorkflowStage";
import type { ClarificationState } from "../../domain/WorkflowState";

export const TEST_POLICY: RetryPolicy = { timeoutMs: 1000, maxRetries: 2, baseDelayMs: 0 };

export const TEST_SETTINGS: DirectorySettings = {
  radiusMeters: { min: 500, max: 5000, default: 2000 },
  maxResults: { min: 1, max: 20, default: 10 },
  closingSoonThresholdMinutes: { min: 5, max: 90, default: 30 },
};

// An error shaped like a provider HTTP failure.
export class StatusError extends Error {
  constructor(readonly status: number) {
    super(`provider responded with ${status}`);
  }
}

type Scripted = string | Error | ((request: TextGenerationRequest) => Promise<string>);

// Returns scripted outputs per task, in order.
export class ScriptedTextGeneration implements TextGenerationService {
  readonly calls: TextGenerationRequest[] = [];
  private readonly queues: Map<GenerationTask, Scripted[]>;

  constructor(script: Partial<Record<GenerationTask, Scripted[]>>) {
    this.queues = new Map();
    for (const [task, outputs] of Object.entries(script)) {
      if (isTask(task) && outputs) this.queues.set(task, [...outputs]);
    }
  }

  callsFor(task: GenerationTask): TextGenerationRequest[] {
    return this.calls.filter((c) => c.task === task);
  }

  async generate(request: TextGenerationRequest): Promise<string> {
    this.calls.push(request);
    const next = this.queues.get(request.task)?.shift();
    if (next === undefined) throw new Error(`no scripted output left for ${request.task}`);
    if (next instanceof Error) throw next;
    if (typeof next === "function") return next(request);
    return next;
  }
}

function isTask(value: string): value is GenerationTask {
  return value === "clarifying-questions" || value === "department-recommendation" || value === "pqrst-note";
}

type SearchOutcome = GroundedSearchResponse | Error;

// Answers by clinic name found in the prompt; unknown clinics get an empty grounded answer.
export class FakeGroundedSearch implements GroundedSearchService {
  readonly prompts: string[] = [];

  constructor(private readonly byClinicName: Readonly<Record<string, SearchOutcome[]>>) {}

  async search(request: GroundedSearchRequest): Promise<GroundedSearchResponse> {
    this.prompts.push(request.prompt);
    const name = Object.keys(this.byClinicName).find((n) => request.prompt.includes(n));
    const next = name ? this.byClinicName[name]?.shift() : undefined;
    if (next instanceof Error) throw next;
    return next ?? { text: "", sources: [], supports: [] };
  }
}

export function makeClinic(overrides: Partial<Clinic> & Pick<Clinic, "id" | "coordinate">): Clinic {
  return {
    name: `テストクリニック${overrides.id}`,
    address: "東京都港区テスト1-1-1",
    category: "clinic",
    departments: ["内科"],
    receptionHours: {},
    ...overrides,
  };
}

export const TEST_REFERENCE_POINTS = ReferencePointTable.fromJson({
  referencePoints: [{ name: "テスト駅", aliases: ["Test Station"], lat: 35.0, lng: 139.0 }],
});

export function makeDirectory(clinics: readonly Clinic[]): ClinicDirectory {
  return new ClinicDirectory(clinics, TEST_REFERENCE_POINTS, TEST_SETTINGS);
}

export function json(value: unknown): string {
  return JSON.stringify(value);
}

// Awaits a promise that must reject with the given error type and returns the error.
export async function rejectionOf<E extends Error>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => E,
): Promise<E> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`expected a ${type.name} rejection`);
}

export function clarificationSnapshot(
  sessionId: string,
  overrides: Partial<Pick<ClarificationState, "revision" | "runId" | "answers">> = {},
): ClarificationState {
  return {
    sessionId,
    runId: "run-1",
    revision: 1,
    createdAt: "2026-10-19T01:00:00.000Z",
    updatedAt: "2026-10-19T01:00:00.000Z",
    stage: WorkflowStage.Clarification,
    symptomText: "頭が痛い",
    questions: ["いつからですか？"],
    answers: [],
    ...overrides,
  };
}
