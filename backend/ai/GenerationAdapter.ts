import type { AIConfig } from "../config/AppConfig";
import type { PqrstNote } from "../domain/PqrstNote";
import type { ClarifyingAnswer, DepartmentRecommendation, NonEmptyArray } from "../domain/WorkflowState";
import { parseClarifyingQuestions } from "./ClarifyingQuestionGenerator";
import { parseDepartmentRecommendation } from "./DepartmentRecommender";
import type { TextGenerationService } from "./GenerationClient";
import { parsePqrstNote } from "./PqrstNoteGenerator";
import { buildClarifyingQuestionsPrompt, buildDepartmentRecommendationPrompt, buildPqrstNotePrompt } from "./PromptBuilders";
import type { RetryPolicy } from "./Resilience";
import { runStructuredTask } from "./StructuredGeneration";

// The three generation tasks the workflow needs, behind one seam.
// Every method either returns a fully validated value or throws
// GenerationError (or WorkflowSuperseded when the caller's signal aborts).

export interface WorkflowGeneration {
  generateClarifyingQuestions(symptomText: string, signal?: AbortSignal): Promise<NonEmptyArray<string>>;
  recommendDepartments(
    symptomText: string,
    answers: readonly ClarifyingAnswer[],
    signal?: AbortSignal,
  ): Promise<DepartmentRecommendation>;
  generatePqrstNote(symptomText: string, answers: readonly ClarifyingAnswer[], signal?: AbortSignal): Promise<PqrstNote>;
}

export function retryPolicyFrom(config: AIConfig): RetryPolicy {
  return {
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxTransientRetries,
    baseDelayMs: config.retryBaseDelayMs,
  };
}

export class GenerationAdapter implements WorkflowGeneration {
  constructor(
    private readonly service: TextGenerationService,
    private readonly policy: RetryPolicy,
  ) {}

  generateClarifyingQuestions(symptomText: string, signal?: AbortSignal): Promise<NonEmptyArray<string>> {
    return runStructuredTask({
      task: "clarifying-questions",
      prompt: buildClarifyingQuestionsPrompt({ symptomText }),
      parse: parseClarifyingQuestions,
      service: this.service,
      policy: this.policy,
      signal,
    });
  }

  recommendDepartments(
    symptomText: string,
    answers: readonly ClarifyingAnswer[],
    signal?: AbortSignal,
  ): Promise<DepartmentRecommendation> {
    return runStructuredTask({
      task: "department-recommendation",
      prompt: buildDepartmentRecommendationPrompt({ symptomText, answers }),
      parse: parseDepartmentRecommendation,
      service: this.service,
      policy: this.policy,
      signal,
    });
  }

  generatePqrstNote(symptomText: string, answers: readonly ClarifyingAnswer[], signal?: AbortSignal): Promise<PqrstNote> {
    return runStructuredTask({
      task: "pqrst-note",
      prompt: buildPqrstNotePrompt({ symptomText, answers }),
      parse: parsePqrstNote,
      service: this.service,
      policy: this.policy,
      signal,
    });
  }
}
