import { GenerationError, WorkflowSuperseded, type GenerationTask } from "../domain/WorkflowErrors";
import type { TextGenerationService } from "./GenerationClient";
import { OutputRejected, withStricterOutputRules } from "./PromptBuilders";
import { describeError, withTransientRetry, type RetryPolicy } from "./Resilience";

// Shared loop for every structured task:
// 1. call the provider (transient failures retried with backoff)
// 2. parse/validate the output
// 3. on rejection, re-prompt once with stricter output rules
// 4. on a second rejection, fail with GenerationError. Never return partial data.

export type StructuredTaskArgs<T> = Readonly<{
  task: GenerationTask;
  prompt: string;
  parse: (raw: string) => T;
  service: TextGenerationService;
  policy: RetryPolicy;
  signal?: AbortSignal;
}>;

const MAX_OUTPUT_ATTEMPTS = 2;

async function callProvider(args: StructuredTaskArgs<unknown>, prompt: string): Promise<string> {
  try {
    return await withTransientRetry(
      args.task,
      (signal) => args.service.generate({ task: args.task, prompt, signal }),
      args.policy,
      args.signal,
    );
  } catch (err) {
    if (err instanceof WorkflowSuperseded) throw err;
    throw new GenerationError(args.task, `provider call failed: ${describeError(err)}`, { cause: err });
  }
}

export async function runStructuredTask<T>(args: StructuredTaskArgs<T>): Promise<T> {
  let prompt = args.prompt;
  let lastRejection = "";

  for (let attempt = 1; attempt <= MAX_OUTPUT_ATTEMPTS; attempt++) {
    const raw = await callProvider(args, prompt);
    try {
      return args.parse(raw);
    } catch (err) {
      if (!(err instanceof OutputRejected)) throw err;
      lastRejection = err.reason;
      console.warn(`[AI] ${args.task}: output rejected on attempt ${attempt} (${err.reason})`);
      prompt = withStricterOutputRules(args.prompt, err.reason);
    }
  }

  throw new GenerationError(args.task, `output rejected after ${MAX_OUTPUT_ATTEMPTS} attempts: ${lastRejection}`);
}
